/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
metalayout - table layout generator for binary metadata containers v${VERSION}

USAGE:
  metalayout <command> [schema] [options]

COMMANDS:
  generate [schema]         Generate the layout module
  check [schema]            Validate the schema without writing anything
  describe [schema]         Print table ids, record widths and coded dispatch

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output and warnings
  -c, --config <file>       Config file path (default: metalayout.json)

GENERATE OPTIONS:
  -o, --out <file>          Output file (default: layout.generated.ts)
  --runtime-module <module> Module the generated code imports reader types from
  --flags-module <module>   Module exporting flag types
  --no-timestamp            Omit the generation time from the file header

EXAMPLES:
  metalayout generate
  metalayout generate schema/tables.ts -o src/layout.ts
  metalayout check schema.json
  metalayout describe --config tools/metalayout.json
`);
};
