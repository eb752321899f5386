/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig, CONFIG_FILE } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { checkCommand } from "../commands/check.js";
import { describeCommand } from "../commands/describe.js";
import type {
  CliOptions,
  CommandError,
  MetalayoutConfig,
  ResolvedConfig,
  Result,
} from "../types.js";
import { EXIT_CODES, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

type Command = (config: ResolvedConfig) => Result<void, CommandError>;

const COMMANDS: ReadonlyMap<string, Command> = new Map([
  ["generate", generateCommand],
  ["check", checkCommand],
  ["describe", describeCommand],
]);

const exitCodeFor = (error: CommandError): number => {
  switch (error.stage) {
    case "load":
      return EXIT_CODES.load;
    case "generate":
      return EXIT_CODES.generate;
    case "write":
      return EXIT_CODES.write;
  }
};

const finish = (result: Result<void, CommandError>): number => {
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    return exitCodeFor(result.error);
  }
  return EXIT_CODES.ok;
};

/**
 * Paths given on the command line are relative to the working directory,
 * not to the project root.
 */
const absoluteCliPaths = (options: CliOptions, cwd: string): CliOptions => ({
  ...options,
  ...(options.out ? { out: resolve(cwd, options.out) } : {}),
});

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`metalayout v${VERSION}`);
    return EXIT_CODES.ok;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_CODES.ok;
  }

  const command = COMMANDS.get(parsed.command);
  if (!command) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'metalayout --help' for usage information");
    return EXIT_CODES.unknownCommand;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath && !parsed.schemaFile) {
    console.error(`Error: No ${CONFIG_FILE} found and no schema given`);
    console.error(`Create ${CONFIG_FILE} or run 'metalayout ${parsed.command} <schema>'`);
    return EXIT_CODES.noConfig;
  }

  let fileConfig: MetalayoutConfig | undefined;
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return EXIT_CODES.failure;
    }
    fileConfig = configResult.value;
  }

  // Project root is the directory containing metalayout.json
  const projectRoot = configPath ? dirname(configPath) : cwd;

  const config = resolveConfig(
    fileConfig,
    absoluteCliPaths(parsed.options, cwd),
    projectRoot,
    parsed.schemaFile ? resolve(cwd, parsed.schemaFile) : undefined
  );
  if (!config.ok) {
    console.error(`Error: ${config.error}`);
    return EXIT_CODES.failure;
  }

  return finish(command(config.value));
};
