/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly schemaFile?: string;
  readonly options: CliOptions;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let schemaFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command
    if (command && !schemaFile && !arg.startsWith("-")) {
      schemaFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "--runtime-module":
        options.runtimeModule = args[++i] ?? "";
        break;
      case "--flags-module":
        options.flagsModule = args[++i] ?? "";
        break;
      case "--no-timestamp":
        options.noTimestamp = true;
        break;
    }
  }

  return { command, schemaFile, options };
};
