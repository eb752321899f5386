/**
 * Type definitions for CLI
 */

export type { Result } from "@metalayout/frontend";

/**
 * Configuration file (metalayout.json)
 */
export type MetalayoutConfig = {
  readonly $schema?: string;
  /** Schema document (.json) or annotated declarations (.ts) */
  readonly schema: string;
  readonly output?: string;
  readonly runtimeModule?: string;
  readonly flagsModule?: string;
  readonly includeTimestamp?: boolean;
  readonly indent?: number;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  runtimeModule?: string;
  flagsModule?: string;
  noTimestamp?: boolean;
};

/**
 * Resolved configuration with all defaults applied and paths made absolute
 */
export type ResolvedConfig = {
  readonly projectRoot: string;
  readonly schemaPath: string;
  readonly outputPath: string;
  readonly runtimeModule: string;
  readonly flagsModule: string | undefined;
  readonly includeTimestamp: boolean;
  readonly indent: number;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Stage a command failed in; the dispatcher maps it to an exit code.
 */
export type CommandStage = "load" | "generate" | "write";

export type CommandError = {
  readonly stage: CommandStage;
  readonly message: string;
};
