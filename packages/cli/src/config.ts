/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import type {
  MetalayoutConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE = "metalayout.json";
export const DEFAULT_OUTPUT = "layout.generated.ts";
export const DEFAULT_RUNTIME_MODULE = "@metalayout/runtime";

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalOfType = (
  data: Record<string, unknown>,
  key: string,
  type: "string" | "boolean" | "number"
): boolean => data[key] === undefined || typeof data[key] === type;

/**
 * Check the parsed JSON of a config file and build the config from it
 */
export const parseConfig = (
  data: unknown
): Result<MetalayoutConfig, string> => {
  if (!isObject(data)) {
    return { ok: false, error: `${CONFIG_FILE}: expected an object` };
  }

  const { schema, output, runtimeModule, flagsModule, includeTimestamp, indent } =
    data;

  if (typeof schema !== "string" || schema === "") {
    return { ok: false, error: `${CONFIG_FILE}: 'schema' is required` };
  }

  for (const key of ["output", "runtimeModule", "flagsModule"]) {
    if (!optionalOfType(data, key, "string")) {
      return { ok: false, error: `${CONFIG_FILE}: '${key}' must be a string` };
    }
  }
  if (!optionalOfType(data, "includeTimestamp", "boolean")) {
    return {
      ok: false,
      error: `${CONFIG_FILE}: 'includeTimestamp' must be a boolean`,
    };
  }
  if (
    indent !== undefined &&
    (typeof indent !== "number" || !Number.isInteger(indent) || indent < 0)
  ) {
    return {
      ok: false,
      error: `${CONFIG_FILE}: 'indent' must be a non-negative integer`,
    };
  }

  return {
    ok: true,
    value: {
      schema,
      ...(typeof output === "string" ? { output } : {}),
      ...(typeof runtimeModule === "string" ? { runtimeModule } : {}),
      ...(typeof flagsModule === "string" ? { flagsModule } : {}),
      ...(typeof includeTimestamp === "boolean" ? { includeTimestamp } : {}),
      ...(typeof indent === "number" ? { indent } : {}),
    },
  };
};

/**
 * Load metalayout.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<MetalayoutConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return parseConfig(data);
};

/**
 * Find metalayout.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find metalayout.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI options. CLI options win;
 * relative paths resolve against the project root.
 */
export const resolveConfig = (
  config: MetalayoutConfig | undefined,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd(),
  schemaArg?: string
): Result<ResolvedConfig, string> => {
  const schema = schemaArg ?? config?.schema;
  if (schema === undefined) {
    return {
      ok: false,
      error: `No schema given; pass a schema file or set 'schema' in ${CONFIG_FILE}`,
    };
  }

  return {
    ok: true,
    value: {
      projectRoot,
      schemaPath: resolve(projectRoot, schema),
      outputPath: resolve(
        projectRoot,
        cliOptions.out ?? config?.output ?? DEFAULT_OUTPUT
      ),
      runtimeModule:
        cliOptions.runtimeModule ??
        config?.runtimeModule ??
        DEFAULT_RUNTIME_MODULE,
      flagsModule: cliOptions.flagsModule ?? config?.flagsModule,
      includeTimestamp: cliOptions.noTimestamp
        ? false
        : (config?.includeTimestamp ?? true),
      indent: config?.indent ?? 2,
      verbose: cliOptions.verbose ?? false,
      quiet: cliOptions.quiet ?? false,
    },
  };
};
