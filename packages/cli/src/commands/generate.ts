/**
 * metalayout generate command - write the layout module
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, relative } from "node:path";
import { emitLayoutModule } from "@metalayout/emitter";
import type { CommandError, ResolvedConfig, Result } from "../types.js";
import { runPipeline } from "./pipeline.js";

export const generateCommand = (
  config: ResolvedConfig
): Result<void, CommandError> => {
  const generation = runPipeline(config);
  if (!generation.ok) {
    return generation;
  }

  const code = emitLayoutModule(generation.value.artifacts, {
    sourcePath: relative(config.projectRoot, config.schemaPath),
    runtimeModule: config.runtimeModule,
    flagsModule: config.flagsModule,
    indent: config.indent,
    includeTimestamp: config.includeTimestamp,
  });

  try {
    mkdirSync(dirname(config.outputPath), { recursive: true });
    writeFileSync(config.outputPath, code, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: {
        stage: "write",
        message: `Failed to write ${config.outputPath}: ${error instanceof Error ? error.message : String(error)}`,
      },
    };
  }

  if (!config.quiet) {
    console.log(
      `✓ Generated ${relative(config.projectRoot, config.outputPath)}`
    );
  }
  return { ok: true, value: undefined };
};
