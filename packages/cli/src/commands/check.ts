/**
 * metalayout check command - validate without writing
 */

import type { CommandError, ResolvedConfig, Result } from "../types.js";
import { runPipeline } from "./pipeline.js";

export const checkCommand = (
  config: ResolvedConfig
): Result<void, CommandError> => {
  const generation = runPipeline(config);
  if (!generation.ok) {
    return generation;
  }

  if (!config.quiet) {
    const { catalog, dispatch } = generation.value.artifacts;
    console.log(
      `✓ Schema OK: ${catalog.entries.length} tables, ${dispatch.size} code schemes`
    );
  }
  return { ok: true, value: undefined };
};
