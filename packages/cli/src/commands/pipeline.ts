/**
 * Schema loading and artifact generation shared by all commands
 */

import {
  type Diagnostic,
  formatDiagnostic,
  isDiagnosticError,
  loadSchema,
} from "@metalayout/frontend";
import { type Generation, generateArtifacts } from "@metalayout/layout";
import type { CommandError, ResolvedConfig, Result } from "../types.js";

/**
 * Print diagnostics to stderr. Warnings are dropped under --quiet.
 */
export const reportDiagnostics = (
  diagnostics: readonly Diagnostic[],
  config: ResolvedConfig
): void => {
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === "warning" && config.quiet) {
      continue;
    }
    console.error(formatDiagnostic(diagnostic));
  }
};

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? "" : "s"}`;

export const runPipeline = (
  config: ResolvedConfig
): Result<Generation, CommandError> => {
  if (config.verbose) {
    console.log(`Loading schema: ${config.schemaPath}`);
  }

  const document = loadSchema(config.schemaPath);
  if (!document.ok) {
    reportDiagnostics(document.error, config);
    return {
      ok: false,
      error: {
        stage: "load",
        message: `Failed to load schema ${config.schemaPath}`,
      },
    };
  }

  if (config.verbose) {
    console.log(
      `  ${plural(document.value.schema.tables.length, "table")}, ${plural(document.value.schemes.size, "code scheme")}`
    );
  }

  const generation = generateArtifacts(document.value);
  if (!generation.ok) {
    reportDiagnostics(generation.error.diagnostics, config);
    const errors = generation.error.diagnostics.filter(isDiagnosticError);
    return {
      ok: false,
      error: {
        stage: "generate",
        message: `Generation failed with ${plural(errors.length, "error")}`,
      },
    };
  }

  reportDiagnostics(generation.value.warnings, config);
  return generation;
};
