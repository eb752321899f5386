/**
 * Artifact generation pipeline
 *
 * Validates the schema, builds the catalog, then runs the width, decode plan,
 * dispatch and registry builders over it. A run either yields the complete
 * artifact set or fails with every diagnostic found; nothing partial is
 * returned.
 */

import {
  type Diagnostic,
  type DiagnosticsCollector,
  type Result,
  type SchemaDocument,
  createDiagnosticsCollector,
  mergeDiagnostics,
  validateSchema,
} from "@metalayout/frontend";
import { buildCatalog } from "./catalog.js";
import { buildWidthFormulas } from "./width.js";
import { buildDecodePlans } from "./decode-plan.js";
import { buildCodedDispatch, findInternalSchemeMembers } from "./dispatch.js";
import { buildRegistry } from "./registry.js";
import type { LayoutArtifacts } from "./types.js";

export type Generation = {
  readonly artifacts: LayoutArtifacts;
  readonly warnings: readonly Diagnostic[];
};

const errorsOf = <T>(
  result: Result<T, readonly Diagnostic[]>
): DiagnosticsCollector =>
  createDiagnosticsCollector(result.ok ? [] : result.error);

export const generateArtifacts = (
  document: SchemaDocument
): Result<Generation, DiagnosticsCollector> => {
  const { schema, schemes } = document;
  const validation = validateSchema(document);

  const catalog = buildCatalog(schema);
  if (!catalog.ok) {
    return {
      ok: false,
      error: mergeDiagnostics(validation, errorsOf(catalog)),
    };
  }

  const widths = buildWidthFormulas(schema, catalog.value, schemes);
  const plans = buildDecodePlans(schema, catalog.value, schemes);
  const dispatch = buildCodedDispatch(catalog.value, schemes);
  const registry = buildRegistry(catalog.value);
  const warnings = findInternalSchemeMembers(catalog.value, schemes);

  const diagnostics = mergeDiagnostics(
    validation,
    errorsOf(widths),
    errorsOf(plans),
    errorsOf(dispatch)
  );

  if (diagnostics.hasErrors || !widths.ok || !plans.ok || !dispatch.ok) {
    return {
      ok: false,
      error: mergeDiagnostics(diagnostics, createDiagnosticsCollector(warnings)),
    };
  }

  return {
    ok: true,
    value: {
      artifacts: {
        catalog: catalog.value,
        widths: widths.value,
        plans: plans.value,
        dispatch: dispatch.value,
        registry,
        schemes,
      },
      warnings,
    },
  };
};
