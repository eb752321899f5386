/**
 * Decode plan builder
 */

import type {
  CodeSchemes,
  Diagnostic,
  Result,
  Schema,
} from "@metalayout/frontend";
import { resolveTableFields } from "./fields.js";
import type { Catalog, DecodePlan } from "./types.js";

/**
 * One plan per table. Steps follow field order exactly; each step reads the
 * width its field contributes to the table's width formula.
 */
export const buildDecodePlans = (
  schema: Schema,
  catalog: Catalog,
  schemes: CodeSchemes
): Result<ReadonlyMap<string, DecodePlan>, readonly Diagnostic[]> => {
  const plans = new Map<string, DecodePlan>();
  const diagnostics: Diagnostic[] = [];

  for (const table of schema.tables) {
    const steps = resolveTableFields(table, catalog, schemes);
    if (!steps.ok) {
      diagnostics.push(...steps.error);
      continue;
    }
    plans.set(table.name, {
      table: table.name,
      tableId: table.code,
      steps: steps.value,
    });
  }

  return diagnostics.length > 0
    ? { ok: false, error: diagnostics }
    : { ok: true, value: plans };
};
