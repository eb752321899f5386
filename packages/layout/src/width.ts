/**
 * Width formula builder
 *
 * Record widths are not fixed at generation time: heap, table and coded
 * indexes are 2 or 4 bytes depending on the container being decoded. The
 * builder therefore produces formulas, which are evaluated once a layout
 * context is known.
 */

import type {
  CodeSchemes,
  Diagnostic,
  Result,
  Schema,
} from "@metalayout/frontend";
import { resolveTableFields } from "./fields.js";
import type {
  Catalog,
  LayoutContext,
  WidthFormula,
  WidthTerm,
} from "./types.js";

export const buildWidthFormulas = (
  schema: Schema,
  catalog: Catalog,
  schemes: CodeSchemes
): Result<ReadonlyMap<string, WidthFormula>, readonly Diagnostic[]> => {
  const formulas = new Map<string, WidthFormula>();
  const diagnostics: Diagnostic[] = [];

  for (const table of schema.tables) {
    const steps = resolveTableFields(table, catalog, schemes);
    if (!steps.ok) {
      diagnostics.push(...steps.error);
      continue;
    }
    formulas.set(table.name, {
      table: table.name,
      terms: steps.value.map((step) => step.width),
    });
  }

  return diagnostics.length > 0
    ? { ok: false, error: diagnostics }
    : { ok: true, value: formulas };
};

export const evaluateTerm = (term: WidthTerm, layout: LayoutContext): number => {
  switch (term.kind) {
    case "constant":
      return term.bytes;
    case "heap":
      return layout.heapIndexWidth(term.heap);
    case "table":
      return layout.tableIndexWidth(term.table);
    case "coded":
      return layout.codedIndexWidth(term.scheme);
  }
};

/**
 * Byte width of one record of the formula's table.
 */
export const evaluateWidth = (
  formula: WidthFormula,
  layout: LayoutContext
): number =>
  formula.terms.reduce((total, term) => total + evaluateTerm(term, layout), 0);

/**
 * Width of a formula made only of constants, or undefined when it depends on
 * the layout.
 */
export const constantWidth = (formula: WidthFormula): number | undefined => {
  let total = 0;
  for (const term of formula.terms) {
    if (term.kind !== "constant") {
      return undefined;
    }
    total += term.bytes;
  }
  return total;
};

export const describeTerm = (term: WidthTerm): string => {
  switch (term.kind) {
    case "constant":
      return String(term.bytes);
    case "heap":
      return `heap(${term.heap})`;
    case "table":
      return `index(${term.table})`;
    case "coded":
      return `coded(${term.scheme})`;
  }
};

/**
 * Human-readable formula, e.g. `2 + heap(string) + index(Field)`.
 */
export const describeFormula = (formula: WidthFormula): string =>
  formula.terms.map(describeTerm).join(" + ");
