/**
 * The tableWidth function
 */

import type { WidthFormula, WidthTerm } from "@metalayout/layout";
import { TABLE_CONST, tableRef } from "../constants.js";
import { type EmitterContext, indent, line } from "../types.js";

const emitTerm = (term: WidthTerm): string => {
  switch (term.kind) {
    case "constant":
      return String(term.bytes);
    case "heap":
      return `layout.heapIndexWidth(${JSON.stringify(term.heap)})`;
    case "table":
      return `layout.tableIndexWidth(${JSON.stringify(term.table)})`;
    case "coded":
      return `layout.codedIndexWidth(${JSON.stringify(term.scheme)})`;
  }
};

export const emitWidthExpression = (formula: WidthFormula): string =>
  formula.terms.map(emitTerm).join(" + ");

export const emitTableWidth = (
  formulas: readonly WidthFormula[],
  context: EmitterContext
): string => {
  const inSwitch = indent(context);
  const inCase = indent(inSwitch);
  const inBody = indent(inCase);

  return [
    line(
      context,
      `export const tableWidth = (table: ${TABLE_CONST}, layout: LayoutContext): number => {`
    ),
    line(inSwitch, "switch (table) {"),
    ...formulas.flatMap((formula) => [
      line(inCase, `case ${tableRef(formula.table)}:`),
      line(inBody, `return ${emitWidthExpression(formula)};`),
    ]),
    line(inCase, "default:"),
    line(
      inBody,
      "throw new RangeError(`Table ${String(table)} has no record layout`);"
    ),
    line(inSwitch, "}"),
    line(context, "};"),
  ].join("\n");
};
