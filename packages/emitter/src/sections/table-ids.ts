/**
 * Table id constants
 */

import type { Catalog } from "@metalayout/layout";
import {
  TABLE_CONST,
  TABLE_COUNT_CONST,
  TABLE_NONE_CONST,
  tableRef,
} from "../constants.js";
import { type EmitterContext, indent, line } from "../types.js";

export const emitTableIds = (
  catalog: Catalog,
  context: EmitterContext
): string => {
  const body = indent(context);
  return [
    line(context, `export const ${TABLE_CONST} = {`),
    ...catalog.entries.map((entry) => line(body, `${entry.name}: ${entry.id},`)),
    line(context, "} as const;"),
    "",
    line(
      context,
      `export type ${TABLE_CONST} = (typeof ${TABLE_CONST})[keyof typeof ${TABLE_CONST}];`
    ),
    "",
    line(context, `export const ${TABLE_COUNT_CONST} = ${catalog.tableCount};`),
    line(context, `export const ${TABLE_NONE_CONST} = ${TABLE_COUNT_CONST};`),
  ].join("\n");
};

/**
 * Source text for a table id: the table's constant, or TABLE_NONE for the
 * sentinel.
 */
export const emitTableId = (catalog: Catalog, id: number): string => {
  const entry = catalog.byId.get(id);
  return entry ? tableRef(entry.name) : TABLE_NONE_CONST;
};
