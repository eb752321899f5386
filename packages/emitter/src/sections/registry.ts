/**
 * Table registry type, its initializer and coded index lookup
 */

import type { CodedDispatch, RegistryEntry } from "@metalayout/layout";
import { TABLE_CONST, tableRef } from "../constants.js";
import { type EmitterContext, indent, line } from "../types.js";

export const emitRegistry = (
  registry: readonly RegistryEntry[],
  context: EmitterContext
): string => {
  const body = indent(context);
  return [
    line(context, "export type Tables<T> = {"),
    ...registry.map((entry) => line(body, `readonly ${entry.table}: T;`)),
    line(context, "};"),
    "",
    line(
      context,
      `export const initTables = <T>(create: (table: ${TABLE_CONST}) => T): Tables<T> => ({`
    ),
    ...registry.map((entry) =>
      line(body, `${entry.table}: create(${tableRef(entry.table)}),`)
    ),
    line(context, "});"),
  ].join("\n");
};

/**
 * Registry entries some scheme can dispatch to, ascending by id.
 */
export const dispatchedEntries = (
  registry: readonly RegistryEntry[],
  dispatch: readonly CodedDispatch[]
): readonly RegistryEntry[] => {
  const reachable = new Set(dispatch.flatMap((scheme) => scheme.targets));
  return registry.filter((entry) => reachable.has(entry.tableId));
};

export const emitCodedTable = (
  entries: readonly RegistryEntry[],
  context: EmitterContext
): string => {
  const inSwitch = indent(context);
  const inCase = indent(inSwitch);
  const inBody = indent(inCase);

  return [
    line(
      context,
      "export const codedTable = <T>(tables: Tables<T>, coded: CodedIndex): T | undefined => {"
    ),
    line(inSwitch, "switch (coded.tableId) {"),
    ...entries.flatMap((entry) => [
      line(inCase, `case ${tableRef(entry.table)}:`),
      line(inBody, `return tables.${entry.table};`),
    ]),
    line(inCase, "default:"),
    line(inBody, "return undefined;"),
    line(inSwitch, "}"),
    line(context, "};"),
  ].join("\n");
};
