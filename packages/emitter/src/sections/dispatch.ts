/**
 * Coded index dispatch tables
 */

import type { Catalog, CodedDispatch } from "@metalayout/layout";
import { TABLE_NONE_CONST, dispatchName } from "../constants.js";
import { type EmitterContext, indent, line } from "../types.js";
import { emitTableId } from "./table-ids.js";

const emitIds = (catalog: Catalog, ids: readonly number[]): string =>
  `[${ids.map((id) => emitTableId(catalog, id)).join(", ")}]`;

export const emitDispatch = (
  dispatch: CodedDispatch,
  catalog: Catalog,
  context: EmitterContext
): string => {
  const body = indent(context);
  return [
    line(context, `export const ${dispatchName(dispatch.scheme)}: CodedDispatch = {`),
    line(body, `scheme: ${JSON.stringify(dispatch.scheme)},`),
    line(body, `tagBits: ${dispatch.tagBits},`),
    line(body, `tables: ${emitIds(catalog, dispatch.tables)},`),
    line(body, `targets: ${emitIds(catalog, dispatch.targets)},`),
    line(body, `none: ${TABLE_NONE_CONST},`),
    line(context, "};"),
  ].join("\n");
};

export const emitDispatchTables = (
  dispatch: readonly CodedDispatch[],
  catalog: Catalog,
  context: EmitterContext
): string =>
  dispatch.map((scheme) => emitDispatch(scheme, catalog, context)).join("\n\n");
