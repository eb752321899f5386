/**
 * Catalog builder: table ids, table count and the "none" sentinel
 */

import {
  type Diagnostic,
  type Result,
  type Schema,
  type TableDefinition,
  MAX_TABLE_CODE,
  createDiagnostic,
} from "@metalayout/frontend";
import type { Catalog, CatalogEntry } from "./types.js";

const isValidCode = (code: number): boolean =>
  Number.isInteger(code) && code >= 0 && code <= MAX_TABLE_CODE;

export const buildCatalog = (
  schema: Schema
): Result<Catalog, readonly Diagnostic[]> => {
  if (schema.tables.length === 0) {
    return {
      ok: false,
      error: [createDiagnostic("MLG1003", "Schema declares no tables")],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const byCode = new Map<number, TableDefinition[]>();

  for (const table of schema.tables) {
    if (!isValidCode(table.code)) {
      diagnostics.push(
        createDiagnostic(
          "MLG1002",
          `Table '${table.name}' has code ${table.code}, expected an integer from 0 to ${MAX_TABLE_CODE}`,
          { location: table.location, subjects: [table.name] }
        )
      );
      continue;
    }
    const group = byCode.get(table.code) ?? [];
    group.push(table);
    byCode.set(table.code, group);
  }

  for (const [code, group] of byCode) {
    if (group.length > 1) {
      const names = group.map((t) => t.name);
      diagnostics.push(
        createDiagnostic(
          "MLG1001",
          `Tables ${names.map((n) => `'${n}'`).join(", ")} share code ${code}`,
          { location: group[1]?.location, subjects: names }
        )
      );
    }
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  const entries: CatalogEntry[] = schema.tables
    .map((table) => ({
      name: table.name,
      id: table.code,
      visible: table.visible,
    }))
    .sort((a, b) => a.id - b.id);

  const last = entries[entries.length - 1];
  const tableCount = (last?.id ?? -1) + 1;

  return {
    ok: true,
    value: {
      entries,
      tableCount,
      none: tableCount,
      byName: new Map(entries.map((entry) => [entry.name, entry])),
      byId: new Map(entries.map((entry) => [entry.id, entry])),
    },
  };
};
