/**
 * Table registry: one accessor per visible table, looked up by id
 */

import type { LayoutArtifacts, RegistryEntry } from "@metalayout/layout";
import type { CodedIndex } from "./cursor.js";

export type TableRegistry<T> = {
  /** Accessor for a table id, undefined for internal or unknown ids */
  readonly get: (tableId: number) => T | undefined;
  readonly byName: (table: string) => T | undefined;
  /** Accessors in ascending id order */
  readonly all: () => readonly T[];
  /** Accessor a coded index points into, undefined when it is no visible table */
  readonly codedTable: (coded: CodedIndex) => T | undefined;
};

export const createTableRegistry = <T>(
  artifacts: LayoutArtifacts,
  create: (entry: RegistryEntry) => T
): TableRegistry<T> => {
  const slots: (T | undefined)[] = new Array<T | undefined>(
    artifacts.catalog.tableCount
  ).fill(undefined);
  const names = new Map<string, T>();
  const ordered: T[] = [];

  for (const entry of artifacts.registry) {
    const accessor = create(entry);
    slots[entry.tableId] = accessor;
    names.set(entry.table, accessor);
    ordered.push(accessor);
  }

  const get = (tableId: number): T | undefined =>
    Number.isInteger(tableId) ? slots[tableId] : undefined;

  return {
    get,
    byName: (table) => names.get(table),
    all: () => ordered,
    codedTable: (coded) => get(coded.tableId),
  };
};
