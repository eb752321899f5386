/**
 * Registry builder: initialization order of the visible table accessors
 */

import type { Catalog, RegistryEntry } from "./types.js";

export const buildRegistry = (catalog: Catalog): readonly RegistryEntry[] =>
  catalog.entries
    .filter((entry) => entry.visible)
    .map((entry) => ({ table: entry.name, tableId: entry.id }));
