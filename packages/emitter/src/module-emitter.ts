/**
 * Layout module emission
 *
 * Renders derived artifacts as one TypeScript module. Every decision about
 * ids, widths, dispatch and registration has already been made by the layout
 * builders; this module only prints them.
 */

import type {
  DecodePlan,
  LayoutArtifacts,
  WidthFormula,
} from "@metalayout/layout";
import { generateFileHeader } from "./constants.js";
import { defaultOptions } from "./options.js";
import { emitDecoders } from "./sections/decoders.js";
import { emitDispatchTables } from "./sections/dispatch.js";
import { emitImports } from "./sections/imports.js";
import { emitRecords } from "./sections/records.js";
import {
  dispatchedEntries,
  emitCodedTable,
  emitRegistry,
} from "./sections/registry.js";
import { emitTableIds } from "./sections/table-ids.js";
import { emitTableWidth } from "./sections/widths.js";
import { type EmitterOptions, createContext } from "./types.js";

const byCatalogOrder = <T>(
  artifacts: LayoutArtifacts,
  items: ReadonlyMap<string, T>
): readonly T[] =>
  artifacts.catalog.entries.flatMap((entry) => {
    const item = items.get(entry.name);
    return item === undefined ? [] : [item];
  });

export const emitLayoutModule = (
  artifacts: LayoutArtifacts,
  options: Partial<EmitterOptions> = {}
): string => {
  const finalOptions: EmitterOptions = { ...defaultOptions, ...options };
  const context = createContext(finalOptions);

  const plans: readonly DecodePlan[] = byCatalogOrder(artifacts, artifacts.plans);
  const formulas: readonly WidthFormula[] = byCatalogOrder(
    artifacts,
    artifacts.widths
  );
  const dispatch = [...artifacts.dispatch.values()];

  const sections = [
    emitImports(artifacts, context),
    emitTableIds(artifacts.catalog, context),
    emitRecords(plans, context),
    emitDispatchTables(dispatch, artifacts.catalog, context),
    emitTableWidth(formulas, context),
    emitDecoders(plans, context),
    emitRegistry(artifacts.registry, context),
    emitCodedTable(dispatchedEntries(artifacts.registry, dispatch), context),
  ].filter((section) => section.length > 0);

  const header = generateFileHeader(finalOptions.sourcePath, {
    includeTimestamp: finalOptions.includeTimestamp,
    timestamp: finalOptions.timestamp,
  });

  return `${header}\n${sections.join("\n\n")}\n`;
};
