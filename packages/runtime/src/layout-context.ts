/**
 * Layout context from container sizes
 *
 * An index is 2 bytes wide unless the data it addresses does not fit:
 * heaps of 2^16 bytes or more, tables of 2^16 rows or more, and coded
 * indexes whose largest table has too many rows to share 16 bits with the
 * tag.
 */

import type { CodeSchemes, HeapKind } from "@metalayout/frontend";
import type { IndexWidth, LayoutContext } from "@metalayout/layout";

const SMALL_LIMIT = 1 << 16;

export type HeapSizes = Readonly<Record<HeapKind, number>>;

export type LayoutSizes = {
  readonly heapSizes: HeapSizes;
  /** Row count per table name; absent tables have no rows */
  readonly rowCounts: ReadonlyMap<string, number>;
};

const widthFor = (count: number, limit: number): IndexWidth =>
  count >= limit ? 4 : 2;

/**
 * Heap sizes selecting the widths encoded in a HeapSizes byte:
 * 0x01 wide string heap, 0x02 wide GUID heap, 0x04 wide blob heap.
 */
export const heapSizesFromFlags = (flags: number): HeapSizes => ({
  string: flags & 0x01 ? SMALL_LIMIT : 0,
  guid: flags & 0x02 ? SMALL_LIMIT : 0,
  blob: flags & 0x04 ? SMALL_LIMIT : 0,
});

export const createLayoutContext = (
  sizes: LayoutSizes,
  schemes: CodeSchemes
): LayoutContext => {
  const rows = (table: string): number => sizes.rowCounts.get(table) ?? 0;

  const codedWidths = new Map<string, IndexWidth>();
  for (const [name, scheme] of schemes) {
    const largest = Math.max(
      0,
      ...scheme.tables.map((table) => (table === null ? 0 : rows(table)))
    );
    codedWidths.set(name, widthFor(largest, 1 << (16 - scheme.tagBits)));
  }

  return {
    heapIndexWidth: (heap) => widthFor(sizes.heapSizes[heap], SMALL_LIMIT),
    tableIndexWidth: (table) => widthFor(rows(table), SMALL_LIMIT),
    codedIndexWidth: (scheme) => {
      const width = codedWidths.get(scheme);
      if (width === undefined) {
        throw new RangeError(`Unknown code scheme '${scheme}'`);
      }
      return width;
    },
  };
};
