/**
 * Derived layout artifacts
 */

import type {
  CodeSchemes,
  FixedIntSize,
  HeapKind,
} from "@metalayout/frontend";

/**
 * Canonical table id assignment. Ids are the schema's table codes.
 */
export type CatalogEntry = {
  readonly name: string;
  readonly id: number;
  readonly visible: boolean;
};

export type Catalog = {
  /** Ascending by id */
  readonly entries: readonly CatalogEntry[];
  /** Highest id + 1 */
  readonly tableCount: number;
  /** "No table" sentinel, equal to tableCount */
  readonly none: number;
  readonly byName: ReadonlyMap<string, CatalogEntry>;
  readonly byId: ReadonlyMap<number, CatalogEntry>;
};

/**
 * Index widths resolved for one container instance. Metadata indexes are
 * 2 bytes wide unless the data they address is too large, then 4.
 */
export type IndexWidth = 2 | 4;

export type LayoutContext = {
  readonly heapIndexWidth: (heap: HeapKind) => IndexWidth;
  readonly tableIndexWidth: (table: string) => IndexWidth;
  readonly codedIndexWidth: (scheme: string) => IndexWidth;
};

/**
 * Width of one column: a constant, or an index width looked up in the
 * layout context at decode time.
 */
export type WidthTerm =
  | { readonly kind: "constant"; readonly bytes: FixedIntSize }
  | { readonly kind: "heap"; readonly heap: HeapKind }
  | { readonly kind: "table"; readonly table: string }
  | { readonly kind: "coded"; readonly scheme: string };

/**
 * Record width as the sum of one term per field, in field order.
 */
export type WidthFormula = {
  readonly table: string;
  readonly terms: readonly WidthTerm[];
};

export type UintStep = {
  readonly op: "uint";
  readonly field: string;
  readonly sizeBytes: FixedIntSize;
  readonly flagType?: string;
  readonly width: WidthTerm;
};

export type HeapStep = {
  readonly op: "heap";
  readonly field: string;
  readonly heap: HeapKind;
  readonly width: WidthTerm;
};

export type IndexStep = {
  readonly op: "index";
  readonly field: string;
  readonly table: string;
  readonly tableId: number;
  readonly width: WidthTerm;
};

export type CodedStep = {
  readonly op: "coded";
  readonly field: string;
  readonly scheme: string;
  readonly width: WidthTerm;
};

export type RowRangeStep = {
  readonly op: "rowRange";
  readonly field: string;
  readonly table: string;
  readonly tableId: number;
  readonly width: WidthTerm;
};

export type DecodeStep =
  | UintStep
  | HeapStep
  | IndexStep
  | CodedStep
  | RowRangeStep;

export type DecodePlan = {
  readonly table: string;
  readonly tableId: number;
  readonly steps: readonly DecodeStep[];
};

/**
 * Coded index dispatch for one scheme.
 *
 * `tables[tag]` is the catalog id a tag decodes to (`none` for unused tags).
 * `targets[tag]` is the same id when the table is visible, otherwise `none`.
 */
export type CodedDispatch = {
  readonly scheme: string;
  readonly tagBits: number;
  readonly tables: readonly number[];
  readonly targets: readonly number[];
  readonly none: number;
};

export type RegistryEntry = {
  readonly table: string;
  readonly tableId: number;
};

export type LayoutArtifacts = {
  readonly catalog: Catalog;
  readonly widths: ReadonlyMap<string, WidthFormula>;
  readonly plans: ReadonlyMap<string, DecodePlan>;
  readonly dispatch: ReadonlyMap<string, CodedDispatch>;
  /** Visible tables, ascending by id */
  readonly registry: readonly RegistryEntry[];
  readonly schemes: CodeSchemes;
};
