/**
 * Table schema model
 *
 * A schema is an ordered list of table definitions. Field order inside a
 * table is the on-disk column order and the decode order; it must never be
 * rearranged once declared.
 */

import type { SourceLocation } from "./diagnostic.js";

export type HeapKind = "string" | "blob" | "guid";

export const HEAP_KINDS: readonly HeapKind[] = ["string", "blob", "guid"];

export type FixedIntSize = 1 | 2 | 4;

export const FIXED_INT_SIZES: readonly FixedIntSize[] = [1, 2, 4];

export const MAX_TABLE_CODE = 0xff;

export const MIN_TAG_BITS = 1;
export const MAX_TAG_BITS = 5;

export type FixedIntField = {
  readonly kind: "fixedInt";
  readonly name: string;
  readonly sizeBytes: FixedIntSize;
  readonly flagType?: string; // Named bit-flag type the value is read as
};

export type HeapIndexField = {
  readonly kind: "heapIndex";
  readonly name: string;
  readonly heap: HeapKind;
};

export type TableRefField = {
  readonly kind: "tableRef";
  readonly name: string;
  readonly target: string;
};

export type CodedRefField = {
  readonly kind: "codedRef";
  readonly name: string;
  readonly scheme: string;
};

/**
 * First row of a run in another table. The end of the run belongs to the
 * consumer; only the single index is read here.
 */
export type RowRangeField = {
  readonly kind: "rowRange";
  readonly name: string;
  readonly target: string;
};

export type FieldDefinition =
  | FixedIntField
  | HeapIndexField
  | TableRefField
  | CodedRefField
  | RowRangeField;

export type FieldKind = FieldDefinition["kind"];

export type TableDefinition = {
  readonly name: string;
  readonly code: number;
  readonly visible: boolean;
  readonly fields: readonly FieldDefinition[];
  readonly location?: SourceLocation;
};

export type Schema = {
  readonly tables: readonly TableDefinition[];
};

/**
 * A coded index scheme. `tables[tag]` is the table a reference with that tag
 * points into; `null` marks a tag slot the format leaves unused.
 */
export type CodeScheme = {
  readonly name: string;
  readonly tagBits: number;
  readonly tables: readonly (string | null)[];
  readonly location?: SourceLocation;
};

export type CodeSchemes = ReadonlyMap<string, CodeScheme>;

/**
 * Everything a schema source yields: the tables and the code schemes their
 * coded references name.
 */
export type SchemaDocument = {
  readonly schema: Schema;
  readonly schemes: CodeSchemes;
};

/**
 * Smallest tag width able to address every slot.
 */
export const tagBitsFor = (slots: number): number => {
  let bits = 1;
  while (1 << bits < slots) {
    bits++;
  }
  return bits;
};

export const createCodeSchemes = (
  schemes: readonly CodeScheme[]
): CodeSchemes => new Map(schemes.map((scheme) => [scheme.name, scheme]));

export const isFixedIntSize = (value: unknown): value is FixedIntSize =>
  FIXED_INT_SIZES.some((size) => size === value);

export const isHeapKind = (value: unknown): value is HeapKind =>
  HEAP_KINDS.some((heap) => heap === value);

export const isTagBits = (value: unknown): value is number =>
  typeof value === "number" &&
  Number.isInteger(value) &&
  value >= MIN_TAG_BITS &&
  value <= MAX_TAG_BITS;

/**
 * Name of a field's kind, for reporting fields whose kind is not one of the
 * known variants.
 */
export const describeKind = (field: unknown): string => {
  if (typeof field === "object" && field !== null && "kind" in field) {
    return String(field.kind);
  }
  return typeof field;
};
