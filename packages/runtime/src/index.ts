/**
 * metalayout runtime - decodes table records with derived artifacts
 */

export {
  type HeapSizes,
  type LayoutSizes,
  createLayoutContext,
  heapSizesFromFlags,
} from "./layout-context.js";
export {
  type CursorFault,
  type CodedIndex,
  type RecordReader,
  RecordCursor,
} from "./cursor.js";
export {
  type FieldValue,
  type DecodedRecord,
  decodeRecord,
  isCodedIndex,
} from "./decoder.js";
export { TableReader } from "./table-reader.js";
export { type TableRegistry, createTableRegistry } from "./registry.js";
export type { CodedDispatch, LayoutContext } from "@metalayout/layout";
