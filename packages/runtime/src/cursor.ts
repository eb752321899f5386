/**
 * Sequential little-endian record cursor
 *
 * The first failed read is kept as the cursor's error. Later reads return 0
 * without advancing, so a decoder can run every step and check the error
 * once.
 */

import type { FixedIntSize, HeapKind } from "@metalayout/frontend";
import type { CodedDispatch, LayoutContext } from "@metalayout/layout";

export type CursorFault = {
  readonly kind: "eof" | "invalidCodedTag";
  readonly offset: number;
  readonly message: string;
};

/**
 * A decoded coded index: the table the tag selected and the row within it.
 */
export type CodedIndex = {
  readonly tableId: number;
  readonly row: number;
};

/**
 * Reads generated decoders depend on.
 */
export interface RecordReader {
  readonly error: CursorFault | undefined;
  uint8(): number;
  uint16(): number;
  uint32(): number;
  heap(heap: HeapKind): number;
  index(table: string): number;
  coded(dispatch: CodedDispatch): CodedIndex;
}

export class RecordCursor implements RecordReader {
  private readonly view: DataView;
  private offset: number;
  private fault: CursorFault | undefined;

  constructor(
    bytes: Uint8Array,
    readonly layout: LayoutContext,
    start = 0
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = start;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return Math.max(0, this.view.byteLength - this.offset);
  }

  get error(): CursorFault | undefined {
    return this.fault;
  }

  private fail(kind: CursorFault["kind"], message: string): number {
    this.fault ??= { kind, offset: this.offset, message };
    return 0;
  }

  /**
   * Read an unsigned little-endian integer of 1, 2 or 4 bytes.
   */
  uint(size: FixedIntSize): number {
    if (this.fault) {
      return 0;
    }
    if (this.offset + size > this.view.byteLength) {
      return this.fail(
        "eof",
        `Read of ${size} bytes at offset ${this.offset} passes end of record data (${this.view.byteLength} bytes)`
      );
    }

    const at = this.offset;
    this.offset += size;
    switch (size) {
      case 1:
        return this.view.getUint8(at);
      case 2:
        return this.view.getUint16(at, true);
      case 4:
        return this.view.getUint32(at, true);
    }
  }

  uint8(): number {
    return this.uint(1);
  }

  uint16(): number {
    return this.uint(2);
  }

  uint32(): number {
    return this.uint(4);
  }

  heap(heap: HeapKind): number {
    return this.uint(this.layout.heapIndexWidth(heap));
  }

  index(table: string): number {
    return this.uint(this.layout.tableIndexWidth(table));
  }

  /**
   * Read a coded index and split it into table and row. A tag that selects
   * no table of the scheme is a fault.
   */
  coded(dispatch: CodedDispatch): CodedIndex {
    const start = this.offset;
    const value = this.uint(this.layout.codedIndexWidth(dispatch.scheme));
    if (this.fault) {
      return { tableId: dispatch.none, row: 0 };
    }

    const tag = value & ((1 << dispatch.tagBits) - 1);
    const tableId = dispatch.tables[tag];
    if (tableId === undefined || tableId === dispatch.none) {
      this.offset = start;
      this.fail(
        "invalidCodedTag",
        `Tag ${tag} is not a table of code scheme '${dispatch.scheme}'`
      );
      return { tableId: dispatch.none, row: 0 };
    }

    return { tableId, row: value >>> dispatch.tagBits };
  }
}
