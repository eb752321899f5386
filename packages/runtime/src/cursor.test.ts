/**
 * Tests for the record cursor
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { CodedDispatch, IndexWidth, LayoutContext } from "@metalayout/layout";
import { RecordCursor } from "./cursor.js";

const layoutOf = (width: IndexWidth): LayoutContext => ({
  heapIndexWidth: () => width,
  tableIndexWidth: () => width,
  codedIndexWidth: () => width,
});

const typeDefOrRef: CodedDispatch = {
  scheme: "TypeDefOrRef",
  tagBits: 2,
  tables: [2, 1, 27],
  targets: [2, 28, 27],
  none: 28,
};

describe("RecordCursor", () => {
  it("should read little-endian integers in sequence", () => {
    const cursor = new RecordCursor(
      Uint8Array.from([0x34, 0x12, 0x78, 0x56, 0x34, 0x12, 0xff]),
      layoutOf(2)
    );

    expect(cursor.uint16()).to.equal(0x1234);
    expect(cursor.uint32()).to.equal(0x12345678);
    expect(cursor.uint8()).to.equal(0xff);
    expect(cursor.position).to.equal(7);
    expect(cursor.remaining).to.equal(0);
    expect(cursor.error).to.be.undefined;
  });

  it("should read indexes at the layout's width", () => {
    const bytes = Uint8Array.from([0x01, 0x00, 0x00, 0x00, 0x02, 0x00]);

    const wide = new RecordCursor(bytes, layoutOf(4));
    expect(wide.heap("string")).to.equal(1);
    expect(wide.position).to.equal(4);

    const narrow = new RecordCursor(bytes, layoutOf(2));
    expect(narrow.index("TypeDef")).to.equal(1);
    expect(narrow.index("TypeDef")).to.equal(0);
    expect(narrow.index("TypeDef")).to.equal(2);
  });

  it("should respect a view's offset into a larger buffer", () => {
    const buffer = Uint8Array.from([0xaa, 0xbb, 0x05, 0x00]);
    const cursor = new RecordCursor(buffer.subarray(2), layoutOf(2));
    expect(cursor.uint16()).to.equal(5);
  });

  it("should keep the first fault and stop advancing", () => {
    const cursor = new RecordCursor(Uint8Array.from([0x01]), layoutOf(2));

    expect(cursor.uint16()).to.equal(0);
    expect(cursor.error).to.deep.equal({
      kind: "eof",
      offset: 0,
      message: "Read of 2 bytes at offset 0 passes end of record data (1 bytes)",
    });
    expect(cursor.uint8()).to.equal(0);
    expect(cursor.position).to.equal(0);
  });

  describe("coded", () => {
    it("should split a coded index into table and row", () => {
      // row 10, tag 1
      const cursor = new RecordCursor(Uint8Array.from([0x29, 0x00]), layoutOf(2));
      expect(cursor.coded(typeDefOrRef)).to.deep.equal({ tableId: 1, row: 10 });
      expect(cursor.position).to.equal(2);
    });

    it("should decode a tag of an internal member without a fault", () => {
      // row 2, tag 1: TypeRef is internal, so targets[1] is none
      const cursor = new RecordCursor(Uint8Array.from([0x05, 0x00]), layoutOf(2));
      expect(cursor.coded(typeDefOrRef)).to.deep.equal({ tableId: 1, row: 2 });
      expect(cursor.error).to.be.undefined;
    });

    it("should fault on a tag past the end of the scheme", () => {
      const cursor = new RecordCursor(Uint8Array.from([0x07, 0x00]), layoutOf(2));

      expect(cursor.coded(typeDefOrRef)).to.deep.equal({ tableId: 28, row: 0 });
      expect(cursor.error).to.deep.equal({
        kind: "invalidCodedTag",
        offset: 0,
        message: "Tag 3 is not a table of code scheme 'TypeDefOrRef'",
      });
      expect(cursor.position).to.equal(0);
    });

    it("should fault on an unused tag slot", () => {
      const cursor = new RecordCursor(Uint8Array.from([0x05, 0x00]), layoutOf(2));
      cursor.coded({ scheme: "Sparse", tagBits: 2, tables: [2, 28], targets: [2, 28], none: 28 });
      expect(cursor.error?.kind).to.equal("invalidCodedTag");
    });
  });
});
