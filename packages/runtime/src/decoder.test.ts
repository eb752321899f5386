/**
 * Tests for the plan interpreter
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  type CodeScheme,
  type TableDefinition,
  createCodeSchemes,
} from "@metalayout/frontend";
import {
  type CodedDispatch,
  type LayoutArtifacts,
  evaluateWidth,
  generateArtifacts,
} from "@metalayout/layout";
import { RecordCursor } from "./cursor.js";
import { decodeRecord, isCodedIndex } from "./decoder.js";
import { createLayoutContext, heapSizesFromFlags } from "./layout-context.js";

const tables: readonly TableDefinition[] = [
  {
    name: "A",
    code: 0,
    visible: true,
    fields: [
      { kind: "fixedInt", name: "x", sizeBytes: 2 },
      { kind: "tableRef", name: "b", target: "B" },
    ],
  },
  {
    name: "B",
    code: 1,
    visible: true,
    fields: [{ kind: "fixedInt", name: "y", sizeBytes: 4 }],
  },
  {
    name: "C",
    code: 2,
    visible: true,
    fields: [
      { kind: "codedRef", name: "owner", scheme: "Owner" },
      { kind: "heapIndex", name: "name", heap: "string" },
    ],
  },
];

const schemes: readonly CodeScheme[] = [
  { name: "Owner", tagBits: 1, tables: ["A", "B"] },
];

const artifacts = ((): LayoutArtifacts => {
  const result = generateArtifacts({
    schema: { tables },
    schemes: createCodeSchemes(schemes),
  });
  if (!result.ok) {
    throw new Error("generation failed");
  }
  return result.value.artifacts;
})();

const layoutWith = (rowCounts: ReadonlyMap<string, number>) =>
  createLayoutContext(
    { heapSizes: heapSizesFromFlags(0), rowCounts },
    artifacts.schemes
  );

const planFor = (table: string) => {
  const plan = artifacts.plans.get(table);
  if (!plan) {
    throw new Error(`no plan for ${table}`);
  }
  return plan;
};

const widthFor = (table: string, rowCounts: ReadonlyMap<string, number>) => {
  const formula = artifacts.widths.get(table);
  if (!formula) {
    throw new Error(`no formula for ${table}`);
  }
  return evaluateWidth(formula, layoutWith(rowCounts));
};

describe("decodeRecord", () => {
  it("should decode a record that references another table", () => {
    const rowCounts = new Map([["B", 10]]);
    const cursor = new RecordCursor(
      Uint8Array.from([0x02, 0x01, 0x05, 0x00]),
      layoutWith(rowCounts)
    );

    const result = decodeRecord(planFor("A"), cursor, artifacts.dispatch);

    expect(result).to.deep.equal({ ok: true, value: { x: 0x0102, b: 5 } });
    expect(cursor.position).to.equal(widthFor("A", rowCounts));
    expect(cursor.position).to.equal(4);
  });

  it("should follow the referenced row into the other table", () => {
    const rowCounts = new Map([["B", 10]]);
    const layout = layoutWith(rowCounts);
    const a = decodeRecord(
      planFor("A"),
      new RecordCursor(Uint8Array.from([0x00, 0x00, 0x01, 0x00]), layout),
      artifacts.dispatch
    );
    if (!a.ok) return expect.fail("A failed to decode");

    // Row indexes are 1-based; row 1 is the first record of B
    const bRows = Uint8Array.from([0x78, 0x56, 0x34, 0x12]);
    const width = widthFor("B", rowCounts);
    const row = Number(a.value.b) - 1;
    const b = decodeRecord(
      planFor("B"),
      new RecordCursor(bRows.subarray(row * width, (row + 1) * width), layout),
      artifacts.dispatch
    );

    expect(b).to.deep.equal({ ok: true, value: { y: 0x12345678 } });
  });

  it("should advance by the evaluated width when indexes are wide", () => {
    const rowCounts = new Map([["B", 70000]]);
    const cursor = new RecordCursor(
      Uint8Array.from([0x02, 0x01, 0x05, 0x00, 0x01, 0x00]),
      layoutWith(rowCounts)
    );

    const result = decodeRecord(planFor("A"), cursor, artifacts.dispatch);

    expect(result).to.deep.equal({ ok: true, value: { x: 0x0102, b: 0x10005 } });
    expect(cursor.position).to.equal(6);
    expect(widthFor("A", rowCounts)).to.equal(6);
  });

  it("should decode coded indexes into table and row", () => {
    // row 3 of table B (tag 1), then string index 9
    const cursor = new RecordCursor(
      Uint8Array.from([0x07, 0x00, 0x09, 0x00]),
      layoutWith(new Map<string, number>())
    );

    const result = decodeRecord(planFor("C"), cursor, artifacts.dispatch);

    expect(result.ok).to.be.true;
    if (!result.ok) return;
    const owner = result.value.owner;
    expect(owner !== undefined && isCodedIndex(owner)).to.be.true;
    expect(owner).to.deep.equal({ tableId: 1, row: 3 });
    expect(result.value.name).to.equal(9);
  });

  it("should return no record when the data runs out", () => {
    const cursor = new RecordCursor(
      Uint8Array.from([0x02, 0x01, 0x05]),
      layoutWith(new Map<string, number>())
    );

    const result = decodeRecord(planFor("A"), cursor, artifacts.dispatch);

    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error.kind).to.equal("eof");
      expect(result.error.offset).to.equal(2);
    }
  });

  it("should throw when the dispatch for a coded field is missing", () => {
    const cursor = new RecordCursor(
      Uint8Array.from([0x07, 0x00, 0x09, 0x00]),
      layoutWith(new Map<string, number>())
    );
    expect(() => decodeRecord(planFor("C"), cursor, new Map<string, CodedDispatch>())).to.throw(
      RangeError,
      "No dispatch for code scheme 'Owner' in field 'owner'"
    );
  });
});
