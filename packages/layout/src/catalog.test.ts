/**
 * Tests for the catalog builder
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { TableDefinition } from "@metalayout/frontend";
import { buildCatalog } from "./catalog.js";

const table = (name: string, code: number, visible = true): TableDefinition => ({
  name,
  code,
  visible,
  fields: [{ kind: "fixedInt", name: "value", sizeBytes: 2 }],
});

describe("Catalog Builder", () => {
  it("should size the catalog by the highest code", () => {
    const result = buildCatalog({ tables: [table("T", 3)] });

    expect(result.ok).to.be.true;
    if (!result.ok) return;
    expect(result.value.tableCount).to.equal(4);
    expect(result.value.none).to.equal(4);
    expect(result.value.entries).to.deep.equal([
      { name: "T", id: 3, visible: true },
    ]);
  });

  it("should order entries by id, not declaration order", () => {
    const result = buildCatalog({
      tables: [table("TypeDef", 2), table("Module", 0), table("TypeRef", 1, false)],
    });

    expect(result.ok).to.be.true;
    if (!result.ok) return;
    expect(result.value.entries.map((e) => e.name)).to.deep.equal([
      "Module",
      "TypeRef",
      "TypeDef",
    ]);
    expect(result.value.byName.get("TypeRef")?.visible).to.be.false;
    expect(result.value.byId.get(2)?.name).to.equal("TypeDef");
  });

  it("should allow the sentinel to pass one byte", () => {
    const result = buildCatalog({ tables: [table("Last", 255)] });
    expect(result.ok).to.be.true;
    if (result.ok) {
      expect(result.value.none).to.equal(256);
    }
  });

  it("should fail when two tables share a code, naming both", () => {
    const result = buildCatalog({
      tables: [table("A", 5), table("B", 5), table("C", 6)],
    });

    expect(result.ok).to.be.false;
    if (result.ok) return;
    expect(result.error).to.have.length(1);
    expect(result.error[0]?.fault).to.equal("DuplicateCodeFault");
    expect(result.error[0]?.message).to.equal("Tables 'A', 'B' share code 5");
    expect(result.error[0]?.subjects).to.deep.equal(["A", "B"]);
  });

  it("should reject codes outside one byte", () => {
    const result = buildCatalog({ tables: [table("Big", 256), table("Neg", -1)] });

    expect(result.ok).to.be.false;
    if (result.ok) return;
    expect(result.error.map((d) => d.code)).to.deep.equal(["MLG1002", "MLG1002"]);
    expect(result.error[0]?.message).to.equal(
      "Table 'Big' has code 256, expected an integer from 0 to 255"
    );
  });

  it("should reject an empty schema", () => {
    const result = buildCatalog({ tables: [] });
    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error[0]?.code).to.equal("MLG1003");
    }
  });
});
