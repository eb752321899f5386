/**
 * Tests for the generation pipeline
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  type CodeScheme,
  type SchemaDocument,
  type TableDefinition,
  createCodeSchemes,
} from "@metalayout/frontend";
import { generateArtifacts } from "./generate.js";
import { constantWidth } from "./width.js";

const documentOf = (
  tables: readonly TableDefinition[],
  schemes: readonly CodeScheme[] = []
): SchemaDocument => ({
  schema: { tables },
  schemes: createCodeSchemes(schemes),
});

describe("generateArtifacts", () => {
  it("should derive every artifact for a single table", () => {
    const result = generateArtifacts(
      documentOf([
        {
          name: "T",
          code: 3,
          visible: true,
          fields: [{ kind: "fixedInt", name: "value", sizeBytes: 2 }],
        },
      ])
    );

    expect(result.ok).to.be.true;
    if (!result.ok) return;
    const { artifacts, warnings } = result.value;
    expect(artifacts.catalog.tableCount).to.equal(4);
    expect(artifacts.catalog.none).to.equal(4);
    const formula = artifacts.widths.get("T");
    if (!formula) return expect.fail("no formula for T");
    expect(constantWidth(formula)).to.equal(2);
    expect(artifacts.registry).to.deep.equal([{ table: "T", tableId: 3 }]);
    expect(artifacts.dispatch.size).to.equal(0);
    expect(warnings).to.deep.equal([]);
  });

  it("should resolve references between tables", () => {
    const result = generateArtifacts(
      documentOf([
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
      ])
    );

    expect(result.ok).to.be.true;
    if (!result.ok) return;
    const plan = result.value.artifacts.plans.get("A");
    expect(plan?.steps[1]).to.deep.include({ op: "index", table: "B", tableId: 1 });
    expect(result.value.artifacts.registry.map((e) => e.table)).to.deep.equal([
      "A",
      "B",
    ]);
  });

  it("should fail on duplicate codes, naming both tables", () => {
    const result = generateArtifacts(
      documentOf([
        {
          name: "First",
          code: 5,
          visible: true,
          fields: [{ kind: "fixedInt", name: "a", sizeBytes: 1 }],
        },
        {
          name: "Second",
          code: 5,
          visible: true,
          fields: [{ kind: "fixedInt", name: "b", sizeBytes: 1 }],
        },
      ])
    );

    expect(result.ok).to.be.false;
    if (result.ok) return;
    expect(result.error.hasErrors).to.be.true;
    const [duplicate] = result.error.diagnostics;
    expect(duplicate?.fault).to.equal("DuplicateCodeFault");
    expect(duplicate?.subjects).to.deep.equal(["First", "Second"]);
  });

  it("should merge validation and builder diagnostics, reporting each once", () => {
    const result = generateArtifacts(
      documentOf([
        {
          name: "class",
          code: 0,
          visible: true,
          fields: [{ kind: "tableRef", name: "parent", target: "Missing" }],
        },
      ])
    );

    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
        "MLG1006",
        "MLG2001",
      ]);
    }
  });

  it("should return warnings with a successful run", () => {
    const result = generateArtifacts(
      documentOf(
        [
          {
            name: "Method",
            code: 6,
            visible: true,
            fields: [{ kind: "codedRef", name: "owner", scheme: "Owner" }],
          },
          {
            name: "MethodPtr",
            code: 5,
            visible: false,
            fields: [{ kind: "tableRef", name: "method", target: "Method" }],
          },
        ],
        [{ name: "Owner", tagBits: 1, tables: ["MethodPtr", "Method"] }]
      )
    );

    expect(result.ok).to.be.true;
    if (!result.ok) return;
    expect(result.value.warnings.map((d) => d.code)).to.deep.equal(["MLG2005"]);
    expect(result.value.artifacts.dispatch.get("Owner")?.targets).to.deep.equal([
      7, 6,
    ]);
  });

  it("should keep warnings when the run fails", () => {
    const result = generateArtifacts(
      documentOf(
        [
          {
            name: "Hidden",
            code: 0,
            visible: false,
            fields: [{ kind: "codedRef", name: "owner", scheme: "Owner" }],
          },
        ],
        [{ name: "Owner", tagBits: 1, tables: ["Hidden", "Gone"] }]
      )
    );

    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
        "MLG2003",
        "MLG2005",
      ]);
    }
  });

  it("should fail when a scheme's tag bits are out of range", () => {
    const result = generateArtifacts(
      documentOf(
        [
          {
            name: "Owner",
            code: 0,
            visible: true,
            fields: [{ kind: "codedRef", name: "parent", scheme: "Parent" }],
          },
        ],
        [{ name: "Parent", tagBits: 17, tables: ["Owner"] }]
      )
    );

    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
        "MLG2004",
      ]);
    }
  });
});
