/**
 * Tests for the describe command output
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createCodeSchemes } from "@metalayout/frontend";
import { generateArtifacts } from "@metalayout/layout";
import { describeArtifacts } from "./describe.js";

describe("describeArtifacts", () => {
  it("should list ids, widths and dispatch", () => {
    const result = generateArtifacts({
      schema: {
        tables: [
          {
            name: "TypeDef",
            code: 2,
            visible: true,
            fields: [
              { kind: "fixedInt", name: "flags", sizeBytes: 4 },
              { kind: "codedRef", name: "extends", scheme: "TypeDefOrRef" },
            ],
          },
          {
            name: "TypeRef",
            code: 1,
            visible: false,
            fields: [{ kind: "heapIndex", name: "name", heap: "string" }],
          },
          {
            name: "Module",
            code: 0,
            visible: true,
            fields: [{ kind: "fixedInt", name: "generation", sizeBytes: 2 }],
          },
        ],
      },
      schemes: createCodeSchemes([
        { name: "TypeDefOrRef", tagBits: 2, tables: ["TypeDef", "TypeRef", null] },
      ]),
    });
    if (!result.ok) return expect.fail("generation failed");

    expect(describeArtifacts(result.value.artifacts)).to.deep.equal([
      "Tables: 3 (TABLE_COUNT 3, TABLE_NONE 3)",
      "  0 Module: 2 = 2",
      "  1 TypeRef (internal): heap(string)",
      "  2 TypeDef: 4 + coded(TypeDefOrRef)",
      "Code schemes:",
      "  TypeDefOrRef (2 tag bits): 0=TypeDef, 1=none, 2=none",
    ]);
  });
});
