/**
 * Tests for the registry builder
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { TableDefinition } from "@metalayout/frontend";
import { buildCatalog } from "./catalog.js";
import { buildRegistry } from "./registry.js";

const table = (name: string, code: number, visible: boolean): TableDefinition => ({
  name,
  code,
  visible,
  fields: [{ kind: "fixedInt", name: "value", sizeBytes: 2 }],
});

describe("Registry Builder", () => {
  it("should list visible tables in ascending id order", () => {
    const catalog = buildCatalog({
      tables: [
        table("Param", 8, true),
        table("ParamPtr", 7, false),
        table("Module", 0, true),
      ],
    });
    if (!catalog.ok) return expect.fail("catalog failed");

    expect(buildRegistry(catalog.value)).to.deep.equal([
      { table: "Module", tableId: 0 },
      { table: "Param", tableId: 8 },
    ]);
  });

  it("should be empty when every table is internal", () => {
    const catalog = buildCatalog({ tables: [table("FieldPtr", 3, false)] });
    if (!catalog.ok) return expect.fail("catalog failed");

    expect(buildRegistry(catalog.value)).to.deep.equal([]);
  });
});
