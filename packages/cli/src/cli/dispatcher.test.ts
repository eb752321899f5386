/**
 * Tests for command dispatch and exit codes
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCli } from "./dispatcher.js";

const schema = {
  tables: [
    {
      name: "T",
      code: 3,
      fields: [{ name: "value", kind: "fixedInt", sizeBytes: 2 }],
    },
  ],
};

describe("runCli", () => {
  let tmpDir = "";
  let out: string[] = [];
  let err: string[] = [];
  const saved = { log: console.log, error: console.error };

  const write = (name: string, content: unknown): void => {
    const filePath = path.join(tmpDir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(content));
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "metalayout-cli-"));
    out = [];
    err = [];
    console.log = (...args: unknown[]) => {
      out.push(args.map(String).join(" "));
    };
    console.error = (...args: unknown[]) => {
      err.push(args.map(String).join(" "));
    };
  });

  afterEach(() => {
    console.log = saved.log;
    console.error = saved.error;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should print the version", async () => {
    expect(await runCli(["--version"], tmpDir)).to.equal(0);
    expect(out).to.deep.equal(["metalayout v0.3.0"]);
  });

  it("should reject unknown commands", async () => {
    expect(await runCli(["build"], tmpDir)).to.equal(2);
    expect(err[0]).to.equal("Error: Unknown command 'build'");
  });

  it("should exit 3 without a config or schema", async () => {
    expect(await runCli(["generate"], tmpDir)).to.equal(3);
  });

  it("should generate the module configured in metalayout.json", async () => {
    write("tables.json", schema);
    write("metalayout.json", { schema: "tables.json", output: "out/layout.ts" });

    const code = await runCli(["generate", "--no-timestamp", "-q"], tmpDir);

    expect(code).to.equal(0);
    const generated = fs.readFileSync(path.join(tmpDir, "out/layout.ts"), "utf-8");
    expect(generated.split("\n").slice(0, 2)).to.deep.equal([
      "// Generated from: tables.json",
      "// WARNING: Do not modify this file manually",
    ]);
    expect(generated).to.include("export const TABLE_COUNT = 4;");
    expect(out).to.deep.equal([]);
  });

  it("should report the generated file", async () => {
    write("tables.json", schema);
    write("metalayout.json", { schema: "tables.json" });

    expect(await runCli(["generate"], tmpDir)).to.equal(0);
    expect(out).to.deep.equal(["✓ Generated layout.generated.ts"]);
    expect(fs.existsSync(path.join(tmpDir, "layout.generated.ts"))).to.be.true;
  });

  it("should check a schema given on the command line", async () => {
    write("tables.json", schema);

    expect(await runCli(["check", "tables.json"], tmpDir)).to.equal(0);
    expect(out).to.deep.equal(["✓ Schema OK: 1 tables, 0 code schemes"]);
  });

  it("should describe a schema", async () => {
    write("tables.json", schema);

    expect(await runCli(["describe", "tables.json"], tmpDir)).to.equal(0);
    expect(out).to.deep.equal([
      "Tables: 1 (TABLE_COUNT 4, TABLE_NONE 4)",
      "  3 T: 2 = 2",
    ]);
  });

  it("should exit 4 when the schema cannot be loaded", async () => {
    expect(await runCli(["check", "missing.json"], tmpDir)).to.equal(4);
    expect(err[0]?.startsWith("error MLG9001: Schema file not found: ")).to.be.true;
  });

  it("should exit 5 and print diagnostics when generation fails", async () => {
    write("tables.json", {
      tables: [
        { name: "A", code: 5, fields: [{ name: "a", kind: "fixedInt", sizeBytes: 1 }] },
        { name: "B", code: 5, fields: [{ name: "b", kind: "fixedInt", sizeBytes: 1 }] },
      ],
    });

    expect(await runCli(["generate", "tables.json"], tmpDir)).to.equal(5);
    expect(err).to.deep.equal([
      "error MLG1001: Tables 'A', 'B' share code 5",
      "Error: Generation failed with 1 error",
    ]);
    expect(fs.existsSync(path.join(tmpDir, "layout.generated.ts"))).to.be.false;
  });

  it("should exit 6 when the output cannot be written", async () => {
    write("tables.json", schema);

    const code = await runCli(
      ["generate", "tables.json", "-o", "tables.json/layout.ts"],
      tmpDir
    );

    expect(code).to.equal(6);
    expect(err[0]?.startsWith("Error: Failed to write ")).to.be.true;
  });

  it("should exit 1 for an invalid config file", async () => {
    write("metalayout.json", { output: "x.ts" });

    expect(await runCli(["generate"], tmpDir)).to.equal(1);
    expect(err).to.deep.equal(["Error: metalayout.json: 'schema' is required"]);
  });
});
