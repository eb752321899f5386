/**
 * Schema JSON loader - Reads and validates *.schema.json documents.
 *
 * Document shape:
 *
 *   {
 *     "tables": [
 *       { "name": "TypeDef", "code": 2, "visible": true,
 *         "fields": [{ "name": "flags", "kind": "fixedInt", "sizeBytes": 4 }] }
 *     ],
 *     "codeSchemes": [
 *       { "name": "TypeDefOrRef", "tagBits": 2,
 *         "tables": ["TypeDef", "TypeRef", "TypeSpec"] }
 *     ]
 *   }
 *
 * `visible` defaults to true and `tagBits` to the smallest width that
 * addresses every slot.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { type Result, combine } from "../types/result.js";
import {
  type Diagnostic,
  type DiagnosticCode,
  createDiagnostic,
} from "../types/diagnostic.js";
import {
  type CodeScheme,
  type FieldDefinition,
  type SchemaDocument,
  type TableDefinition,
  createCodeSchemes,
  isFixedIntSize,
  isHeapKind,
  isTagBits,
  MAX_TAG_BITS,
  MIN_TAG_BITS,
  tagBitsFor,
} from "../types/schema.js";
import { findDuplicateSchemes } from "../validation/schema.js";

type JsonObject = Readonly<Record<string, unknown>>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fail = <T>(
  code: DiagnosticCode,
  message: string
): Result<T, Diagnostic[]> => ({
  ok: false,
  error: [createDiagnostic(code, message)],
});

/**
 * Load and parse a schema document.
 *
 * @param filePath - Path to the .schema.json file
 */
export const loadSchemaFile = (
  filePath: string
): Result<SchemaDocument, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return fail("MLG9001", `Schema file not found: ${filePath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return fail("MLG9002", `Failed to read schema file: ${error}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return fail("MLG9003", `Invalid JSON in schema file: ${error}`);
  }

  return parseSchemaDocument(parsed, path.basename(filePath));
};

/**
 * Validate parsed JSON and convert it to a schema document.
 *
 * @param data - Parsed JSON data
 * @param fileName - File name for error messages
 */
export const parseSchemaDocument = (
  data: unknown,
  fileName: string
): Result<SchemaDocument, Diagnostic[]> => {
  if (!isObject(data)) {
    return fail(
      "MLG9004",
      `Schema file must be an object, got ${Array.isArray(data) ? "array" : typeof data}`
    );
  }

  if (!Array.isArray(data.tables)) {
    return fail(
      "MLG9005",
      `Missing or invalid 'tables' field in ${fileName}`
    );
  }

  const tables = combine(
    data.tables.map((entry: unknown, index: number) =>
      parseTable(entry, `table ${index} in ${fileName}`)
    )
  );

  const rawSchemes: unknown = data.codeSchemes ?? [];
  const schemes: Result<readonly CodeScheme[], readonly Diagnostic[]> =
    Array.isArray(rawSchemes)
      ? combine(
          rawSchemes.map((entry: unknown, index: number) =>
            parseScheme(entry, `code scheme ${index} in ${fileName}`)
          )
        )
      : fail<readonly CodeScheme[]>(
          "MLG9008",
          `'codeSchemes' must be an array in ${fileName}`
        );

  const diagnostics = [
    ...(tables.ok ? [] : tables.error),
    ...(schemes.ok ? findDuplicateSchemes(schemes.value) : schemes.error),
  ];

  if (!tables.ok || !schemes.ok || diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return {
    ok: true,
    value: {
      schema: { tables: tables.value },
      schemes: createCodeSchemes(schemes.value),
    },
  };
};

const parseTable = (
  data: unknown,
  context: string
): Result<TableDefinition, Diagnostic[]> => {
  if (!isObject(data)) {
    return fail("MLG9006", `Invalid ${context}: must be an object`);
  }

  const diagnostics: Diagnostic[] = [];
  const { name, code, visible, fields } = data;

  if (typeof name !== "string") {
    diagnostics.push(
      createDiagnostic("MLG9006", `Invalid ${context}: missing or invalid 'name'`)
    );
  }
  if (typeof code !== "number") {
    diagnostics.push(
      createDiagnostic("MLG9006", `Invalid ${context}: 'code' must be a number`)
    );
  }
  if (visible !== undefined && typeof visible !== "boolean") {
    diagnostics.push(
      createDiagnostic(
        "MLG9006",
        `Invalid ${context}: 'visible' must be a boolean`
      )
    );
  }
  if (!Array.isArray(fields)) {
    diagnostics.push(
      createDiagnostic("MLG9006", `Invalid ${context}: 'fields' must be an array`)
    );
  }

  if (
    typeof name !== "string" ||
    typeof code !== "number" ||
    !Array.isArray(fields) ||
    diagnostics.length > 0
  ) {
    return { ok: false, error: diagnostics };
  }

  const parsedFields: FieldDefinition[] = [];
  fields.forEach((entry: unknown, index: number) => {
    const field = parseField(entry, `field ${index} of table '${name}'`);
    if (field.ok) {
      parsedFields.push(field.value);
    } else {
      diagnostics.push(...field.error);
    }
  });

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return {
    ok: true,
    value: {
      name,
      code,
      visible: typeof visible === "boolean" ? visible : true,
      fields: parsedFields,
    },
  };
};

const stringProperty = (
  data: JsonObject,
  key: string,
  context: string
): Result<string, Diagnostic[]> => {
  const value = data[key];
  return typeof value === "string" && value.length > 0
    ? { ok: true, value }
    : fail("MLG9007", `Invalid ${context}: missing or invalid '${key}'`);
};

const parseField = (
  data: unknown,
  context: string
): Result<FieldDefinition, Diagnostic[]> => {
  if (!isObject(data)) {
    return fail("MLG9007", `Invalid ${context}: must be an object`);
  }

  const name = stringProperty(data, "name", context);
  if (!name.ok) {
    return name;
  }

  switch (data.kind) {
    case "fixedInt": {
      const { sizeBytes, flagType } = data;
      if (!isFixedIntSize(sizeBytes)) {
        return fail(
          "MLG3002",
          `Unsupported fixed integer size ${String(sizeBytes)} for ${context}`
        );
      }
      if (flagType !== undefined && typeof flagType !== "string") {
        return fail("MLG9007", `Invalid ${context}: 'flagType' must be a string`);
      }
      return {
        ok: true,
        value: {
          kind: "fixedInt",
          name: name.value,
          sizeBytes,
          ...(typeof flagType === "string" ? { flagType } : {}),
        },
      };
    }

    case "heapIndex": {
      const { heap } = data;
      if (!isHeapKind(heap)) {
        return fail(
          "MLG9007",
          `Invalid ${context}: 'heap' must be one of string, blob, guid`
        );
      }
      return { ok: true, value: { kind: "heapIndex", name: name.value, heap } };
    }

    case "tableRef": {
      const target = stringProperty(data, "target", context);
      if (!target.ok) {
        return target;
      }
      return {
        ok: true,
        value: { kind: "tableRef", name: name.value, target: target.value },
      };
    }

    case "rowRange": {
      const target = stringProperty(data, "target", context);
      if (!target.ok) {
        return target;
      }
      return {
        ok: true,
        value: { kind: "rowRange", name: name.value, target: target.value },
      };
    }

    case "codedRef": {
      const scheme = stringProperty(data, "scheme", context);
      if (!scheme.ok) {
        return scheme;
      }
      return {
        ok: true,
        value: { kind: "codedRef", name: name.value, scheme: scheme.value },
      };
    }

    default:
      return fail(
        "MLG3001",
        `Unsupported field kind '${String(data.kind)}' for ${context}`
      );
  }
};

const parseScheme = (
  data: unknown,
  context: string
): Result<CodeScheme, Diagnostic[]> => {
  if (!isObject(data)) {
    return fail("MLG9008", `Invalid ${context}: must be an object`);
  }

  const { name, tagBits, tables } = data;
  if (typeof name !== "string") {
    return fail("MLG9008", `Invalid ${context}: missing or invalid 'name'`);
  }
  if (
    !Array.isArray(tables) ||
    tables.length === 0 ||
    !tables.every((slot) => slot === null || typeof slot === "string")
  ) {
    return fail(
      "MLG9008",
      `Invalid ${context}: 'tables' must be a non-empty array of table names or null`
    );
  }
  if (tagBits !== undefined && !isTagBits(tagBits)) {
    return fail(
      "MLG9008",
      `Invalid ${context}: 'tagBits' must be an integer from ${MIN_TAG_BITS} to ${MAX_TAG_BITS}`
    );
  }

  const slots: (string | null)[] = tables.map((slot: unknown) =>
    typeof slot === "string" ? slot : null
  );

  return {
    ok: true,
    value: {
      name,
      tagBits: isTagBits(tagBits) ? tagBits : tagBitsFor(slots.length),
      tables: slots,
    },
  };
};
