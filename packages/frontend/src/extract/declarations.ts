/**
 * Schema extraction from annotated TypeScript declarations.
 *
 * - An interface tagged `@table <code>` is a table. Exported interfaces are
 *   visible; interfaces without `export` are internal.
 * - Property types map to field kinds by name: `uint8`, `uint16`, `uint32`
 *   (optionally tagged `@flags <Type>`), `StringIndex`, `BlobIndex`,
 *   `GuidIndex`, `TableIndex<Table>`, `RowRange<Table>`, `CodedIndex<Scheme>`.
 * - A type alias tagged `@codedIndex [tagBits]` whose type is a tuple of table
 *   names (`null` for unused tags) is a code scheme.
 *
 * Declarations without either tag are ignored, so a schema file may declare
 * the marker types it uses.
 */

import * as fs from "node:fs";
import * as ts from "typescript";
import type { Result } from "../types/result.js";
import {
  type Diagnostic,
  type DiagnosticCode,
  type SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";
import {
  type CodeScheme,
  type FieldDefinition,
  type FixedIntSize,
  type HeapKind,
  type SchemaDocument,
  type TableDefinition,
  createCodeSchemes,
  isTagBits,
  MAX_TAG_BITS,
  MIN_TAG_BITS,
  tagBitsFor,
} from "../types/schema.js";
import { findDuplicateSchemes } from "../validation/schema.js";

const FIXED_INT_TYPES: ReadonlyMap<string, FixedIntSize> = new Map([
  ["uint8", 1],
  ["uint16", 2],
  ["uint32", 4],
]);

const HEAP_TYPES: ReadonlyMap<string, HeapKind> = new Map([
  ["StringIndex", "string"],
  ["BlobIndex", "blob"],
  ["GuidIndex", "guid"],
]);

type ExtractionContext = {
  readonly sourceFile: ts.SourceFile;
  readonly diagnostics: Diagnostic[];
};

/**
 * Get location information for a node
 */
const getNodeLocation = (
  sourceFile: ts.SourceFile,
  node: ts.Node
): SourceLocation => {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(
    node.getStart(sourceFile)
  );
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getWidth(sourceFile),
  };
};

const report = (
  context: ExtractionContext,
  code: DiagnosticCode,
  node: ts.Node,
  message: string,
  subjects?: readonly string[]
): void => {
  context.diagnostics.push(
    createDiagnostic(code, message, {
      location: getNodeLocation(context.sourceFile, node),
      subjects,
    })
  );
};

const hasExportModifier = (node: ts.Node): boolean =>
  ts.canHaveModifiers(node) &&
  (ts.getModifiers(node) ?? []).some(
    (modifier) => modifier.kind === ts.SyntaxKind.ExportKeyword
  );

/**
 * Find a JSDoc tag by name. Returns the tag and its trimmed comment text.
 */
const findTag = (
  node: ts.Node,
  tagName: string
): { readonly tag: ts.JSDocTag; readonly text: string } | undefined => {
  const tag = ts.getJSDocTags(node).find((t) => t.tagName.text === tagName);
  if (!tag) {
    return undefined;
  }
  return { tag, text: (ts.getTextOfJSDocComment(tag.comment) ?? "").trim() };
};

const typeReferenceName = (node: ts.TypeNode): string | undefined => {
  if (!ts.isTypeReferenceNode(node)) {
    return undefined;
  }
  return ts.isIdentifier(node.typeName)
    ? node.typeName.text
    : node.typeName.right.text;
};

/**
 * Name of the single type argument of `TableIndex<T>`-style references.
 */
const singleTypeArgument = (node: ts.TypeReferenceNode): string | undefined => {
  const args = node.typeArguments;
  if (!args || args.length !== 1) {
    return undefined;
  }
  const [arg] = args;
  return arg ? typeReferenceName(arg) : undefined;
};

const extractField = (
  context: ExtractionContext,
  tableName: string,
  member: ts.TypeElement
): FieldDefinition | undefined => {
  if (
    !ts.isPropertySignature(member) ||
    !ts.isIdentifier(member.name) ||
    !member.type
  ) {
    report(
      context,
      "MLG8006",
      member,
      `Table '${tableName}' may only declare typed properties`,
      [tableName]
    );
    return undefined;
  }

  const name = member.name.text;
  const type = member.type;
  const typeName = typeReferenceName(type);

  const size = typeName ? FIXED_INT_TYPES.get(typeName) : undefined;
  if (size !== undefined) {
    const flags = findTag(member, "flags");
    return flags && flags.text.length > 0
      ? { kind: "fixedInt", name, sizeBytes: size, flagType: flags.text }
      : { kind: "fixedInt", name, sizeBytes: size };
  }

  const heap = typeName ? HEAP_TYPES.get(typeName) : undefined;
  if (heap !== undefined) {
    return { kind: "heapIndex", name, heap };
  }

  if (
    ts.isTypeReferenceNode(type) &&
    (typeName === "TableIndex" ||
      typeName === "RowRange" ||
      typeName === "CodedIndex")
  ) {
    const argument = singleTypeArgument(type);
    if (!argument) {
      report(
        context,
        "MLG8004",
        type,
        `${typeName} on ${tableName}.${name} needs exactly one named type argument`,
        [tableName, name]
      );
      return undefined;
    }
    switch (typeName) {
      case "TableIndex":
        return { kind: "tableRef", name, target: argument };
      case "RowRange":
        return { kind: "rowRange", name, target: argument };
      case "CodedIndex":
        return { kind: "codedRef", name, scheme: argument };
    }
  }

  report(
    context,
    "MLG8003",
    type,
    `Unsupported type '${type.getText(context.sourceFile)}' for ${tableName}.${name}`,
    [tableName, name]
  );
  return undefined;
};

const extractTable = (
  context: ExtractionContext,
  node: ts.InterfaceDeclaration,
  tableTag: { readonly tag: ts.JSDocTag; readonly text: string }
): TableDefinition | undefined => {
  const name = node.name.text;
  const code = tableTag.text.length > 0 ? Number(tableTag.text) : Number.NaN;

  if (!Number.isInteger(code)) {
    report(
      context,
      "MLG8002",
      tableTag.tag,
      `@table on '${name}' must give an integer code, got '${tableTag.text}'`,
      [name]
    );
    return undefined;
  }

  const fields: FieldDefinition[] = [];
  let complete = true;
  for (const member of node.members) {
    const field = extractField(context, name, member);
    if (field) {
      fields.push(field);
    } else {
      complete = false;
    }
  }

  if (!complete) {
    return undefined;
  }

  return {
    name,
    code,
    visible: hasExportModifier(node),
    fields,
    location: getNodeLocation(context.sourceFile, node.name),
  };
};

const extractScheme = (
  context: ExtractionContext,
  node: ts.TypeAliasDeclaration,
  schemeTag: { readonly tag: ts.JSDocTag; readonly text: string }
): CodeScheme | undefined => {
  const name = node.name.text;

  if (!ts.isTupleTypeNode(node.type) || node.type.elements.length === 0) {
    report(
      context,
      "MLG8005",
      node.type,
      `@codedIndex '${name}' must be a non-empty tuple of table names`,
      [name]
    );
    return undefined;
  }

  const tables: (string | null)[] = [];
  for (const element of node.type.elements) {
    if (
      ts.isLiteralTypeNode(element) &&
      element.literal.kind === ts.SyntaxKind.NullKeyword
    ) {
      tables.push(null);
      continue;
    }
    const table = typeReferenceName(element);
    if (!table) {
      report(
        context,
        "MLG8005",
        element,
        `@codedIndex '${name}' slots must be table names or null`,
        [name]
      );
      return undefined;
    }
    tables.push(table);
  }

  let tagBits = tagBitsFor(tables.length);
  if (schemeTag.text.length > 0) {
    tagBits = Number(schemeTag.text);
    if (!isTagBits(tagBits)) {
      report(
        context,
        "MLG8005",
        schemeTag.tag,
        `@codedIndex '${name}' tag bits must be an integer from ${MIN_TAG_BITS} to ${MAX_TAG_BITS}, got '${schemeTag.text}'`,
        [name]
      );
      return undefined;
    }
  }

  return {
    name,
    tagBits,
    tables,
    location: getNodeLocation(context.sourceFile, node.name),
  };
};

/**
 * Extract a schema document from TypeScript source text.
 */
export const extractSchema = (
  fileName: string,
  sourceText: string
): Result<SchemaDocument, Diagnostic[]> => {
  const sourceFile = ts.createSourceFile(
    fileName,
    sourceText,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );
  const context: ExtractionContext = { sourceFile, diagnostics: [] };
  const tables: TableDefinition[] = [];
  const schemes: CodeScheme[] = [];

  for (const statement of sourceFile.statements) {
    if (ts.isInterfaceDeclaration(statement)) {
      const tableTag = findTag(statement, "table");
      if (tableTag) {
        const table = extractTable(context, statement, tableTag);
        if (table) {
          tables.push(table);
        }
      }
    } else if (ts.isTypeAliasDeclaration(statement)) {
      const schemeTag = findTag(statement, "codedIndex");
      if (schemeTag) {
        const scheme = extractScheme(context, statement, schemeTag);
        if (scheme) {
          schemes.push(scheme);
        }
      }
    }
  }

  context.diagnostics.push(...findDuplicateSchemes(schemes));

  if (context.diagnostics.length > 0) {
    return { ok: false, error: context.diagnostics };
  }

  return {
    ok: true,
    value: { schema: { tables }, schemes: createCodeSchemes(schemes) },
  };
};

/**
 * Read a declaration file from disk and extract its schema.
 */
export const extractSchemaFile = (
  filePath: string
): Result<SchemaDocument, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        createDiagnostic("MLG8001", `Schema source not found: ${filePath}`),
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "MLG8007",
          `Failed to read schema source: ${error instanceof Error ? error.message : String(error)}`
        ),
      ],
    };
  }

  return extractSchema(filePath, content);
};
