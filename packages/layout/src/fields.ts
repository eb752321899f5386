/**
 * Per-field resolution shared by the width and decode plan builders.
 *
 * A field resolves to its decode step, and the step carries the field's width
 * term. The width builder sums those same terms, so a step always consumes
 * exactly the bytes its term accounts for.
 */

import {
  type CodeSchemes,
  type Diagnostic,
  type FieldDefinition,
  type Result,
  type TableDefinition,
  createDiagnostic,
  describeKind,
  isFixedIntSize,
} from "@metalayout/frontend";
import type { Catalog, DecodeStep } from "./types.js";

type FieldResult = Result<DecodeStep, readonly Diagnostic[]>;

const unresolvedTable = (
  table: TableDefinition,
  field: FieldDefinition,
  target: string
): FieldResult => ({
  ok: false,
  error: [
    createDiagnostic(
      "MLG2001",
      `Field ${table.name}.${field.name} references unknown table '${target}'`,
      { location: table.location, subjects: [table.name, field.name, target] }
    ),
  ],
});

export const resolveField = (
  table: TableDefinition,
  field: FieldDefinition,
  catalog: Catalog,
  schemes: CodeSchemes
): FieldResult => {
  switch (field.kind) {
    case "fixedInt": {
      const size: number = field.sizeBytes;
      if (!isFixedIntSize(size)) {
        return {
          ok: false,
          error: [
            createDiagnostic(
              "MLG3002",
              `Field ${table.name}.${field.name} has unsupported integer size ${size}`,
              { location: table.location, subjects: [table.name, field.name] }
            ),
          ],
        };
      }
      const width = { kind: "constant", bytes: size } as const;
      return {
        ok: true,
        value:
          field.flagType === undefined
            ? { op: "uint", field: field.name, sizeBytes: size, width }
            : {
                op: "uint",
                field: field.name,
                sizeBytes: size,
                flagType: field.flagType,
                width,
              },
      };
    }

    case "heapIndex":
      return {
        ok: true,
        value: {
          op: "heap",
          field: field.name,
          heap: field.heap,
          width: { kind: "heap", heap: field.heap },
        },
      };

    case "tableRef":
    case "rowRange": {
      const target = catalog.byName.get(field.target);
      if (!target) {
        return unresolvedTable(table, field, field.target);
      }
      return {
        ok: true,
        value: {
          op: field.kind === "tableRef" ? "index" : "rowRange",
          field: field.name,
          table: target.name,
          tableId: target.id,
          width: { kind: "table", table: target.name },
        },
      };
    }

    case "codedRef":
      if (!schemes.has(field.scheme)) {
        return {
          ok: false,
          error: [
            createDiagnostic(
              "MLG2002",
              `Field ${table.name}.${field.name} references unknown code scheme '${field.scheme}'`,
              {
                location: table.location,
                subjects: [table.name, field.name, field.scheme],
              }
            ),
          ],
        };
      }
      return {
        ok: true,
        value: {
          op: "coded",
          field: field.name,
          scheme: field.scheme,
          width: { kind: "coded", scheme: field.scheme },
        },
      };

    default:
      return {
        ok: false,
        error: [
          createDiagnostic(
            "MLG3001",
            `Field kind '${describeKind(field)}' in table '${table.name}' has no width or decode rule`,
            { location: table.location, subjects: [table.name] }
          ),
        ],
      };
  }
};

/**
 * Resolve every field of a table in order, collecting all diagnostics. A
 * table with no fields has no width and is rejected.
 */
export const resolveTableFields = (
  table: TableDefinition,
  catalog: Catalog,
  schemes: CodeSchemes
): Result<readonly DecodeStep[], readonly Diagnostic[]> => {
  if (table.fields.length === 0) {
    return {
      ok: false,
      error: [
        createDiagnostic("MLG3003", `Table '${table.name}' declares no fields`, {
          location: table.location,
          subjects: [table.name],
        }),
      ],
    };
  }

  const steps: DecodeStep[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const field of table.fields) {
    const result = resolveField(table, field, catalog, schemes);
    if (result.ok) {
      steps.push(result.value);
    } else {
      diagnostics.push(...result.error);
    }
  }

  return diagnostics.length > 0
    ? { ok: false, error: diagnostics }
    : { ok: true, value: steps };
};
