/**
 * Structural schema validation: names only.
 *
 * Codes, references and field kinds are checked by the builders that depend
 * on them.
 */

import {
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import type { CodeScheme, SchemaDocument } from "../types/schema.js";
import { isValidIdentifier } from "./identifiers.js";

/**
 * Further names of the generated module: its functions and the runtime types
 * it imports. Table and the other id names are reserved words already.
 */
const GENERATED_NAMES: ReadonlySet<string> = new Set([
  "tableWidth",
  "initTables",
  "codedTable",
  "CodedDispatch",
  "CodedIndex",
  "LayoutContext",
  "RecordReader",
]);

const invalidName = (description: string, name: string): Diagnostic =>
  createDiagnostic("MLG1006", `${description} is not a valid identifier`, {
    subjects: [name],
    hint: "Use letters, digits, '_' or '$', and avoid reserved words",
  });

/**
 * Schemes declared more than once. Schema sources call this on the declared
 * list, before schemes are keyed by name.
 */
export const findDuplicateSchemes = (
  schemes: readonly CodeScheme[]
): Diagnostic[] => {
  const seen = new Set<string>();
  const diagnostics: Diagnostic[] = [];

  for (const scheme of schemes) {
    if (seen.has(scheme.name)) {
      diagnostics.push(
        createDiagnostic(
          "MLG1007",
          `Code scheme '${scheme.name}' is declared twice`,
          { location: scheme.location, subjects: [scheme.name] }
        )
      );
    }
    seen.add(scheme.name);
  }

  return diagnostics;
};

export const validateSchema = (
  document: SchemaDocument
): DiagnosticsCollector => {
  const diagnostics: Diagnostic[] = [];
  const tableNames = new Set<string>();

  const recordNames = new Set(
    document.schema.tables.map((table) => `${table.name}Record`)
  );

  for (const table of document.schema.tables) {
    if (!isValidIdentifier(table.name)) {
      diagnostics.push(invalidName(`Table name '${table.name}'`, table.name));
    }

    if (tableNames.has(table.name)) {
      diagnostics.push(
        createDiagnostic("MLG1004", `Table '${table.name}' is declared twice`, {
          location: table.location,
          subjects: [table.name],
        })
      );
    }
    tableNames.add(table.name);

    const fieldNames = new Set<string>();
    for (const field of table.fields) {
      if (!isValidIdentifier(field.name)) {
        diagnostics.push(
          invalidName(
            `Field name '${field.name}' in table '${table.name}'`,
            field.name
          )
        );
      }
      if (fieldNames.has(field.name)) {
        diagnostics.push(
          createDiagnostic(
            "MLG1005",
            `Field '${field.name}' is declared twice in table '${table.name}'`,
            { location: table.location, subjects: [table.name, field.name] }
          )
        );
      }
      fieldNames.add(field.name);

      if (field.kind === "fixedInt" && field.flagType !== undefined) {
        const { flagType } = field;
        if (!isValidIdentifier(flagType)) {
          diagnostics.push(
            invalidName(
              `Flag type '${flagType}' of field '${table.name}.${field.name}'`,
              flagType
            )
          );
        } else if (GENERATED_NAMES.has(flagType) || recordNames.has(flagType)) {
          diagnostics.push(
            createDiagnostic(
              "MLG1006",
              `Flag type '${flagType}' of field '${table.name}.${field.name}' collides with a generated declaration`,
              { location: table.location, subjects: [table.name, flagType] }
            )
          );
        }
      }
    }
  }

  for (const [key, scheme] of document.schemes) {
    if (!isValidIdentifier(key)) {
      diagnostics.push(invalidName(`Code scheme name '${key}'`, key));
    }
    if (key !== scheme.name) {
      diagnostics.push(
        createDiagnostic(
          "MLG2002",
          `Code scheme registered as '${key}' is named '${scheme.name}'`,
          { location: scheme.location, subjects: [key, scheme.name] }
        )
      );
    }
  }

  return createDiagnosticsCollector(diagnostics);
};
