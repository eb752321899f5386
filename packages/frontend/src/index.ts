/**
 * metalayout frontend - table schema model and schema sources
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type DiagnosticDetails,
  type FaultKind,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  faultOf,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/schema.js";

export { isValidIdentifier, isReservedWord } from "./validation/identifiers.js";
export {
  validateSchema,
  findDuplicateSchemes,
} from "./validation/schema.js";
export { loadSchemaFile, parseSchemaDocument } from "./loader/schema-file.js";
export {
  extractSchema,
  extractSchemaFile,
} from "./extract/declarations.js";

import * as path from "node:path";
import type { Diagnostic } from "./types/diagnostic.js";
import type { Result } from "./types/result.js";
import type { SchemaDocument } from "./types/schema.js";
import { loadSchemaFile } from "./loader/schema-file.js";
import { extractSchemaFile } from "./extract/declarations.js";

/**
 * Load a schema from either a JSON document or annotated TypeScript
 * declarations, chosen by file extension.
 */
export const loadSchema = (
  filePath: string
): Result<SchemaDocument, Diagnostic[]> => {
  const extension = path.extname(filePath);
  return extension === ".ts" || extension === ".mts"
    ? extractSchemaFile(filePath)
    : loadSchemaFile(filePath);
};
