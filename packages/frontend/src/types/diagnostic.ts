/**
 * Diagnostic types for metalayout
 */

export type DiagnosticSeverity = "error" | "warning";

export type FaultKind =
  | "DuplicateCodeFault"
  | "InvalidCodeFault"
  | "DuplicateNameFault"
  | "InvalidIdentifierFault"
  | "UnresolvedReferenceFault"
  | "InvalidSchemeFault"
  | "UnsupportedKindFault"
  | "ExtractionFault"
  | "SchemaFileFault";

export type DiagnosticCode =
  | "MLG1001" // Two tables share a code
  | "MLG1002" // Table code outside [0, 255]
  | "MLG1003" // Schema declares no tables
  | "MLG1004" // Duplicate table name
  | "MLG1005" // Duplicate field name within a table
  | "MLG1006" // Name is not a usable identifier
  | "MLG1007" // Duplicate code scheme name
  | "MLG2001" // Reference to an unknown table
  | "MLG2002" // Reference to an unknown code scheme
  | "MLG2003" // Code scheme lists an unknown table
  | "MLG2004" // Code scheme tag bits invalid or too few for its slots
  | "MLG2005" // Code scheme lists an internal table (warning)
  | "MLG3001" // Field kind has no width/decode rule
  | "MLG3002" // Fixed integer size is not 1, 2 or 4
  | "MLG3003" // Table declares no fields
  // Declaration extraction errors (MLG8001-MLG8007)
  | "MLG8001" // Source file not found
  | "MLG8002" // Invalid @table tag
  | "MLG8003" // Unsupported property type
  | "MLG8004" // Missing or invalid type argument
  | "MLG8005" // Invalid @codedIndex declaration
  | "MLG8006" // Unsupported table member
  | "MLG8007" // Failed to read source file
  // Schema file errors (MLG9001-MLG9008)
  | "MLG9001" // Schema file not found
  | "MLG9002" // Failed to read schema file
  | "MLG9003" // Invalid JSON in schema file
  | "MLG9004" // Schema file must be an object
  | "MLG9005" // Missing or invalid 'tables' field
  | "MLG9006" // Invalid table entry
  | "MLG9007" // Invalid field entry
  | "MLG9008"; // Invalid code scheme entry

const FAULTS: Readonly<Record<DiagnosticCode, FaultKind>> = {
  MLG1001: "DuplicateCodeFault",
  MLG1002: "InvalidCodeFault",
  MLG1003: "InvalidCodeFault",
  MLG1004: "DuplicateNameFault",
  MLG1005: "DuplicateNameFault",
  MLG1006: "InvalidIdentifierFault",
  MLG1007: "DuplicateNameFault",
  MLG2001: "UnresolvedReferenceFault",
  MLG2002: "UnresolvedReferenceFault",
  MLG2003: "UnresolvedReferenceFault",
  MLG2004: "InvalidSchemeFault",
  MLG2005: "InvalidSchemeFault",
  MLG3001: "UnsupportedKindFault",
  MLG3002: "UnsupportedKindFault",
  MLG3003: "UnsupportedKindFault",
  MLG8001: "ExtractionFault",
  MLG8002: "ExtractionFault",
  MLG8003: "ExtractionFault",
  MLG8004: "ExtractionFault",
  MLG8005: "ExtractionFault",
  MLG8006: "ExtractionFault",
  MLG8007: "ExtractionFault",
  MLG9001: "SchemaFileFault",
  MLG9002: "SchemaFileFault",
  MLG9003: "SchemaFileFault",
  MLG9004: "SchemaFileFault",
  MLG9005: "SchemaFileFault",
  MLG9006: "SchemaFileFault",
  MLG9007: "SchemaFileFault",
  MLG9008: "SchemaFileFault",
};

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly fault: FaultKind;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  /** Tables, fields or schemes the diagnostic is about */
  readonly subjects?: readonly string[];
};

export type DiagnosticDetails = {
  readonly severity?: DiagnosticSeverity;
  readonly location?: SourceLocation;
  readonly hint?: string;
  readonly subjects?: readonly string[];
};

export const faultOf = (code: DiagnosticCode): FaultKind => FAULTS[code];

export const createDiagnostic = (
  code: DiagnosticCode,
  message: string,
  details: DiagnosticDetails = {}
): Diagnostic => ({
  code,
  fault: faultOf(code),
  severity: details.severity ?? "error",
  message,
  location: details.location,
  hint: details.hint,
  subjects: details.subjects,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (
  diagnostics: readonly Diagnostic[] = []
): DiagnosticsCollector => ({
  diagnostics,
  hasErrors: diagnostics.some(isError),
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

/**
 * Merge collectors, keeping the first of any diagnostics that format
 * identically. Independent builders may detect the same fault.
 */
export const mergeDiagnostics = (
  ...collectors: readonly DiagnosticsCollector[]
): DiagnosticsCollector => {
  const seen = new Set<string>();
  const merged: Diagnostic[] = [];

  for (const collector of collectors) {
    for (const diagnostic of collector.diagnostics) {
      const key = formatDiagnostic(diagnostic);
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(diagnostic);
      }
    }
  }

  return createDiagnosticsCollector(merged);
};
