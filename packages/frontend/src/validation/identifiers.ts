/**
 * Identifier rules for table, field and scheme names
 *
 * Names are emitted verbatim as TypeScript identifiers and property keys,
 * so reserved words are rejected up front instead of being escaped.
 */

const RESERVED_WORDS: ReadonlySet<string> = new Set([
  // Reserved words
  "break",
  "case",
  "catch",
  "class",
  "const",
  "continue",
  "debugger",
  "default",
  "delete",
  "do",
  "else",
  "enum",
  "export",
  "extends",
  "false",
  "finally",
  "for",
  "function",
  "if",
  "import",
  "in",
  "instanceof",
  "new",
  "null",
  "return",
  "super",
  "switch",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "var",
  "void",
  "while",
  "with",

  // Strict mode reserved words
  "implements",
  "interface",
  "let",
  "package",
  "private",
  "protected",
  "public",
  "static",
  "yield",
  "await",

  // Names the generated module declares itself
  "Table",
  "Tables",
  "TABLE_COUNT",
  "TABLE_NONE",
]);

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const isReservedWord = (name: string): boolean =>
  RESERVED_WORDS.has(name);

export const isValidIdentifier = (name: string): boolean =>
  IDENTIFIER_PATTERN.test(name) && !isReservedWord(name);
