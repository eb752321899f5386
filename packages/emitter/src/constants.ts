/**
 * Shared constants for the layout emitter
 */

/**
 * Generate standard file header for generated layout modules
 *
 * @param filePath - Schema the module was generated from
 * @returns Multi-line header string with trailing newline
 */
export const generateFileHeader = (
  filePath: string,
  options: {
    readonly includeTimestamp?: boolean;
    readonly timestamp?: string;
  } = {}
): string => {
  const lines: string[] = [];

  lines.push(`// Generated from: ${filePath}`);

  if (options.includeTimestamp ?? true) {
    const timestamp = options.timestamp ?? new Date().toISOString();
    lines.push(`// Generated at: ${timestamp}`);
  }

  lines.push("// WARNING: Do not modify this file manually");
  lines.push("");

  return lines.join("\n");
};

export const TABLE_CONST = "Table";
export const TABLE_COUNT_CONST = "TABLE_COUNT";
export const TABLE_NONE_CONST = "TABLE_NONE";

export const recordName = (table: string): string => `${table}Record`;
export const decoderName = (table: string): string => `decode${table}`;
export const dispatchName = (scheme: string): string => `coded${scheme}`;
export const tableRef = (table: string): string => `${TABLE_CONST}.${table}`;
