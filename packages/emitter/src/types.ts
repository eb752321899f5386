/**
 * Emitter types
 */

export type EmitterOptions = {
  /** Schema path named in the file header */
  readonly sourcePath: string;
  /** Module the generated code imports reader and layout types from */
  readonly runtimeModule: string;
  /** Module exporting the flag types named by fixed-size fields */
  readonly flagsModule?: string;
  /** Indentation width in spaces */
  readonly indent?: number;
  readonly includeTimestamp?: boolean;
  /** Fixed timestamp, used instead of the current time */
  readonly timestamp?: string;
};

export type EmitterContext = {
  readonly indentLevel: number;
  readonly options: EmitterOptions;
};

export const createContext = (options: EmitterOptions): EmitterContext => ({
  indentLevel: 0,
  options,
});

/**
 * Increase indentation level
 */
export const indent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: context.indentLevel + 1,
});

/**
 * Get indentation string for current level
 */
export const getIndent = (context: EmitterContext): string => {
  const spaces = context.options.indent ?? 2;
  return " ".repeat(spaces * context.indentLevel);
};

export const line = (context: EmitterContext, text: string): string =>
  getIndent(context) + text;
