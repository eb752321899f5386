/**
 * metalayout emitter - renders layout artifacts as TypeScript
 */

export {
  type EmitterOptions,
  type EmitterContext,
  createContext,
  indent,
  getIndent,
} from "./types.js";
export { defaultOptions } from "./options.js";
export { generateFileHeader } from "./constants.js";
export { emitLayoutModule } from "./module-emitter.js";
export { emitWidthExpression } from "./sections/widths.js";
export { collectFlagTypes } from "./sections/imports.js";
