/**
 * metalayout layout - derives table layout artifacts from a schema
 */

export type * from "./types.js";

export { buildCatalog } from "./catalog.js";
export { resolveField, resolveTableFields } from "./fields.js";
export {
  buildWidthFormulas,
  evaluateTerm,
  evaluateWidth,
  constantWidth,
  describeTerm,
  describeFormula,
} from "./width.js";
export { buildDecodePlans } from "./decode-plan.js";
export {
  buildCodedDispatch,
  findInternalSchemeMembers,
  dispatchTag,
} from "./dispatch.js";
export { buildRegistry } from "./registry.js";
export { generateArtifacts, type Generation } from "./generate.js";
