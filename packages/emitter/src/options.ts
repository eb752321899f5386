import type { EmitterOptions } from "./types.js";

export const defaultOptions: EmitterOptions = {
  sourcePath: "schema",
  runtimeModule: "@metalayout/runtime",
  indent: 2,
  includeTimestamp: true,
};
