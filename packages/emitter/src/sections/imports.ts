/**
 * Type-only imports of the generated module
 */

import type { LayoutArtifacts } from "@metalayout/layout";
import { type EmitterContext, indent, line } from "../types.js";

const emitImport = (
  names: readonly string[],
  from: string,
  context: EmitterContext
): string => {
  const body = indent(context);
  return [
    line(context, "import type {"),
    ...names.map((name) => line(body, `${name},`)),
    line(context, `} from ${JSON.stringify(from)};`),
  ].join("\n");
};

/**
 * Flag types used by fixed-size fields, sorted and without repeats.
 */
export const collectFlagTypes = (
  artifacts: LayoutArtifacts
): readonly string[] => {
  const flags = new Set<string>();
  for (const plan of artifacts.plans.values()) {
    for (const step of plan.steps) {
      if (step.op === "uint" && step.flagType !== undefined) {
        flags.add(step.flagType);
      }
    }
  }
  return [...flags].sort();
};

export const emitImports = (
  artifacts: LayoutArtifacts,
  context: EmitterContext
): string => {
  const runtimeNames = [
    ...(artifacts.dispatch.size > 0 ? ["CodedDispatch"] : []),
    "CodedIndex",
    "LayoutContext",
    "RecordReader",
  ];
  const imports = [
    emitImport(runtimeNames, context.options.runtimeModule, context),
  ];

  const { flagsModule } = context.options;
  const flags = collectFlagTypes(artifacts);
  if (flagsModule !== undefined && flags.length > 0) {
    imports.push(emitImport(flags, flagsModule, context));
  }

  return imports.join("\n");
};
