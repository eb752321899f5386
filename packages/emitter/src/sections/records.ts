/**
 * Record interfaces, one per table
 */

import type { DecodePlan, DecodeStep } from "@metalayout/layout";
import { recordName } from "../constants.js";
import { type EmitterContext, indent, line } from "../types.js";

const fieldType = (step: DecodeStep, context: EmitterContext): string => {
  switch (step.op) {
    case "uint":
      return step.flagType !== undefined &&
        context.options.flagsModule !== undefined
        ? step.flagType
        : "number";
    case "coded":
      return "CodedIndex";
    case "heap":
    case "index":
    case "rowRange":
      return "number";
  }
};

export const emitRecord = (
  plan: DecodePlan,
  context: EmitterContext
): string => {
  const body = indent(context);
  return [
    line(context, `export interface ${recordName(plan.table)} {`),
    ...plan.steps.map((step) =>
      line(body, `readonly ${step.field}: ${fieldType(step, context)};`)
    ),
    line(context, "}"),
  ].join("\n");
};

export const emitRecords = (
  plans: readonly DecodePlan[],
  context: EmitterContext
): string => plans.map((plan) => emitRecord(plan, context)).join("\n\n");
