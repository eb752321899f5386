/**
 * Record decoders
 *
 * Each decoder reads the fields in declaration order. The record is returned
 * only when the reader reports no error.
 */

import type { DecodePlan, DecodeStep } from "@metalayout/layout";
import { decoderName, dispatchName, recordName } from "../constants.js";
import { type EmitterContext, indent, line } from "../types.js";

const emitRead = (step: DecodeStep): string => {
  switch (step.op) {
    case "uint":
      return `reader.uint${step.sizeBytes * 8}()`;
    case "heap":
      return `reader.heap(${JSON.stringify(step.heap)})`;
    case "index":
    case "rowRange":
      return `reader.index(${JSON.stringify(step.table)})`;
    case "coded":
      return `reader.coded(${dispatchName(step.scheme)})`;
  }
};

export const emitDecoder = (
  plan: DecodePlan,
  context: EmitterContext
): string => {
  const body = indent(context);
  const fields = indent(body);
  const record = recordName(plan.table);

  return [
    line(
      context,
      `export const ${decoderName(plan.table)} = (reader: RecordReader): ${record} | undefined => {`
    ),
    line(body, `const record: ${record} = {`),
    ...plan.steps.map((step) => line(fields, `${step.field}: ${emitRead(step)},`)),
    line(body, "};"),
    line(body, "return reader.error ? undefined : record;"),
    line(context, "};"),
  ].join("\n");
};

export const emitDecoders = (
  plans: readonly DecodePlan[],
  context: EmitterContext
): string => plans.map((plan) => emitDecoder(plan, context)).join("\n\n");
