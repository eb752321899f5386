/**
 * Decode plan interpreter
 */

import type { Result } from "@metalayout/frontend";
import type {
  CodedDispatch,
  DecodePlan,
  DecodeStep,
} from "@metalayout/layout";
import { type CodedIndex, type CursorFault, RecordCursor } from "./cursor.js";

export type FieldValue = number | CodedIndex;

export type DecodedRecord = Readonly<Record<string, FieldValue>>;

const readStep = (
  step: DecodeStep,
  cursor: RecordCursor,
  dispatch: ReadonlyMap<string, CodedDispatch>
): FieldValue => {
  switch (step.op) {
    case "uint":
      return cursor.uint(step.sizeBytes);
    case "heap":
      return cursor.heap(step.heap);
    case "index":
    case "rowRange":
      return cursor.index(step.table);
    case "coded": {
      const scheme = dispatch.get(step.scheme);
      if (!scheme) {
        throw new RangeError(
          `No dispatch for code scheme '${step.scheme}' in field '${step.field}'`
        );
      }
      return cursor.coded(scheme);
    }
  }
};

/**
 * Apply a plan at the cursor's position. The record is returned only when
 * every step succeeded; on failure the cursor's fault is returned and the
 * partial record is dropped.
 */
export const decodeRecord = (
  plan: DecodePlan,
  cursor: RecordCursor,
  dispatch: ReadonlyMap<string, CodedDispatch>
): Result<DecodedRecord, CursorFault> => {
  const record: Record<string, FieldValue> = {};

  for (const step of plan.steps) {
    const value = readStep(step, cursor, dispatch);
    if (cursor.error) {
      return { ok: false, error: cursor.error };
    }
    record[step.field] = value;
  }

  return { ok: true, value: record };
};

export const isCodedIndex = (value: FieldValue): value is CodedIndex =>
  typeof value === "object";
