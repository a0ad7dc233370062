/**
 * Validation of decoded content against the closed scalar set, and the
 * singleton/multi shaping shared by every codec
 */

import { z } from "zod";
import { CodecError, SingletonExpectedError } from "../errors.js";
import type { CodecMode, Content, DataRecord, Scalar } from "../types.js";

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const DataRecordSchema = z.record(z.string(), ScalarSchema);

const MultiSchema = z.array(DataRecordSchema);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate raw decoded data and return it as content of the codec's mode
 * @throws {CodecError} If the data has the wrong shape or holds non-scalar values
 */
export function validateContent(data: unknown, mode: CodecMode, path: string): Content {
  if (mode === "singleton") {
    if (data === null || typeof data !== "object" || Array.isArray(data)) {
      throw new CodecError(path, "expected a single object");
    }
    const parsed = DataRecordSchema.safeParse(data);
    if (!parsed.success) {
      throw new CodecError(path, describeIssues(parsed.error));
    }
    return parsed.data;
  }

  if (!Array.isArray(data)) {
    throw new CodecError(path, "expected a list of objects");
  }
  const parsed = MultiSchema.safeParse(data);
  if (!parsed.success) {
    throw new CodecError(path, describeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Normalize content to a record list
 */
export function toRecordList(content: Content): DataRecord[] {
  return Array.isArray(content) ? content : [content];
}

function sameValue(a: Scalar | undefined, b: Scalar | undefined): boolean {
  return Object.is(a, b);
}

/**
 * Field-by-field equality of two records, ignoring key order
 */
export function sameRecord(a: DataRecord, b: DataRecord): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) {
    return false;
  }
  return aKeys.every((key) => Object.hasOwn(b, key) && sameValue(a[key], b[key]));
}

/**
 * Shape a record list for writing in the codec's mode
 *
 * Singleton files accept several records only when they are all identical
 * (e.g. the same file contributing to several joined rows).
 * @throws {SingletonExpectedError} If a singleton file would receive zero or differing records
 */
export function fromRecordList(records: readonly DataRecord[], mode: CodecMode, path: string): Content {
  if (mode === "multi") {
    return [...records];
  }
  const [first, ...rest] = records;
  if (!first) {
    throw new SingletonExpectedError(path, 0);
  }
  if (rest.some((record) => !sameRecord(first, record))) {
    throw new SingletonExpectedError(path, records.length);
  }
  return first;
}
