/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { CodecError, safeParseJson, toRecordList, validateContent } from "@pathtable/sdk";
import type { Constraints, DataRecord } from "@pathtable/sdk";
import { CliError } from "./errors.js";

/**
 * Parse a non-negative integer option
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse a `--where` option: a JSON object of scalar values
 */
export function parseConstraints(value: string): Constraints {
  const json = safeParseJson(value);
  if (!json.success) {
    throw new InvalidArgumentError(`Invalid JSON: ${json.error}`);
  }
  try {
    const content = validateContent(json.data, "singleton", "--where");
    // Singleton validation never yields a list
    return Array.isArray(content) ? {} : content;
  } catch (err) {
    if (err instanceof CodecError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

/**
 * Parse records given as a JSON object or an array of objects
 * @param source - Where the text came from, for error messages
 */
export function parseRecords(text: string, source: string): DataRecord[] {
  const json = safeParseJson(text);
  if (!json.success) {
    throw new CliError(`Invalid JSON in ${source}: ${json.error}`);
  }
  const mode = Array.isArray(json.data) ? "multi" : "singleton";
  try {
    return toRecordList(validateContent(json.data, mode, source));
  } catch (err) {
    if (err instanceof CodecError) {
      throw new CliError(`Invalid records in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
