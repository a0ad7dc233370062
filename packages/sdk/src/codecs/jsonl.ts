/**
 * JSON Lines codec: one object per line, always a multi-record file
 */

import { CodecError } from "../errors.js";
import { safeParseJson } from "../format.js";
import type { Codec, Content, DataRecord } from "../types.js";
import { DataRecordSchema, validateContent } from "./shape.js";

export interface JsonLinesCodecOptions {
  /** Text encoding (default: "utf-8") */
  encoding?: BufferEncoding;
}

export class JsonLinesCodec implements Codec {
  readonly name = "jsonl";
  readonly mode = "multi";
  #encoding: BufferEncoding;

  constructor(options: JsonLinesCodecOptions = {}) {
    this.#encoding = options.encoding ?? "utf-8";
  }

  decode(bytes: Uint8Array, path: string): Content {
    const records: DataRecord[] = [];
    const lines = Buffer.from(bytes).toString(this.#encoding).split(/\r?\n/);

    lines.forEach((line, index) => {
      if (line.trim() === "") {
        return;
      }
      const parsed = safeParseJson(line);
      if (!parsed.success) {
        throw new CodecError(path, `invalid JSON on line ${index + 1}: ${parsed.error}`);
      }
      const record = DataRecordSchema.safeParse(parsed.data);
      if (!record.success) {
        throw new CodecError(path, `line ${index + 1} is not a flat object of scalars`);
      }
      records.push(record.data);
    });

    return records;
  }

  encode(content: Content, path: string): Uint8Array {
    const checked = validateContent(content, this.mode, path);
    const records = Array.isArray(checked) ? checked : [checked];
    const text = records.map((record) => JSON.stringify(record)).join("\n");
    return Buffer.from(records.length > 0 ? `${text}\n` : "", this.#encoding);
  }
}
