/**
 * JSON codec
 */

import { CodecError } from "../errors.js";
import { safeParseJson, stableStringify, type KeyOrder } from "../format.js";
import type { Codec, CodecMode, Content } from "../types.js";
import { validateContent } from "./shape.js";

export interface JsonCodecOptions {
  /** One object per file, or an array of objects (default: "singleton") */
  mode?: CodecMode;
  /** Text encoding (default: "utf-8") */
  encoding?: BufferEncoding;
  /** Spaces of indentation (default: 2) */
  indent?: number;
  /** Key ordering when writing (default: "preserve") */
  keyOrder?: KeyOrder;
}

export class JsonCodec implements Codec {
  readonly name = "json";
  readonly mode: CodecMode;
  #encoding: BufferEncoding;
  #indent: number;
  #keyOrder: KeyOrder;

  constructor(options: JsonCodecOptions = {}) {
    this.mode = options.mode ?? "singleton";
    this.#encoding = options.encoding ?? "utf-8";
    this.#indent = options.indent ?? 2;
    this.#keyOrder = options.keyOrder ?? "preserve";
  }

  decode(bytes: Uint8Array, path: string): Content {
    const parsed = safeParseJson(Buffer.from(bytes).toString(this.#encoding));
    if (!parsed.success) {
      throw new CodecError(path, `invalid JSON: ${parsed.error}`);
    }
    return validateContent(parsed.data, this.mode, path);
  }

  encode(content: Content, path: string): Uint8Array {
    const checked = validateContent(content, this.mode, path);
    return Buffer.from(stableStringify(checked, this.#indent, this.#keyOrder), this.#encoding);
  }
}
