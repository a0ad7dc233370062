/**
 * YAML codec backed by the `yaml` package
 */

import { parse, stringify } from "yaml";
import { CodecError } from "../errors.js";
import type { Codec, CodecMode, Content } from "../types.js";
import { validateContent } from "./shape.js";

export interface YamlCodecOptions {
  /** One mapping per file, or a sequence of mappings (default: "singleton") */
  mode?: CodecMode;
  /** Text encoding (default: "utf-8") */
  encoding?: BufferEncoding;
  /** Spaces of indentation (default: 2) */
  indent?: number;
}

export class YamlCodec implements Codec {
  readonly name = "yaml";
  readonly mode: CodecMode;
  #encoding: BufferEncoding;
  #indent: number;

  constructor(options: YamlCodecOptions = {}) {
    this.mode = options.mode ?? "singleton";
    this.#encoding = options.encoding ?? "utf-8";
    this.#indent = options.indent ?? 2;
  }

  decode(bytes: Uint8Array, path: string): Content {
    let data: unknown;
    try {
      data = parse(Buffer.from(bytes).toString(this.#encoding));
    } catch (err) {
      throw new CodecError(path, `invalid YAML: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
    // An empty multi-record file holds no records
    if ((data === null || data === undefined) && this.mode === "multi") {
      return [];
    }
    return validateContent(data, this.mode, path);
  }

  encode(content: Content, path: string): Uint8Array {
    const checked = validateContent(content, this.mode, path);
    return Buffer.from(stringify(checked, { indent: this.#indent }), this.#encoding);
  }
}
