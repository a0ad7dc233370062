/**
 * Codec registry
 */

import { ConfigurationError } from "../errors.js";
import type { Codec, CodecMode } from "../types.js";
import { JsonCodec } from "./json.js";
import { JsonLinesCodec } from "./jsonl.js";
import { YamlCodec } from "./yaml.js";

export { JsonCodec, type JsonCodecOptions } from "./json.js";
export { JsonLinesCodec, type JsonLinesCodecOptions } from "./jsonl.js";
export { YamlCodec, type YamlCodecOptions } from "./yaml.js";
export { validateContent, toRecordList, fromRecordList, sameRecord } from "./shape.js";

export const CODEC_NAMES = ["json", "jsonl", "yaml"] as const;

export type CodecName = (typeof CODEC_NAMES)[number];

export interface CodecOptions {
  mode?: CodecMode;
  encoding?: BufferEncoding;
}

/**
 * Create a built-in codec by name
 * @throws {ConfigurationError} For unknown names, or a singleton JSON Lines codec
 */
export function createCodec(name: string, options: CodecOptions = {}): Codec {
  switch (name) {
    case "json":
      return new JsonCodec(options);
    case "yaml":
    case "yml":
      return new YamlCodec(options);
    case "jsonl":
      if (options.mode === "singleton") {
        throw new ConfigurationError('The "jsonl" codec only supports multi mode');
      }
      return new JsonLinesCodec({ encoding: options.encoding });
    default:
      throw new ConfigurationError(`Unknown codec "${name}" (expected one of ${CODEC_NAMES.join(", ")})`);
  }
}
