/**
 * Event sinks and codecs that record what components do
 */

import type { Codec, Content, EventSink, PathTableEvent } from "@pathtable/sdk";

/**
 * Sink that keeps every event it receives
 */
export class RecordingSink implements EventSink {
  readonly events: PathTableEvent[] = [];

  emit(event: PathTableEvent): void {
    this.events.push(event);
  }

  /**
   * Event types in the order they were emitted
   */
  types(): string[] {
    return this.events.map((event) => event.type);
  }

  ofType<T extends PathTableEvent["type"]>(type: T): Array<Extract<PathTableEvent, { type: T }>> {
    return this.events.filter((event): event is Extract<PathTableEvent, { type: T }> => event.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Codec wrapper that counts decode and encode calls
 */
export class CountingCodec implements Codec {
  readonly name: string;
  readonly mode: Codec["mode"];
  decodeCount = 0;
  encodeCount = 0;
  readonly #inner: Codec;

  constructor(inner: Codec) {
    this.#inner = inner;
    this.name = inner.name;
    this.mode = inner.mode;
  }

  decode(bytes: Uint8Array, path: string): Content {
    this.decodeCount++;
    return this.#inner.decode(bytes, path);
  }

  encode(content: Content, path: string): Uint8Array {
    this.encodeCount++;
    return this.#inner.encode(content, path);
  }
}
