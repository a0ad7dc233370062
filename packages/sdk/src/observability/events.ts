/**
 * Event sinks
 *
 * Components receive a sink at construction and call it synchronously at
 * defined points. There is no process-wide sink.
 */

import type { EventSink, PathTableEvent } from "../types.js";
import type { LogLevel, Logger } from "./logs.js";

/**
 * Sink that drops every event (the default)
 */
export const noopSink: EventSink = {
  emit() {},
};

/**
 * Forward events to several sinks in order
 */
export function combineSinks(...sinks: EventSink[]): EventSink {
  return {
    emit(event) {
      for (const sink of sinks) {
        sink.emit(event);
      }
    },
  };
}

function levelOf(event: PathTableEvent): LogLevel {
  switch (event.type) {
    case "cache.corrupt":
    case "read.skip":
      return "warn";
    case "write.end":
    case "delete":
    case "lock.acquired":
    case "lock.released":
      return "info";
    default:
      return "debug";
  }
}

/**
 * Sink that writes each event as a structured log line
 */
export function loggerSink(logger: Logger): EventSink {
  return {
    emit(event) {
      const { type, ...rest } = event;
      const details: Record<string, unknown> = { ...rest };
      const path = typeof details.path === "string" ? details.path : undefined;
      delete details.path;
      if (details.dryRun === false) {
        delete details.dryRun;
      }
      logger.log(levelOf(event), type, {
        path,
        details: Object.keys(details).length > 0 ? details : undefined,
      });
    },
  };
}
