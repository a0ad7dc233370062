/**
 * Diagnostics written to stderr in verbose mode
 */

import { createLogger, loggerSink, noopSink, type EventSink, type Logger } from "@pathtable/sdk";

/**
 * Logger writing every level to stderr, keeping stdout for JSON output
 */
export function createCliLogger(): Logger {
  return createLogger({
    minLevel: "debug",
    writer: (_level, line) => console.error(line),
  });
}

/**
 * Event sink for the SDK: logged events when verbose, nothing otherwise
 */
export function cliEventSink(logger: Logger | undefined): EventSink {
  return logger ? loggerSink(logger) : noopSink;
}

/**
 * Wrap an async function with a timing log entry
 */
export async function withTiming<T>(label: string, logger: Logger | undefined, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    logger?.debug("cli.timing", {
      details: { command: label, durationMs: Date.now() - start, success },
    });
  }
}
