/**
 * Shared test helpers
 */

export { createTempRoot, removeDir, withTempDir, writeTree, readTree, type FileTree } from "./fs.js";
export { RecordingSink, CountingCodec } from "./sinks.js";
export { sleep, measure } from "./timers.js";
