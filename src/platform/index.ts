/*
 *  platform/index.ts — Barrel exports for the platform module
 *  input-recording
 */

// Node.js file system
export { nodeFileIO, createNodeFileHandle } from "./node-file-io.js";

// In-memory (headless) file system
export { createMemoryFileIO, type MemoryFileIO } from "./memory-file-io.js";

// Log sinks
export { consoleLogger, nullLogger, LOG_PREFIX } from "./recording-logger.js";
