/*
 *  recordings/index.ts — Barrel export for the recordings module
 *  input-recording
 */

// ── Codec ───────────────────────────────────────────────────────────────────
export {
    writeInt32,
    readInt32,
    writeUint32,
    readUint32,
    int32Bytes,
    uint32Bytes,
    writeBoundedString,
    readBoundedString,
} from "./recording-codec.js";

// ── Header ──────────────────────────────────────────────────────────────────
export {
    RecordingHeader,
    decodeRecordingHeader,
    formatEmulatorVersion,
} from "./recording-header.js";

// ── Pad buffer ──────────────────────────────────────────────────────────────
export { PadData } from "./pad-data.js";

// ── Recording file ──────────────────────────────────────────────────────────
export {
    InputRecordingFile,
    getRecordingBlockSeekPoint,
    getSeekPoint,
    isValidCoordinate,
} from "./recording-file.js";

export type {
    InputRecordingOptions,
} from "./recording-file.js";
