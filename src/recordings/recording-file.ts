/*
 *  recording-file.ts — Random-access input recording file
 *  input-recording
 *
 *  File layout (little-endian):
 *    [0..560]    RecordingHeader
 *    [561..564]  total frames (i32, high-water mark)
 *    [565..568]  undo count (u32)
 *    [569]       from-savestate flag (1 byte)
 *    [570..]     frame data, INPUT_BYTES_PER_FRAME per frame, port-major
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import {
    RECORDING_FORMAT_VERSION,
    RECORDING_HEADER_SIZE,
    HEADER_REGION_SIZE,
    SAVESTATE_FLAG_BYTES,
    SEEKPOINT_TOTAL_FRAMES,
    SEEKPOINT_UNDO_COUNT,
    SEEKPOINT_SAVESTATE,
    TOTAL_FRAMES_BYTES,
    UNDO_COUNT_BYTES,
    CONTROLLER_INPUT_BYTES,
    CONTROLLER_PORTS_SUPPORTED,
    INPUT_BYTES_PER_FRAME,
    INT32_MAX,
    UINT32_MAX,
    DEFAULT_HOST_APPLICATION,
} from "../types/constants.js";
import { RecordingFailure, RecordingFileState } from "../types/enums.js";
import type { RecordingFileHandle, RecordingFileIO, RecordingLogger } from "../types/platform.js";
import type { FileOpenMode, HostApplication } from "../types/types.js";
import { nodeFileIO } from "../platform/node-file-io.js";
import { consoleLogger } from "../platform/recording-logger.js";
import { int32Bytes, readInt32, readUint32, uint32Bytes } from "./recording-codec.js";
import { RecordingHeader, decodeRecordingHeader } from "./recording-header.js";
import { PadData } from "./pad-data.js";

// =============================================================================
// Options
// =============================================================================

export interface InputRecordingOptions {
    /** Storage backend. Defaults to synchronous node:fs. */
    fileIO?: RecordingFileIO;
    /** Diagnostics sink. Defaults to the console. */
    logger?: RecordingLogger;
    /** Used for the default emulator-version string. */
    host?: HostApplication;
}

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function isValidOffset(offset: number): boolean {
    return Number.isSafeInteger(offset) && offset >= 0;
}

function isIndexBelow(value: number, limit: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < limit;
}

/**
 * True when the triple names a real cell: a non-negative integer frame, a
 * supported port and an index inside the port buffer. Anything else would
 * address another frame's bytes.
 */
export function isValidCoordinate(frame: number, port: number, bufIndex: number): boolean {
    return (
        Number.isSafeInteger(frame) && frame >= 0 &&
        isIndexBelow(port, CONTROLLER_PORTS_SUPPORTED) &&
        isIndexBelow(bufIndex, CONTROLLER_INPUT_BYTES)
    );
}

// =============================================================================
// Addressing
// =============================================================================

/**
 * Byte offset of the first port of `frame`. The `SAVESTATE_FLAG_BYTES` term is
 * the savestate byte that sits between the counters and the frame data.
 */
export function getRecordingBlockSeekPoint(frame: number): number {
    return HEADER_REGION_SIZE + SAVESTATE_FLAG_BYTES + frame * INPUT_BYTES_PER_FRAME;
}

/** Byte offset of one input byte of one port within one frame. */
export function getSeekPoint(frame: number, port: number, bufIndex: number): number {
    return getRecordingBlockSeekPoint(frame) + CONTROLLER_INPUT_BYTES * port + bufIndex;
}

// =============================================================================
// InputRecordingFile
// =============================================================================

/**
 * Owns one open recording file and the in-memory copy of its header and
 * counters.
 *
 * The in-memory header and counters are authoritative while the file is open;
 * the preamble on disk is refreshed by `writeHeader`, and the two counters by
 * `incrementUndoCount` and `setTotalFrames`.
 *
 * Nothing here throws. Every operation reports failure through its return
 * value, `lastFailure`, and a line on the logger.
 */
export class InputRecordingFile {
    private handle: RecordingFileHandle | null = null;
    private path = "";
    private fileState = RecordingFileState.Closed;
    private failure: RecordingFailure | null = null;

    private readonly recordingHeader: RecordingHeader;
    private frames = 0;
    private undos = 0;
    private savestate = false;

    private readonly fileIO: RecordingFileIO;
    private readonly logger: RecordingLogger;

    constructor(options: InputRecordingOptions = {}) {
        this.fileIO = options.fileIO ?? nodeFileIO;
        this.logger = options.logger ?? consoleLogger;
        this.recordingHeader = new RecordingHeader(options.host ?? DEFAULT_HOST_APPLICATION);
    }

    // ── Accessors ────────────────────────────────────────────────────────────

    /** Path of the open file, or `""` when closed. */
    get filename(): string {
        return this.path;
    }

    get header(): RecordingHeader {
        return this.recordingHeader;
    }

    get totalFrames(): number {
        return this.frames;
    }

    get undoCount(): number {
        return this.undos;
    }

    get fromSavestate(): boolean {
        return this.savestate;
    }

    get state(): RecordingFileState {
        return this.fileState;
    }

    /** Why the most recent operation failed; `null` after a success. */
    get lastFailure(): RecordingFailure | null {
        return this.failure;
    }

    isFileOpen(): boolean {
        return this.handle !== null;
    }

    // ── Lifecycle ────────────────────────────────────────────────────────────

    /**
     * Create (or truncate) `path` for a new recording. Counters reset and the
     * header's author and game name are cleared. Nothing is written until
     * `writeHeader`.
     */
    openNew(path: string, fromSavestate: boolean): boolean {
        if (!this.open(path, "create")) {
            return false;
        }
        this.path = path;
        this.frames = 0;
        this.undos = 0;
        this.recordingHeader.init();
        this.savestate = fromSavestate;
        this.fileState = RecordingFileState.OpenNew;
        return this.succeed();
    }

    /**
     * Open `path` without truncating it and adopt its preamble. A file that
     * is truncated or carries another version is closed again untouched.
     */
    openExisting(path: string): boolean {
        if (!this.open(path, "update")) {
            return false;
        }

        let verified = false;
        try {
            verified = this.verify();
        } finally {
            if (!verified) {
                this.release();
            }
        }

        if (!verified) {
            this.logger.warn("Input recording file header is invalid");
            return this.fail(RecordingFailure.VerifyFailure);
        }

        this.path = path;
        this.fileState = RecordingFileState.OpenExisting;
        return this.succeed();
    }

    /** Returns false when there is nothing to close. */
    close(): boolean {
        if (this.handle === null) {
            return this.notOpen("close");
        }
        this.release();
        return this.succeed();
    }

    /**
     * Write header, total frames, undo count and the savestate flag at the
     * start of the file, then flush. A short write leaves the preamble
     * partially updated.
     */
    writeHeader(): boolean {
        if (this.handle === null) {
            return this.notOpen("write header");
        }

        const ok =
            this.writeBlock(0, this.recordingHeader.encode()) &&
            this.writeBlock(SEEKPOINT_TOTAL_FRAMES, int32Bytes(this.frames)) &&
            this.writeBlock(SEEKPOINT_UNDO_COUNT, uint32Bytes(this.undos)) &&
            this.writeBlock(SEEKPOINT_SAVESTATE, Uint8Array.of(this.savestate ? 1 : 0)) &&
            this.flush();

        return ok && this.succeed();
    }

    // ── Frame data ───────────────────────────────────────────────────────────

    /**
     * Read one input byte. Returns `null` when the file is closed, the
     * coordinate is invalid, or the byte lies past the end of the file.
     */
    readKeyBuffer(frame: number, port: number, bufIndex: number): number | null {
        const seek = this.resolveSeekPoint(frame, port, bufIndex);
        if (seek === null) {
            return null;
        }
        const block = this.readBlock(seek, 1);
        if (block === null) {
            return null;
        }
        this.succeed();
        return block[0];
    }

    /** Write one input byte and flush. */
    writeKeyBuffer(frame: number, port: number, bufIndex: number, value: number): boolean {
        const seek = this.resolveSeekPoint(frame, port, bufIndex);
        if (seek === null) {
            return false;
        }
        const ok = this.writeBlock(seek, Uint8Array.of(value & 0xFF)) && this.flush();
        return ok && this.succeed();
    }

    /**
     * Write a whole port buffer for one frame, byte by byte. Stops at the
     * first failing byte; earlier bytes stay written.
     */
    writeFrame(frame: number, port: number, padData: PadData): boolean {
        if (this.resolveSeekPoint(frame, port, 0) === null) {
            return false;
        }

        for (let i = 0; i < CONTROLLER_INPUT_BYTES; i++) {
            if (!this.writeKeyBuffer(frame, port, i, padData.pollControllerData(i))) {
                return false;
            }
        }
        return true;
    }

    /**
     * Read the buffers of `port` for frames `[frameStart, frameEnd)`.
     *
     * A frame whose buffer cannot be read in full (typically past the end of
     * a truncated file) is left out of the result instead of failing the
     * scan. Keys are inserted in ascending frame order.
     *
     * Frames are stored in order, so the first short read marks the end of
     * the file and the scan stops there; `frameEnd` may be `Infinity`.
     */
    bulkReadPadData(frameStart: number, frameEnd: number, port: number): Map<number, PadData> {
        const data = new Map<number, PadData>();

        const first = Math.max(frameStart, 0);
        if (this.resolveSeekPoint(first, port, 0) === null) {
            return data;
        }

        const padBytes = new Uint8Array(CONTROLLER_INPUT_BYTES);
        for (let frame = first; frame < frameEnd; frame++) {
            const seek = getSeekPoint(frame, port, 0);
            if (!isValidOffset(seek)) {
                break;
            }
            if (this.readInto(padBytes, seek) !== CONTROLLER_INPUT_BYTES) {
                break;
            }
            data.set(frame, PadData.fromBytes(padBytes));
        }

        this.succeed();
        return data;
    }

    // ── Counters ─────────────────────────────────────────────────────────────

    /**
     * Count one undo/rerecord. The counter always advances in memory; it is
     * written through only while a file is open.
     */
    incrementUndoCount(): void {
        this.undos = Math.min(this.undos + 1, UINT32_MAX);
        if (this.handle === null) {
            return;
        }
        if (this.writeBlock(SEEKPOINT_UNDO_COUNT, uint32Bytes(this.undos)) && this.flush()) {
            this.succeed();
        }
    }

    /**
     * Raise the total-frames watermark to `frame` and write it through.
     * Ignored while closed, or when `frame` does not exceed the current value.
     */
    setTotalFrames(frame: number): void {
        if (this.handle === null || this.frames >= frame) {
            return;
        }
        if (!Number.isInteger(frame) || frame > INT32_MAX) {
            this.logger.warn(`Input recording total frames out of range - ${frame}`);
            return;
        }
        this.frames = frame;
        if (this.writeBlock(SEEKPOINT_TOTAL_FRAMES, int32Bytes(this.frames)) && this.flush()) {
            this.succeed();
        }
    }

    // ── Internals ────────────────────────────────────────────────────────────

    private open(path: string, mode: FileOpenMode): boolean {
        if (this.handle !== null) {
            this.release();
        }
        try {
            this.handle = this.fileIO.open(path, mode);
        } catch (err) {
            this.logger.warn(`Input recording file opening failed. Error - ${describeError(err)}`);
            return this.fail(RecordingFailure.OpenFailure);
        }
        return true;
    }

    /**
     * Rewind and read the preamble in file order. Header and counters are
     * adopted only when every read is complete and the version matches.
     */
    private verify(): boolean {
        const headerBytes = this.readBlock(0, RECORDING_HEADER_SIZE);
        if (headerBytes === null) {
            return false;
        }
        const totalFramesBytes = this.readBlock(SEEKPOINT_TOTAL_FRAMES, TOTAL_FRAMES_BYTES);
        if (totalFramesBytes === null) {
            return false;
        }
        const undoCountBytes = this.readBlock(SEEKPOINT_UNDO_COUNT, UNDO_COUNT_BYTES);
        if (undoCountBytes === null) {
            return false;
        }
        const savestateBytes = this.readBlock(SEEKPOINT_SAVESTATE, SAVESTATE_FLAG_BYTES);
        if (savestateBytes === null) {
            return false;
        }

        const header = decodeRecordingHeader(headerBytes);
        if (header.version !== RECORDING_FORMAT_VERSION) {
            this.logger.warn(`Input recording file is not a supported version - ${header.version}`);
            return false;
        }

        this.recordingHeader.load(headerBytes);
        this.frames = readInt32(totalFramesBytes);
        this.undos = readUint32(undoCountBytes);
        this.savestate = savestateBytes[0] !== 0;
        return true;
    }

    /** Close the handle if any and return to the Closed state. */
    private release(): void {
        const handle = this.handle;
        this.handle = null;
        this.path = "";
        this.fileState = RecordingFileState.Closed;
        if (handle === null) {
            return;
        }
        try {
            handle.close();
        } catch (err) {
            this.logger.warn(`Input recording file close failed. Error - ${describeError(err)}`);
        }
    }

    /**
     * Positioned read with no failure bookkeeping.
     * Returns the number of bytes read, or -1 when the read threw.
     */
    private readInto(target: Uint8Array, offset: number): number {
        if (this.handle === null) {
            return -1;
        }
        try {
            return this.handle.read(target, offset);
        } catch (err) {
            this.logger.warn(
                `Input recording file read failed at offset ${offset}. Error - ${describeError(err)}`,
            );
            return -1;
        }
    }

    /**
     * Offset of a frame-data cell, or `null` (with the failure recorded) when
     * the file is closed or the coordinate does not name a cell.
     */
    private resolveSeekPoint(frame: number, port: number, bufIndex: number): number | null {
        if (this.handle === null) {
            this.notOpen("access frame data");
            return null;
        }
        const seek = getSeekPoint(frame, port, bufIndex);
        if (!isValidCoordinate(frame, port, bufIndex) || !isValidOffset(seek)) {
            this.logger.warn(
                `Input recording file seek failed. Error - invalid coordinate ` +
                `frame ${frame}, port ${port}, index ${bufIndex}`,
            );
            this.fail(RecordingFailure.SeekFailure);
            return null;
        }
        return seek;
    }

    private readBlock(offset: number, length: number): Uint8Array | null {
        if (this.handle === null) {
            this.notOpen("read");
            return null;
        }
        const block = new Uint8Array(length);
        const bytesRead = this.readInto(block, offset);
        if (bytesRead !== length) {
            if (bytesRead >= 0) {
                this.logger.warn(
                    `Input recording file read failed at offset ${offset}. ` +
                    `Error - read ${bytesRead} of ${length} bytes`,
                );
            }
            this.fail(RecordingFailure.ReadShort);
            return null;
        }
        return block;
    }

    private writeBlock(offset: number, bytes: Uint8Array): boolean {
        if (this.handle === null) {
            return this.notOpen("write");
        }
        let written: number;
        try {
            written = this.handle.write(bytes, offset);
        } catch (err) {
            this.logger.warn(
                `Input recording file write failed at offset ${offset}. Error - ${describeError(err)}`,
            );
            return this.fail(RecordingFailure.WriteShort);
        }
        if (written !== bytes.length) {
            this.logger.warn(
                `Input recording file write failed at offset ${offset}. ` +
                `Error - wrote ${written} of ${bytes.length} bytes`,
            );
            return this.fail(RecordingFailure.WriteShort);
        }
        return true;
    }

    private flush(): boolean {
        if (this.handle === null) {
            return this.notOpen("flush");
        }
        try {
            this.handle.flush();
        } catch (err) {
            this.logger.warn(`Input recording file flush failed. Error - ${describeError(err)}`);
            return this.fail(RecordingFailure.WriteShort);
        }
        return true;
    }

    private succeed(): true {
        this.failure = null;
        return true;
    }

    private fail(reason: RecordingFailure): false {
        this.failure = reason;
        return false;
    }

    private notOpen(action: string): false {
        this.logger.warn(`Input recording file is not open. Cannot ${action}`);
        return this.fail(RecordingFailure.NotOpen);
    }
}
