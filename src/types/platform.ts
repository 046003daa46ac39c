/*
 *  platform.ts — Platform abstraction layer interfaces
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { FileOpenMode } from "./types.js";

/**
 * One open file. All reads and writes are positioned and synchronous;
 * a handle never keeps a cursor of its own.
 */
export interface RecordingFileHandle {
    /**
     * Read up to `target.length` bytes starting at `position`.
     * Returns the number of bytes read (0 past end of file).
     */
    read(target: Uint8Array, position: number): number;

    /**
     * Write `source` at `position`, extending the file if needed.
     * Returns the number of bytes written.
     */
    write(source: Uint8Array, position: number): number;

    /** Push written bytes down to the storage medium. */
    flush(): void;

    /** Release the handle. It must not be used afterwards. */
    close(): void;
}

/**
 * Abstract file operations the recording file needs.
 * Platform implementations (Node.js, in-memory) provide concrete versions.
 *
 * Implementations throw when the file cannot be opened; handle methods may
 * throw on I/O errors.
 */
export interface RecordingFileIO {
    open(path: string, mode: FileOpenMode): RecordingFileHandle;
}

/**
 * Diagnostics sink. The recording file never logs through a global.
 */
export interface RecordingLogger {
    warn(message: string): void;
}
