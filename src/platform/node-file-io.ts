/*
 *  node-file-io.ts — RecordingFileIO over synchronous node:fs calls
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { closeSync, fsyncSync, openSync, readSync, writeSync } from "node:fs";
import type { RecordingFileHandle, RecordingFileIO } from "../types/platform.js";
import type { FileOpenMode } from "../types/types.js";

const OPEN_FLAGS: Record<FileOpenMode, string> = {
    create: "w+",
    update: "r+",
};

/**
 * Wrap an already-open file descriptor. Every call is a blocking positioned
 * read or write; `flush` is an fsync.
 */
export function createNodeFileHandle(fd: number): RecordingFileHandle {
    return {
        read(target: Uint8Array, position: number): number {
            return readSync(fd, target, 0, target.length, position);
        },

        write(source: Uint8Array, position: number): number {
            return writeSync(fd, source, 0, source.length, position);
        },

        flush(): void {
            fsyncSync(fd);
        },

        close(): void {
            closeSync(fd);
        },
    };
}

export const nodeFileIO: RecordingFileIO = {
    open(path: string, mode: FileOpenMode): RecordingFileHandle {
        return createNodeFileHandle(openSync(path, OPEN_FLAGS[mode]));
    },
};
