/*
 *  memory-file-io.ts — In-process RecordingFileIO for testing / headless use
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { RecordingFileHandle, RecordingFileIO } from "../types/platform.js";
import type { FileOpenMode } from "../types/types.js";

/**
 * A RecordingFileIO whose files live in a Map.
 *
 * Useful for:
 *  - Unit testing the recording file without touching the disk
 *  - Tooling that inspects a recording already loaded into memory
 */
export interface MemoryFileIO extends RecordingFileIO {
    /** Current contents of every file, keyed by path. */
    readonly files: Map<string, Uint8Array>;
    /** Number of handles opened and not yet closed. */
    openHandles(): number;
}

export function createMemoryFileIO(initialFiles: Record<string, Uint8Array> = {}): MemoryFileIO {
    const files = new Map<string, Uint8Array>();
    for (const [path, bytes] of Object.entries(initialFiles)) {
        files.set(path, bytes.slice());
    }
    let handleCount = 0;

    function open(path: string, mode: FileOpenMode): RecordingFileHandle {
        if (mode === "create") {
            files.set(path, new Uint8Array(0));
        } else if (!files.has(path)) {
            throw new Error(`ENOENT: no such file or directory, open '${path}'`);
        }

        let closed = false;
        handleCount++;

        const contents = (): Uint8Array => {
            if (closed) {
                throw new Error("EBADF: bad file descriptor");
            }
            return files.get(path) ?? new Uint8Array(0);
        };

        return {
            read(target: Uint8Array, position: number): number {
                const data = contents();
                if (position >= data.length) {
                    return 0;
                }
                const chunk = data.subarray(position, position + target.length);
                target.set(chunk);
                return chunk.length;
            },

            write(source: Uint8Array, position: number): number {
                let data = contents();
                const end = position + source.length;
                if (end > data.length) {
                    // Gaps between the old end and `position` read back as zeros
                    const grown = new Uint8Array(end);
                    grown.set(data);
                    data = grown;
                    files.set(path, data);
                }
                data.set(source, position);
                return source.length;
            },

            flush(): void {
                contents();
            },

            close(): void {
                contents();
                closed = true;
                handleCount--;
            },
        };
    }

    return {
        files,
        open,
        openHandles: () => handleCount,
    };
}
