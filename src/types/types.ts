/*
 *  types.ts — Shared structural types
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ===== HostApplication =====

/**
 * The emulator that produced a recording. Used to compose the default
 * emulator-version string stored in the header.
 */
export interface HostApplication {
    name: string;
    versionHi: number;
    versionMid: number;
    versionLo: number;
}

// ===== FileOpenMode =====

/**
 * - `create`: create the file, or truncate it if it exists. Read-write.
 * - `update`: open an existing file without truncation. Read-write.
 */
export type FileOpenMode = "create" | "update";
