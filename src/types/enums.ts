/*
 *  enums.ts — Recording file states and failure reasons
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ===== RecordingFileState =====

export enum RecordingFileState {
    Closed,
    OpenNew,
    OpenExisting,
}

// ===== RecordingFailure =====

export enum RecordingFailure {
    /** The operation needs an open file. */
    NotOpen = "NotOpen",
    /** The file could not be created or opened. */
    OpenFailure = "OpenFailure",
    /** Truncated preamble or unsupported version. */
    VerifyFailure = "VerifyFailure",
    /** The computed offset is not a valid file position. */
    SeekFailure = "SeekFailure",
    ReadShort = "ReadShort",
    WriteShort = "WriteShort",
}
