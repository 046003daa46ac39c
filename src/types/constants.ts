/*
 *  constants.ts — Input recording file format constants
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { HostApplication } from "./types.js";

// Format version
export const RECORDING_FORMAT_VERSION = 1;

// ----- Header -----
//
// Changing any of these sizes is a format change: bump RECORDING_FORMAT_VERSION.

export const HEADER_VERSION_BYTES = 1;
export const EMULATOR_VERSION_CAPACITY = 50;
export const AUTHOR_CAPACITY = 255;
export const GAME_NAME_CAPACITY = 255;

export const HEADER_OFFSET_VERSION = 0;
export const HEADER_OFFSET_EMULATOR_VERSION = HEADER_OFFSET_VERSION + HEADER_VERSION_BYTES; // 1
export const HEADER_OFFSET_AUTHOR = HEADER_OFFSET_EMULATOR_VERSION + EMULATOR_VERSION_CAPACITY; // 51
export const HEADER_OFFSET_GAME_NAME = HEADER_OFFSET_AUTHOR + AUTHOR_CAPACITY; // 306

export const RECORDING_HEADER_SIZE = HEADER_OFFSET_GAME_NAME + GAME_NAME_CAPACITY; // 561

// ----- File counters -----

export const TOTAL_FRAMES_BYTES = 4;
export const UNDO_COUNT_BYTES = 4;
export const SAVESTATE_FLAG_BYTES = 1;

export const SEEKPOINT_TOTAL_FRAMES = RECORDING_HEADER_SIZE; // 561
export const SEEKPOINT_UNDO_COUNT = SEEKPOINT_TOTAL_FRAMES + TOTAL_FRAMES_BYTES; // 565
export const SEEKPOINT_SAVESTATE = SEEKPOINT_UNDO_COUNT + UNDO_COUNT_BYTES; // 569

/** Header plus the two counters; the savestate byte follows it. */
export const HEADER_REGION_SIZE = SEEKPOINT_SAVESTATE; // 569

// ----- Frame data -----

export const CONTROLLER_INPUT_BYTES = 18;
export const CONTROLLER_PORTS_SUPPORTED = 2;
export const INPUT_BYTES_PER_FRAME = CONTROLLER_INPUT_BYTES * CONTROLLER_PORTS_SUPPORTED; // 36

export const FRAME_DATA_START = HEADER_REGION_SIZE + SAVESTATE_FLAG_BYTES; // 570

// ----- Limits -----

export const INT32_MAX = 0x7fffffff;
export const UINT32_MAX = 0xffffffff;

// ----- Host -----

export const DEFAULT_HOST_APPLICATION: HostApplication = {
    name: "InputRecording",
    versionHi: 1,
    versionMid: 0,
    versionLo: 0,
};
