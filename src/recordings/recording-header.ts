/*
 *  recording-header.ts — Fixed-size recording file header
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import {
    RECORDING_FORMAT_VERSION,
    RECORDING_HEADER_SIZE,
    EMULATOR_VERSION_CAPACITY,
    AUTHOR_CAPACITY,
    GAME_NAME_CAPACITY,
    HEADER_OFFSET_VERSION,
    HEADER_OFFSET_EMULATOR_VERSION,
    HEADER_OFFSET_AUTHOR,
    HEADER_OFFSET_GAME_NAME,
    DEFAULT_HOST_APPLICATION,
} from "../types/constants.js";
import type { HostApplication } from "../types/types.js";
import { readBoundedString, writeBoundedString } from "./recording-codec.js";

/**
 * Compose the default emulator-version string, e.g. `"InputRecording-1.0.0"`.
 */
export function formatEmulatorVersion(host: HostApplication): string {
    return `${host.name}-${host.versionHi}.${host.versionMid}.${host.versionLo}`;
}

/**
 * The header block at offset 0 of every recording file.
 *
 * Layout (561 bytes):
 *   [0]        version (u8)
 *   [1..50]    emulator version (50 bytes, null-padded)
 *   [51..305]  author (255 bytes, null-padded)
 *   [306..560] game name (255 bytes, null-padded)
 *
 * String fields keep their raw bytes; the getters decode up to the first
 * zero byte.
 */
export class RecordingHeader {
    private versionByte: number = RECORDING_FORMAT_VERSION;
    private readonly emu = new Uint8Array(EMULATOR_VERSION_CAPACITY);
    private readonly authorField = new Uint8Array(AUTHOR_CAPACITY);
    private readonly gameNameField = new Uint8Array(GAME_NAME_CAPACITY);

    constructor(private readonly host: HostApplication = DEFAULT_HOST_APPLICATION) {}

    /**
     * Zero author and game name for a brand-new recording.
     * Version and emulator version are left as they are.
     */
    init(): void {
        this.authorField.fill(0);
        this.gameNameField.fill(0);
    }

    get version(): number {
        return this.versionByte;
    }

    /** The field is one byte wide; anything outside 0..255 throws `RangeError`. */
    set version(version: number) {
        if (!Number.isInteger(version) || version < 0 || version > 0xFF) {
            throw new RangeError(`Recording header version must be a byte, got ${version}`);
        }
        this.versionByte = version;
    }

    get emulatorVersion(): string {
        return readBoundedString(this.emu);
    }

    get author(): string {
        return readBoundedString(this.authorField);
    }

    get gameName(): string {
        return readBoundedString(this.gameNameField);
    }

    /** Without an argument, stores `formatEmulatorVersion(host)`. */
    setEmulatorVersion(version: string = formatEmulatorVersion(this.host)): void {
        writeBoundedString(this.emu, version);
    }

    setAuthor(author: string): void {
        writeBoundedString(this.authorField, author);
    }

    setGameName(gameName: string): void {
        writeBoundedString(this.gameNameField, gameName);
    }

    encode(): Uint8Array {
        const bytes = new Uint8Array(RECORDING_HEADER_SIZE);
        bytes[HEADER_OFFSET_VERSION] = this.versionByte;
        bytes.set(this.emu, HEADER_OFFSET_EMULATOR_VERSION);
        bytes.set(this.authorField, HEADER_OFFSET_AUTHOR);
        bytes.set(this.gameNameField, HEADER_OFFSET_GAME_NAME);
        return bytes;
    }

    /** Overwrite every field from an encoded header block. */
    load(bytes: Uint8Array): void {
        if (bytes.length < RECORDING_HEADER_SIZE) {
            throw new Error(
                `Recording header needs ${RECORDING_HEADER_SIZE} bytes, got ${bytes.length}`,
            );
        }
        this.versionByte = bytes[HEADER_OFFSET_VERSION];
        this.emu.set(bytes.subarray(HEADER_OFFSET_EMULATOR_VERSION, HEADER_OFFSET_AUTHOR));
        this.authorField.set(bytes.subarray(HEADER_OFFSET_AUTHOR, HEADER_OFFSET_GAME_NAME));
        this.gameNameField.set(bytes.subarray(HEADER_OFFSET_GAME_NAME, RECORDING_HEADER_SIZE));
    }
}

/**
 * Rebuild a header from an encoded block.
 */
export function decodeRecordingHeader(
    bytes: Uint8Array,
    host: HostApplication = DEFAULT_HOST_APPLICATION,
): RecordingHeader {
    const header = new RecordingHeader(host);
    header.load(bytes);
    return header;
}
