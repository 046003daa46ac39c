/*
 *  recording-codec.ts — Little-endian integers and bounded strings
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

function viewOf(bytes: Uint8Array): DataView {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// =============================================================================
// Integers — every multi-byte field in the file is little-endian
// =============================================================================

export function writeInt32(target: Uint8Array, value: number, offset: number = 0): void {
    viewOf(target).setInt32(offset, value, true);
}

export function readInt32(source: Uint8Array, offset: number = 0): number {
    return viewOf(source).getInt32(offset, true);
}

export function writeUint32(target: Uint8Array, value: number, offset: number = 0): void {
    viewOf(target).setUint32(offset, value, true);
}

export function readUint32(source: Uint8Array, offset: number = 0): number {
    return viewOf(source).getUint32(offset, true);
}

/** Encode a value as a standalone 4-byte little-endian i32 block. */
export function int32Bytes(value: number): Uint8Array {
    const bytes = new Uint8Array(4);
    writeInt32(bytes, value);
    return bytes;
}

/** Encode a value as a standalone 4-byte little-endian u32 block. */
export function uint32Bytes(value: number): Uint8Array {
    const bytes = new Uint8Array(4);
    writeUint32(bytes, value);
    return bytes;
}

// =============================================================================
// Bounded strings
// =============================================================================

/**
 * Copy `text` into a fixed-capacity field as UTF-8.
 *
 * At most `field.length - 1` bytes are copied; every byte after them is
 * zeroed, so the field always ends with a terminating zero. Excess bytes are
 * dropped silently.
 */
export function writeBoundedString(field: Uint8Array, text: string): void {
    field.fill(0);
    if (field.length === 0) {
        return;
    }
    const encoded = textEncoder.encode(text);
    field.set(encoded.subarray(0, field.length - 1));
}

/**
 * Decode a fixed-capacity field: the bytes up to the first zero, or the whole
 * field when no zero is present.
 */
export function readBoundedString(field: Uint8Array): string {
    const end = field.indexOf(0);
    return textDecoder.decode(end === -1 ? field : field.subarray(0, end));
}
