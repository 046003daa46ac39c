/*
 *  recording-codec.test.ts — Tests for little-endian integers and bounded strings
 *  input-recording
 */

import { describe, it, expect } from "vitest";
import {
    writeInt32,
    readInt32,
    writeUint32,
    readUint32,
    int32Bytes,
    uint32Bytes,
    writeBoundedString,
    readBoundedString,
} from "../../src/recordings/recording-codec.js";

// =============================================================================
// Integers
// =============================================================================

describe("int32", () => {
    it("writes little-endian two's complement", () => {
        const bytes = new Uint8Array(4);
        writeInt32(bytes, -2);
        expect(Array.from(bytes)).toEqual([0xFE, 0xFF, 0xFF, 0xFF]);
        expect(readInt32(bytes)).toBe(-2);
    });

    it("honours the offset", () => {
        const bytes = new Uint8Array(8);
        writeInt32(bytes, 0x12345678, 3);
        expect(Array.from(bytes)).toEqual([0, 0, 0, 0x78, 0x56, 0x34, 0x12, 0]);
        expect(readInt32(bytes, 3)).toBe(0x12345678);
    });

    it("int32Bytes builds a standalone block", () => {
        expect(Array.from(int32Bytes(300))).toEqual([0x2C, 0x01, 0, 0]);
    });
});

describe("uint32", () => {
    it("writes little-endian unsigned values", () => {
        expect(Array.from(uint32Bytes(0x01020304))).toEqual([4, 3, 2, 1]);
    });

    it("reads values above the signed range", () => {
        const bytes = new Uint8Array(6);
        writeUint32(bytes, 0xFFFFFFFE, 2);
        expect(readUint32(bytes, 2)).toBe(0xFFFFFFFE);
        expect(readInt32(bytes, 2)).toBe(-2);
    });
});

// =============================================================================
// Bounded strings
// =============================================================================

describe("writeBoundedString", () => {
    it("copies short text and zero-fills the rest", () => {
        const field = new Uint8Array(8).fill(0x7F);
        writeBoundedString(field, "abc");
        expect(Array.from(field)).toEqual([97, 98, 99, 0, 0, 0, 0, 0]);
    });

    it("keeps capacity - 1 bytes and a terminating zero", () => {
        const field = new Uint8Array(5);
        writeBoundedString(field, "abcdefgh");
        expect(Array.from(field)).toEqual([97, 98, 99, 100, 0]);
    });

    it("terminates text that is exactly the capacity long", () => {
        const field = new Uint8Array(4);
        writeBoundedString(field, "wxyz");
        expect(Array.from(field)).toEqual([119, 120, 121, 0]);
    });

    it("leaves an empty field untouched", () => {
        const field = new Uint8Array(0);
        writeBoundedString(field, "abc");
        expect(field.length).toBe(0);
    });
});

describe("readBoundedString", () => {
    it("stops at the first zero", () => {
        expect(readBoundedString(Uint8Array.of(72, 105, 0, 88))).toBe("Hi");
    });

    it("reads the whole field when there is no zero", () => {
        expect(readBoundedString(Uint8Array.of(65, 66, 67))).toBe("ABC");
    });

    it("reads an all-zero field as empty", () => {
        expect(readBoundedString(new Uint8Array(10))).toBe("");
    });

    it("decodes UTF-8", () => {
        const field = new Uint8Array(16);
        writeBoundedString(field, "Ōkami");
        expect(readBoundedString(field)).toBe("Ōkami");
    });
});
