/*
 *  memory-file-io.test.ts — Tests for the in-process file table
 *  input-recording
 */

import { describe, it, expect } from "vitest";
import { createMemoryFileIO } from "../../src/platform/memory-file-io.js";

describe("createMemoryFileIO", () => {
    it("creates an empty file in create mode", () => {
        const fileIO = createMemoryFileIO();
        fileIO.open("/new.bin", "create");
        expect(fileIO.files.get("/new.bin")?.length).toBe(0);
    });

    it("truncates an existing file in create mode", () => {
        const fileIO = createMemoryFileIO({ "/old.bin": Uint8Array.of(1, 2, 3) });
        fileIO.open("/old.bin", "create");
        expect(fileIO.files.get("/old.bin")?.length).toBe(0);
    });

    it("refuses to update a missing file", () => {
        const fileIO = createMemoryFileIO();
        expect(() => fileIO.open("/missing.bin", "update")).toThrow(/ENOENT/);
    });

    it("copies the initial files", () => {
        const initial = Uint8Array.of(1, 2, 3);
        const fileIO = createMemoryFileIO({ "/a.bin": initial });
        initial[0] = 9;
        expect(fileIO.files.get("/a.bin")?.[0]).toBe(1);
    });

    it("reads what is there and reports the count", () => {
        const fileIO = createMemoryFileIO({ "/a.bin": Uint8Array.of(10, 20, 30, 40) });
        const handle = fileIO.open("/a.bin", "update");
        const target = new Uint8Array(3);

        expect(handle.read(target, 2)).toBe(2);
        expect(Array.from(target)).toEqual([30, 40, 0]);
        expect(handle.read(target, 4)).toBe(0);
    });

    it("zero-fills the gap when writing past the end", () => {
        const fileIO = createMemoryFileIO();
        const handle = fileIO.open("/a.bin", "create");

        expect(handle.write(Uint8Array.of(7, 8), 3)).toBe(2);

        expect(Array.from(fileIO.files.get("/a.bin") ?? [])).toEqual([0, 0, 0, 7, 8]);
    });

    it("overwrites in place without growing", () => {
        const fileIO = createMemoryFileIO({ "/a.bin": Uint8Array.of(1, 2, 3, 4) });
        const handle = fileIO.open("/a.bin", "update");

        handle.write(Uint8Array.of(9), 1);

        expect(Array.from(fileIO.files.get("/a.bin") ?? [])).toEqual([1, 9, 3, 4]);
    });

    it("tracks open handles and rejects use after close", () => {
        const fileIO = createMemoryFileIO();
        const handle = fileIO.open("/a.bin", "create");
        expect(fileIO.openHandles()).toBe(1);

        handle.close();

        expect(fileIO.openHandles()).toBe(0);
        expect(() => handle.read(new Uint8Array(1), 0)).toThrow(/EBADF/);
        expect(() => handle.close()).toThrow(/EBADF/);
    });
});
