/*
 *  node-file-io.test.ts — Recording files on the real file system
 *  input-recording
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { nodeFileIO } from "../../src/platform/node-file-io.js";
import { nullLogger } from "../../src/platform/recording-logger.js";
import { InputRecordingFile } from "../../src/recordings/recording-file.js";
import { PadData } from "../../src/recordings/pad-data.js";
import { RecordingFailure } from "../../src/types/enums.js";

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "input-recording-"));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
});

describe("nodeFileIO", () => {
    it("reads and writes at absolute positions", () => {
        const path = join(dir, "raw.bin");
        const handle = nodeFileIO.open(path, "create");

        expect(handle.write(Uint8Array.of(1, 2, 3), 4)).toBe(3);
        handle.flush();

        const target = new Uint8Array(4);
        expect(handle.read(target, 3)).toBe(4);
        expect(Array.from(target)).toEqual([0, 1, 2, 3]);
        expect(handle.read(target, 7)).toBe(0);
        handle.close();

        expect(statSync(path).size).toBe(7);
    });

    it("opens an existing file without truncating it", () => {
        const path = join(dir, "keep.bin");
        writeFileSync(path, Uint8Array.of(5, 6, 7));

        const handle = nodeFileIO.open(path, "update");
        handle.write(Uint8Array.of(9), 0);
        handle.close();

        expect(Array.from(readFileSync(path))).toEqual([9, 6, 7]);
    });

    it("throws when updating a missing file", () => {
        expect(() => nodeFileIO.open(join(dir, "missing.bin"), "update")).toThrow(/ENOENT/);
    });
});

describe("InputRecordingFile on disk", () => {
    it("records, closes and resumes a session", () => {
        const path = join(dir, "session.p2m2");

        const recorder = new InputRecordingFile({ logger: nullLogger });
        expect(recorder.openNew(path, false)).toBe(true);
        recorder.header.setAuthor("tester");
        recorder.header.setGameName("Test Game");
        recorder.header.setEmulatorVersion("TestEmu-1.2.3");
        expect(recorder.writeHeader()).toBe(true);
        for (let frame = 0; frame < 3; frame++) {
            expect(recorder.writeFrame(frame, 0, PadData.fromBytes([frame, 0xFF]))).toBe(true);
            recorder.setTotalFrames(frame + 1);
        }
        recorder.incrementUndoCount();
        expect(recorder.close()).toBe(true);

        // 570-byte preamble, two full frames and port 0 of the third
        expect(statSync(path).size).toBe(570 + 36 * 2 + 18);

        const player = new InputRecordingFile({ logger: nullLogger });
        expect(player.openExisting(path)).toBe(true);
        expect(player.header.author).toBe("tester");
        expect(player.header.gameName).toBe("Test Game");
        expect(player.header.emulatorVersion).toBe("TestEmu-1.2.3");
        expect(player.totalFrames).toBe(3);
        expect(player.undoCount).toBe(1);
        expect(player.fromSavestate).toBe(false);
        expect(player.readKeyBuffer(2, 0, 0)).toBe(2);
        expect(player.readKeyBuffer(2, 0, 1)).toBe(0xFF);
        expect([...player.bulkReadPadData(0, 5, 0).keys()]).toEqual([0, 1, 2]);
        expect(player.close()).toBe(true);
    });

    it("fails to open a missing recording", () => {
        const player = new InputRecordingFile({ logger: nullLogger });
        expect(player.openExisting(join(dir, "missing.p2m2"))).toBe(false);
        expect(player.lastFailure).toBe(RecordingFailure.OpenFailure);
    });
});
