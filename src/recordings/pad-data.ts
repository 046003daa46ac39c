/*
 *  pad-data.ts — Raw per-port controller input buffer
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { CONTROLLER_INPUT_BYTES } from "../types/constants.js";

/**
 * One frame of one controller, as the bytes the recording stores.
 * Button and analog meaning belongs to the pad emulation, not to this class.
 */
export class PadData {
    readonly bytes = new Uint8Array(CONTROLLER_INPUT_BYTES);

    static fromBytes(bytes: ArrayLike<number>): PadData {
        const pad = new PadData();
        const count = Math.min(bytes.length, CONTROLLER_INPUT_BYTES);
        for (let i = 0; i < count; i++) {
            pad.bytes[i] = bytes[i];
        }
        return pad;
    }

    pollControllerData(index: number): number {
        return this.bytes[index] ?? 0;
    }

    updateControllerData(index: number, value: number): void {
        if (index >= 0 && index < CONTROLLER_INPUT_BYTES) {
            this.bytes[index] = value & 0xFF;
        }
    }
}
