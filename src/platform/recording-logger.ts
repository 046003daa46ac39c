/*
 *  recording-logger.ts — Console and no-op RecordingLogger implementations
 *  input-recording
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { RecordingLogger } from "../types/platform.js";

export const LOG_PREFIX = "[InputRecording]";

export const consoleLogger: RecordingLogger = {
    warn(message: string): void {
        console.warn(`${LOG_PREFIX} ${message}`);
    },
};

export const nullLogger: RecordingLogger = {
    warn(_message: string): void {
        // No-op
    },
};
