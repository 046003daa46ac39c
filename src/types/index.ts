/*
 *  types/index.ts — Barrel export for all type definitions
 *  input-recording
 */

export * from "./constants.js";
export * from "./enums.js";
export * from "./types.js";
export * from "./platform.js";
