export * from "./colors.js";
export * from "./engine.js";
export * from "./errors.js";
export * from "./mapper.js";
export * from "./metadata.js";
export * from "./schedule.js";
export type * from "./types.js";
