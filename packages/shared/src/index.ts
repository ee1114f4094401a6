export * from "./constants.js";
export * from "./errors.js";
export * from "./validation.js";
export type * from "./types/device.js";
export type * from "./types/group.js";
export type * from "./types/message.js";
export type * from "./types/events.js";
