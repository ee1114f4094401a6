export * from "./users.js";
export * from "./devices.js";
export * from "./conversations.js";
export * from "./groups.js";
export * from "./messages.js";
