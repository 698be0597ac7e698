export * from "./types.js";
export * from "./errors.js";
export * from "./codec.js";
export * from "./session.js";
export * from "./commands.js";
export * from "./sequencer.js";
export * from "./client.js";
