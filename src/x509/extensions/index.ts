export * from "./decoders.js";
export * from "./extension.js";
export * from "./general-name.js";
export * from "./registry.js";
export * from "./types.js";
