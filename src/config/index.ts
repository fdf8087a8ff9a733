export * from "./adapter-config.js";
export * from "./load-config.js";
