// Public API surface for converse-adapter
export * from "./types/index.js";
export * from "./config/index.js";
export * from "./adapters/index.js";
export * from "./pipeline/index.js";
export * from "./observability/index.js";
export * from "./llm/index.js";
