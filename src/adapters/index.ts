export * from "./i-adapter.js";
export * from "./converse-error.js";
export * from "./bedrock/bedrock-adapter.js";
export * from "./bedrock/format-resolution.js";
export * from "./bedrock/message-translator.js";
export * from "./bedrock/response-assembler.js";
export * from "./bedrock/transport.js";
