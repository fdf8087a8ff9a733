export * from "./callbacks.js";
export * from "./bedrock-chat-model.js";
