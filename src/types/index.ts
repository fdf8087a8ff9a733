export * from "./chat-message.js";
export * from "./content-response.js";
export * from "./call-options.js";
export * from "./adapter-fault.js";
