export * from "./create-completion.js";
