export * from "./audit-logger.js";
