export * from "./config.js";
export * from "./protocol.js";
export * from "./errors.js";
export * from "./classify.js";
export * from "./cancellation.js";
export * from "./json.js";
export * from "./logger.js";
export * from "./result.js";
