export * from "./transport.js";
export * from "./sse.js";
export * from "./reconstructor.js";
export * from "./retry.js";
export * from "./client.js";
export * from "./dialects/types.js";
export * from "./dialects/responses.js";
export * from "./dialects/chat.js";
