export * from "./backend";
export * from "./http-backend";
export * from "./jsonrpc";
export * from "./sessions";
export * from "./tools";
export * from "./domains";
export * from "./router";
export * from "./client";
