export * from "./rules";
export * from "./fallback";
export * from "./agent";
export * from "./router";
