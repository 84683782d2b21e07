export * from "./registry";
export * from "./decide";
