export * from "./domains";
export * from "./contracts";
export * from "./validate";
export * from "./places";
