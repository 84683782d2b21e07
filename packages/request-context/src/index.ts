// packages/request-context/src/index.ts

export * from "./types";
export * from "./context";
export { keepHopContext, withHopContext } from "./express";
