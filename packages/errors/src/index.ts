// packages/errors/src/index.ts
export * from "./errors";
export { hopErrorHandler, notFoundHandler } from "./express";
