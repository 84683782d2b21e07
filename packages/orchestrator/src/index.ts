// packages/orchestrator/src/index.ts
export * from "./intent";
export * from "./context";
export * from "./itinerary";
export * from "./registry";
export * from "./discovery";
export * from "./dispatcher";
export * from "./orchestrator";
export * from "./router";
