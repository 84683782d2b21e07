export * from "./headers";
export * from "./hop-client";
export * from "./decision-client";
export * from "./enforce";
