// packages/worker-agent/src/rules/index.ts
import type { Domain } from "@hopguard/travel-core";
import type { DispatchRule } from "./rule";
import { flightRules } from "./flights";
import { lodgingRules } from "./lodging";
import { vehicleRules } from "./vehicles";

export const RULES_BY_DOMAIN: Record<Domain, readonly DispatchRule[]> = {
  flights: flightRules,
  lodging: lodgingRules,
  vehicles: vehicleRules,
};

export * from "./rule";
export { datesIn } from "./entities";
