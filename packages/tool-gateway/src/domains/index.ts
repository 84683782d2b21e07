import type { Domain } from "@hopguard/travel-core";
import type { AnyTool } from "../tools";
import { flightsTools } from "./flights";
import { lodgingTools } from "./lodging";
import { vehiclesTools } from "./vehicles";

export { flightsTools, lodgingTools, vehiclesTools };

export const TOOLS_BY_DOMAIN: Record<Domain, readonly AnyTool[]> = {
  flights: flightsTools,
  lodging: lodgingTools,
  vehicles: vehiclesTools,
};
