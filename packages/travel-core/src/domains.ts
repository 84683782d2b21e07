// packages/travel-core/src/domains.ts

export const DOMAINS = ["flights", "lodging", "vehicles"] as const;

export type Domain = (typeof DOMAINS)[number];

export function isDomain(value: unknown): value is Domain {
  return typeof value === "string" && (DOMAINS as readonly string[]).includes(value);
}

/** Itinerary item type recorded for a booking made in each domain. */
export const ITEM_TYPE_BY_DOMAIN: Record<Domain, "flight" | "hotel" | "car_rental"> = {
  flights: "flight",
  lodging: "hotel",
  vehicles: "car_rental",
};
