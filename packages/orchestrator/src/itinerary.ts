// packages/orchestrator/src/itinerary.ts
import type { ItineraryItem, Trip, UserContext } from "@hopguard/travel-core";

const title = (s: string) => (s ? s.charAt(0).toUpperCase() + s.slice(1) : s);

function str(details: Record<string, unknown>, key: string, fallback: string): string {
  const v = details[key];
  return typeof v === "string" || typeof v === "number" ? String(v) : fallback;
}

function itemLine(item: ItineraryItem): string {
  const status = title(item.status);
  const d = item.details;
  switch (item.item_type) {
    case "flight":
      return `- Flight ${str(d, "flight_number", str(d, "flight_id", "N/A"))}: ${str(d, "origin", "?")} -> ${str(d, "destination", "?")} [${status}]`;
    case "hotel":
      return `- ${str(d, "hotel_name", "Hotel")} [${status}]`;
    case "car_rental":
      return `- Car rental ${str(d, "company", "")}`.trimEnd() + ` [${status}]`;
  }
}

/** Plain-text answer for itinerary questions. */
export function formatItinerary(ctx: UserContext, trip: Trip | undefined): string {
  if (!trip) {
    return "You don't have any active trips. Would you like me to help you plan one?";
  }

  const lines = [trip.name ?? "Your trip", `Destination: ${trip.destination ?? "TBD"}`];
  if (trip.start_date && trip.end_date) lines.push(`Dates: ${trip.start_date} to ${trip.end_date}`);
  lines.push(`Status: ${title(trip.status)}`);

  const items = ctx.itinerary.filter((i) => !i.trip_id || i.trip_id === trip.trip_id);
  if (items.length === 0) {
    lines.push("No bookings yet. What would you like to add?");
  } else {
    lines.push("Itinerary:", ...items.map(itemLine));
  }
  return lines.join("\n");
}
