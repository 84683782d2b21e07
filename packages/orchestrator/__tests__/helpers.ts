import type { HopCallOptions, HopClient, HopMethod, HopResponse } from "@hopguard/enforcement";
import type { ItineraryItemInput, Trip, UserContext } from "@hopguard/travel-core";
import type { ContextProvider } from "../src";

export interface Seen {
  method: HopMethod;
  url: string;
  body: unknown;
  call?: HopCallOptions;
}

export function stubClient(answer: (method: HopMethod, url: string, body: unknown) => { status: number; body: unknown }) {
  const seen: Seen[] = [];
  const request = async (method: HopMethod, url: string, body?: unknown, call?: HopCallOptions): Promise<HopResponse> => {
    seen.push({ method, url, body, call });
    const a = answer(method, url, body);
    return { status: a.status, headers: new Headers(), body: a.body };
  };
  const client: HopClient = {
    identity: "orchestrator",
    request,
    getJson: (url, call) => request("GET", url, undefined, call),
    postJson: (url, body, call) => request("POST", url, body, call),
  };
  return { client, seen };
}

export interface MemoryContext extends ContextProvider {
  contexts: Map<string, UserContext>;
  trips: Trip[];
  appended: { tripId: string; item: ItineraryItemInput }[];
  failAppend: boolean;
}

/** In-process context service. */
export function memoryContext(initial: Record<string, UserContext> = {}): MemoryContext {
  const store: MemoryContext = {
    contexts: new Map(Object.entries(initial)),
    trips: [],
    appended: [],
    failAppend: false,
    async getContext(callerId) {
      return store.contexts.get(callerId);
    },
    async createTrip(callerId, destination) {
      const trip: Trip = {
        trip_id: `trip-${store.trips.length + 1}`,
        user_id: callerId,
        destination,
        name: `Trip to ${destination}`,
        status: "planning",
      };
      store.trips.push(trip);
      return trip;
    },
    async appendItineraryItem(tripId, item) {
      if (store.failAppend) throw new Error("itinerary store down");
      store.appended.push({ tripId, item });
    },
  };
  return store;
}

export const denverTrip: Trip = {
  trip_id: "trip-9",
  user_id: "user-1",
  name: "Ski week",
  destination: "Denver",
  start_date: "2025-02-01",
  end_date: "2025-02-07",
  status: "planning",
};

export function contextWithTrip(): UserContext {
  return {
    user: { user_id: "user-1", preferences: { full_name: "Ana Test", email: "ana@example.com" } },
    active_trip: denverTrip,
    all_trips: [denverTrip],
    itinerary: [
      {
        trip_id: "trip-9",
        item_type: "flight",
        status: "confirmed",
        details: { flight_number: "BL-20", origin: "BOS", destination: "DEN" },
      },
    ],
    recent_messages: [],
  };
}
