// packages/orchestrator/src/context.ts
import { z } from "zod";
import { UpstreamUnavailableError, errorFromBody } from "@hopguard/errors";
import type { HopClient, HopResponse } from "@hopguard/enforcement";
import {
  itineraryItemSchema,
  tripSchema,
  userContextSchema,
  type DispatchContext,
  type ItineraryItemInput,
  type Trip,
  type UserContext,
} from "@hopguard/travel-core";

/** Itinerary/context collaborator. */
export interface ContextProvider {
  /** undefined when the caller is not known to the service. */
  getContext(callerId: string): Promise<UserContext | undefined>;
  createTrip(callerId: string, destination: string): Promise<Trip>;
  appendItineraryItem(tripId: string, item: ItineraryItemInput): Promise<void>;
}

export interface HttpContextProviderOptions {
  baseUrl: string;
  client: HopClient;
}

const wrappedTripSchema = z.object({ trip: tripSchema });

function failure(res: HopResponse, what: string): Error {
  return errorFromBody(res.body) ?? new UpstreamUnavailableError(`Context service answered ${res.status} to ${what}`);
}

export function createHttpContextProvider(opts: HttpContextProviderOptions): ContextProvider {
  const base = opts.baseUrl.replace(/\/+$/, "");

  return {
    async getContext(callerId) {
      const res = await opts.client.getJson(`${base}/api/v1/users/${encodeURIComponent(callerId)}/context`);
      if (res.status === 404) return undefined;
      if (res.status !== 200) throw failure(res, "context");

      const parsed = userContextSchema.safeParse(res.body);
      if (!parsed.success) throw new UpstreamUnavailableError("Context service answer malformed");
      return parsed.data;
    },

    async createTrip(callerId, destination) {
      const res = await opts.client.postJson(`${base}/api/v1/trips`, {
        user_id: callerId,
        destination,
        name: `Trip to ${destination}`,
      });
      if (res.status !== 200 && res.status !== 201) throw failure(res, "create trip");

      // either { trip: {...} } or the trip itself
      const wrapped = wrappedTripSchema.safeParse(res.body);
      if (wrapped.success) return wrapped.data.trip;
      const bare = tripSchema.safeParse(res.body);
      if (!bare.success) throw new UpstreamUnavailableError("Context service returned no trip");
      return bare.data;
    },

    async appendItineraryItem(tripId, item) {
      const body = itineraryItemSchema.parse({ ...item, trip_id: tripId });
      const res = await opts.client.postJson(`${base}/api/v1/itinerary`, body);
      if (res.status !== 200 && res.status !== 201) throw failure(res, "append itinerary item");
    },
  };
}

export function emptyUserContext(): UserContext {
  return { user: undefined, active_trip: undefined, all_trips: [], itinerary: [], recent_messages: [] };
}

/** The trip a request works on: the named one if the caller has it, else the active one. */
export function selectTrip(ctx: UserContext, tripId?: string): Trip | undefined {
  if (tripId) {
    const named = ctx.all_trips.find((t) => t.trip_id === tripId);
    if (named) return named;
    if (ctx.active_trip?.trip_id === tripId) return ctx.active_trip;
  }
  return ctx.active_trip ?? undefined;
}

/** Snapshot handed to an agent. A copy, so nothing the agent side does leaks back. */
export function toDispatchContext(ctx: UserContext, trip: Trip | undefined): DispatchContext {
  const prefs = ctx.user?.preferences;
  const preferences =
    prefs && typeof prefs === "object" && !Array.isArray(prefs) ? Object.fromEntries(Object.entries(prefs)) : {};

  return structuredClone({
    active_trip: trip,
    prior_itinerary_items: trip ? ctx.itinerary.filter((i) => !i.trip_id || i.trip_id === trip.trip_id) : ctx.itinerary,
    user_preferences: preferences,
  });
}
