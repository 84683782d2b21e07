import { describe, it, expect } from "vitest";
import { UpstreamUnavailableError } from "@hopguard/errors";
import { createHttpContextProvider, selectTrip, toDispatchContext, emptyUserContext } from "../src";
import { contextWithTrip, denverTrip, stubClient } from "./helpers";

describe("createHttpContextProvider", () => {
  it("fetches and validates a user's context", async () => {
    const { client, seen } = stubClient(() => ({
      status: 200,
      body: { active_trip: { trip_id: "t-1", destination: "Miami" }, itinerary: [] },
    }));
    const provider = createHttpContextProvider({ baseUrl: "http://itinerary/", client });

    const ctx = await provider.getContext("user 1");

    expect(seen[0]?.url).toBe("http://itinerary/api/v1/users/user%201/context");
    expect(ctx?.active_trip).toEqual({ trip_id: "t-1", destination: "Miami", status: "planning" });
    expect(ctx?.all_trips).toEqual([]);
  });

  it("returns undefined for an unknown user", async () => {
    const { client } = stubClient(() => ({ status: 404, body: { detail: "not found" } }));
    expect(await createHttpContextProvider({ baseUrl: "http://itinerary", client }).getContext("u")).toBeUndefined();
  });

  it("rejects malformed or failed answers", async () => {
    const malformed = stubClient(() => ({ status: 200, body: { itinerary: "none" } }));
    await expect(
      createHttpContextProvider({ baseUrl: "http://itinerary", client: malformed.client }).getContext("u"),
    ).rejects.toThrow("Context service answer malformed");

    const failed = stubClient(() => ({ status: 500, body: "oops" }));
    await expect(
      createHttpContextProvider({ baseUrl: "http://itinerary", client: failed.client }).getContext("u"),
    ).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });

  it("creates a trip from a wrapped or bare answer", async () => {
    const wrapped = stubClient(() => ({ status: 201, body: { trip: { trip_id: "t-2", destination: "Tokyo" } } }));
    const trip = await createHttpContextProvider({ baseUrl: "http://itinerary", client: wrapped.client }).createTrip(
      "user-1",
      "Tokyo",
    );
    expect(trip).toEqual({ trip_id: "t-2", destination: "Tokyo", status: "planning" });
    expect(wrapped.seen[0]?.body).toEqual({ user_id: "user-1", destination: "Tokyo", name: "Trip to Tokyo" });

    const bare = stubClient(() => ({ status: 200, body: { trip_id: "t-3", status: "booked" } }));
    expect(
      await createHttpContextProvider({ baseUrl: "http://itinerary", client: bare.client }).createTrip("u", "Paris"),
    ).toEqual({ trip_id: "t-3", status: "booked" });
  });

  it("posts one itinerary item per append", async () => {
    const { client, seen } = stubClient(() => ({ status: 201, body: { item_id: "i-1" } }));
    await createHttpContextProvider({ baseUrl: "http://itinerary", client }).appendItineraryItem("t-1", {
      item_type: "car_rental",
      details: { rental_id: "RN-1" },
    });

    expect(seen).toHaveLength(1);
    expect(seen[0]?.method).toBe("POST");
    expect(seen[0]?.url).toBe("http://itinerary/api/v1/itinerary");
    expect(seen[0]?.body).toEqual({
      trip_id: "t-1",
      item_type: "car_rental",
      status: "pending",
      details: { rental_id: "RN-1" },
    });
  });
});

describe("selectTrip", () => {
  const other = { ...denverTrip, trip_id: "trip-2", destination: "Austin" };

  it("prefers the named trip", () => {
    const ctx = { ...contextWithTrip(), all_trips: [denverTrip, other] };
    expect(selectTrip(ctx, "trip-2")).toBe(other);
  });

  it("falls back to the active trip for unknown ids", () => {
    expect(selectTrip(contextWithTrip(), "nope")?.trip_id).toBe("trip-9");
  });

  it("is undefined without trips", () => {
    expect(selectTrip(emptyUserContext())).toBeUndefined();
  });
});

describe("toDispatchContext", () => {
  it("keeps only the chosen trip's items", () => {
    const ctx = contextWithTrip();
    ctx.itinerary.push({ trip_id: "trip-2", item_type: "hotel", status: "pending", details: {} });

    const snapshot = toDispatchContext(ctx, denverTrip);

    expect(snapshot.prior_itinerary_items).toHaveLength(1);
    expect(snapshot.active_trip).toEqual(denverTrip);
    expect(snapshot.active_trip).not.toBe(denverTrip);
  });
});
