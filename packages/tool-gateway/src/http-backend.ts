// packages/tool-gateway/src/http-backend.ts
import { UpstreamUnavailableError } from "@hopguard/errors";
import type { HopClient, HopMethod } from "@hopguard/enforcement";
import type { Domain } from "@hopguard/travel-core";
import { BackendError, type RecordBackend } from "./backend";

interface BackendRoutes {
  search: string;
  /** Field of the search response holding the result list. */
  searchKey: string;
  book: string;
  get: string;
  cancel: string;
  locations: string;
  locationsKey: string;
  details: string;
}

export const BACKEND_ROUTES: Record<Domain, BackendRoutes> = {
  flights: {
    search: "/api/v1/flights/search",
    searchKey: "flights",
    book: "/api/v1/bookings",
    get: "/api/v1/bookings/:id",
    cancel: "/api/v1/bookings/:id",
    locations: "/api/v1/airports",
    locationsKey: "airports",
    details: "/api/v1/flights/:id",
  },
  lodging: {
    search: "/api/v1/hotels/search",
    searchKey: "hotels",
    book: "/api/v1/bookings",
    get: "/api/v1/bookings/:id",
    cancel: "/api/v1/bookings/:id",
    locations: "/api/v1/cities",
    locationsKey: "cities",
    details: "/api/v1/hotels/:id",
  },
  vehicles: {
    search: "/api/v1/vehicles/search",
    searchKey: "vehicles",
    book: "/api/v1/rentals",
    get: "/api/v1/rentals/:id",
    cancel: "/api/v1/rentals/:id",
    locations: "/api/v1/locations",
    locationsKey: "locations",
    details: "/api/v1/vehicles/:id",
  },
};

export interface HttpBackendOptions {
  baseUrl: string;
  domain: Domain;
  client: HopClient;
}

function withId(route: string, id: string) {
  return route.replace(":id", encodeURIComponent(id));
}

function listFrom(body: unknown, key: string, url: string): unknown[] {
  if (Array.isArray(body)) return body;
  const inner: unknown = body && typeof body === "object" ? Reflect.get(body, key) : undefined;
  if (Array.isArray(inner)) return inner;
  throw new UpstreamUnavailableError(`Unexpected list shape from ${url}`);
}

/**
 * RecordBackend over the domain service's REST API. 4xx answers are
 * business errors; 5xx and transport failures are upstream failures.
 */
export function createHttpBackend(opts: HttpBackendOptions): RecordBackend {
  const base = opts.baseUrl.replace(/\/+$/, "");
  const routes = BACKEND_ROUTES[opts.domain];

  async function call(method: HopMethod, path: string, body?: unknown): Promise<unknown> {
    const url = `${base}${path}`;
    const res = await opts.client.request(method, url, body);

    if (res.status >= 500) {
      throw new UpstreamUnavailableError(`Backend answered ${res.status} for ${method} ${path}`);
    }
    if (res.status >= 400) {
      throw new BackendError(`Backend rejected ${method} ${path} (${res.status})`, {
        status: res.status,
        body: res.body,
      });
    }
    return res.body;
  }

  return {
    async search(criteria) {
      return listFrom(await call("POST", routes.search, criteria), routes.searchKey, routes.search);
    },
    book: (args) => call("POST", routes.book, args),
    get: (id) => call("GET", withId(routes.get, id)),
    cancel: (id) => call("DELETE", withId(routes.cancel, id)),
    async listLocations(filter) {
      const qs = filter && Object.keys(filter).length ? `?${new URLSearchParams(filter).toString()}` : "";
      const path = `${routes.locations}${qs}`;
      return listFrom(await call("GET", path), routes.locationsKey, routes.locations);
    },
    details: (id) => call("GET", withId(routes.details, id)),
  };
}
