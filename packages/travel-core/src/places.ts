// packages/travel-core/src/places.ts
import { readFileSync } from "fs";
import { z } from "zod";

const placeSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  airport: z.string().regex(/^[A-Z]{3}$/),
});

export type Place = z.infer<typeof placeSchema>;

export interface PlaceMatch {
  place: Place;
  /** Offset of the match in the searched text. */
  index: number;
  /** Lower-cased word immediately before the match ("" at start). */
  preceding: string;
}

export interface Route {
  origin?: Place;
  destination?: Place;
}

let cached: readonly Place[] | undefined;

export function knownPlaces(): readonly Place[] {
  if (!cached) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../data/places.json", import.meta.url), "utf8"),
    );
    cached = Object.freeze(z.array(placeSchema).parse(raw));
  }
  return cached;
}

function escapeRe(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function firstIndex(text: string, place: Place): number {
  let best = -1;
  for (const label of [place.name, ...place.aliases]) {
    const m = new RegExp(`\\b${escapeRe(label)}\\b`, "i").exec(text);
    if (m && (best < 0 || m.index < best)) best = m.index;
  }
  // airport codes only count when written in capitals
  const code = new RegExp(`\\b${place.airport}\\b`).exec(text);
  if (code && (best < 0 || code.index < best)) best = code.index;
  return best;
}

/** Places mentioned in `text`, in order of first appearance. */
export function findPlaces(text: string, places: readonly Place[] = knownPlaces()): PlaceMatch[] {
  const out: PlaceMatch[] = [];
  for (const place of places) {
    const index = firstIndex(text, place);
    if (index < 0) continue;
    const words = text.slice(0, index).trim().split(/\s+/);
    const preceding = (words[words.length - 1] ?? "").toLowerCase();
    out.push({ place, index, preceding });
  }
  return out.sort((a, b) => a.index - b.index);
}

const ORIGIN_WORDS = new Set(["from", "leaving", "departing"]);
const DESTINATION_WORDS = new Set(["to", "in", "into", "for", "at", "near"]);

/**
 * Origin and destination named in `text`. "from X" marks an origin and
 * "to/in/for X" a destination; otherwise the first two places read as
 * origin then destination, and a lone place is the destination.
 */
export function extractRoute(text: string, places?: readonly Place[]): Route {
  const matches = findPlaces(text, places);
  const route: Route = {};
  const rest: PlaceMatch[] = [];

  for (const m of matches) {
    if (!route.origin && ORIGIN_WORDS.has(m.preceding)) route.origin = m.place;
    else if (!route.destination && DESTINATION_WORDS.has(m.preceding)) route.destination = m.place;
    else rest.push(m);
  }

  for (const m of rest) {
    if (!route.destination && (route.origin || rest.length === 1)) route.destination = m.place;
    else if (!route.origin) route.origin = m.place;
    else if (!route.destination) route.destination = m.place;
  }
  return route;
}

export function extractDestination(text: string, places?: readonly Place[]): Place | undefined {
  return extractRoute(text, places).destination;
}

/** City for stays and rentals: the destination if there is one, else the first place named. */
export function extractCity(text: string, places?: readonly Place[]): string | undefined {
  const route = extractRoute(text, places);
  return (route.destination ?? route.origin)?.name;
}

/**
 * Airport/city code for a place: three capitals pass through, names and
 * aliases resolve case-insensitively.
 */
export function placeCode(value: string, places: readonly Place[] = knownPlaces()): string | undefined {
  const v = value.trim();
  if (/^[A-Z]{3}$/.test(v)) return v;
  const lower = v.toLowerCase();
  const hit = places.find(
    (p) => p.name.toLowerCase() === lower || p.aliases.some((a) => a.toLowerCase() === lower),
  );
  return hit?.airport;
}
