// packages/orchestrator/src/intent.ts
import type { Domain } from "@hopguard/travel-core";

export type IntentType = "query" | "search" | "create" | "modify" | "cancel" | "book" | "unknown";

export interface Intent {
  type: IntentType;
  domain: Domain | "none";
  confidence: number;
}

export interface IntentHints {
  /** The caller has an active trip to book into. */
  hasActiveTrip: boolean;
}

const QUERY_PATTERNS = [
  "my trip",
  "my trips",
  "my itinerary",
  "show me my",
  "what do i have",
  "when is my",
  "what time is my",
];

const TRIP_CREATION_PATTERNS = [
  "plan a trip",
  "planning a trip",
  "new trip",
  "trip to",
  "going to",
  "want to go",
  "need to go",
  "travel to",
  "traveling to",
  "travelling to",
  "vacation in",
];

const TRIP_WORDS = ["trip", "trips", "travel", "vacation", "journey"];

// first match wins; flights before lodging before vehicles
const DOMAIN_KEYWORDS: [Domain, string[]][] = [
  ["flights", ["flight", "flights", "fly", "flying", "airport", "airports", "airline", "plane"]],
  ["lodging", ["hotel", "hotels", "room", "rooms", "stay", "accommodation", "lodge", "inn", "resort"]],
  ["vehicles", ["car", "cars", "vehicle", "vehicles", "rent", "rental", "drive", "suv"]],
];

const CANCEL_WORDS = ["cancel", "delete", "remove"];
const MODIFY_WORDS = ["change", "modify", "update", "reschedule"];
const BOOK_WORDS = ["book", "reserve", "add", "get me", "find me", "i need", "i want"];

function mentions(lower: string, phrases: readonly string[]): boolean {
  return phrases.some((p) => new RegExp(`\\b${p}\\b`).test(lower));
}

export function domainOf(lower: string): Domain | undefined {
  return DOMAIN_KEYWORDS.find(([, words]) => mentions(lower, words))?.[0];
}

/**
 * Pattern classification, in order: itinerary queries, trip creation
 * (only without a domain keyword), domain keywords, nothing.
 */
export function classifyIntent(message: string, hints: IntentHints = { hasActiveTrip: false }): Intent {
  const lower = message.toLowerCase();
  const domain = domainOf(lower);

  if (mentions(lower, QUERY_PATTERNS)) {
    return { type: "query", domain: domain ?? "none", confidence: 0.9 };
  }

  if (!domain && mentions(lower, TRIP_CREATION_PATTERNS)) {
    return { type: "create", domain: "none", confidence: 0.8 };
  }

  if (domain) {
    let type: IntentType = "search";
    if (mentions(lower, CANCEL_WORDS)) type = "cancel";
    else if (mentions(lower, MODIFY_WORDS)) type = "modify";
    else if (hints.hasActiveTrip && mentions(lower, BOOK_WORDS)) type = "book";
    return { type, domain, confidence: 0.8 };
  }

  return { type: "unknown", domain: "none", confidence: mentions(lower, TRIP_WORDS) ? 0.5 : 0 };
}
