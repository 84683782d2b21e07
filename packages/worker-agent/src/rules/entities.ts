// packages/worker-agent/src/rules/entities.ts
import { extractCity, extractRoute, type DispatchContext } from "@hopguard/travel-core";
import type { RuleInput } from "./rule";

const DATE = /\b(\d{4}-\d{2}-\d{2})\b/g;
const RECORD_ID = /\b([A-Z]{2,3}-[A-Z0-9][A-Z0-9-]*)\b/;

export function datesIn(message: string): string[] {
  return [...message.matchAll(DATE)].map((m) => m[1] ?? "").filter(Boolean);
}

export const firstDate = (input: RuleInput) => datesIn(input.message)[0];
export const secondDate = (input: RuleInput) => datesIn(input.message)[1];

/** Identifier-looking token such as "BK-1042" or "HT-7". */
export const recordIdIn = (input: RuleInput) => RECORD_ID.exec(input.message)?.[1];

export const cityIn = (input: RuleInput) => extractCity(input.message);
export const originIn = (input: RuleInput) => extractRoute(input.message).origin?.airport;
export const destinationIn = (input: RuleInput) => extractRoute(input.message).destination?.airport;

export const tripDestination = (ctx: DispatchContext) => ctx.active_trip?.destination;
export const tripStart = (ctx: DispatchContext) => ctx.active_trip?.start_date ?? undefined;
export const tripEnd = (ctx: DispatchContext) => ctx.active_trip?.end_date ?? undefined;

export function preference(key: string) {
  return (ctx: DispatchContext): unknown => ctx.user_preferences[key];
}

export function countIn(noun: RegExp) {
  return (input: RuleInput): number | undefined => {
    const m = new RegExp(`\\b(\\d{1,2})\\s+${noun.source}`).exec(input.lower);
    return m?.[1] ? Number(m[1]) : undefined;
  };
}
