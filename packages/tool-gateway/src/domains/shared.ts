// packages/tool-gateway/src/domains/shared.ts
import { z } from "zod";
import { placeCode } from "@hopguard/travel-core";

export const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

export const recordId = z.string().trim().min(1).max(64);

export const placeArg = z
  .string()
  .trim()
  .min(2)
  .transform((v, ctx) => {
    const code = placeCode(v);
    if (!code) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown location "${v}"` });
      return z.NEVER;
    }
    return code;
  });

export function formatDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return formatDate(d);
}

/** Missing dates default to a one-night window starting tomorrow. */
export function dateWindow(now: Date, start?: string, end?: string): { start: string; end: string } {
  const s = start ?? addDays(formatDate(now), 1);
  return { start: s, end: end ?? addDays(s, 1) };
}
