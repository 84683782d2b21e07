// packages/worker-agent/src/rules/shared.ts
import { hasWord, type ArgSource, type RuleInput } from "./rule";
import { recordIdIn } from "./entities";

const RECORD_WORDS = ["booking", "reservation", "rental", "confirmation"] as const;
const LOOKUP_WORDS = ["status", "check", "look up", "show", "view", "my"] as const;

export const wantsList = (noun: string) => (input: RuleInput) =>
  hasWord(input.lower, [`list ${noun}`, `which ${noun}`, `what ${noun}`, `all ${noun}`]);

export const wantsCancel = (input: RuleInput) => hasWord(input.lower, ["cancel"]);

export const wantsBooking = (input: RuleInput) => hasWord(input.lower, ["book", "reserve"]);

export const wantsLookup = (input: RuleInput) =>
  hasWord(input.lower, RECORD_WORDS) && hasWord(input.lower, LOOKUP_WORDS);

export const wantsDetails = (input: RuleInput) =>
  hasWord(input.lower, ["details", "detail", "amenities", "more about"]);

/** A record id taken from parameters under any of `keys`, else from the text. */
export function recordArg(...keys: string[]): ArgSource {
  return { params: keys, message: recordIdIn, required: true };
}
