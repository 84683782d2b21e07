// packages/worker-agent/src/rules/rule.ts
import type { DispatchContext } from "@hopguard/travel-core";

export interface RuleInput {
  message: string;
  /** Lower-cased message, for keyword predicates. */
  lower: string;
  parameters: Record<string, unknown>;
  context: DispatchContext;
}

export type Extracted =
  | { ok: true; args: Record<string, unknown> }
  | { ok: false; missing: string };

/**
 * Where one argument comes from, tried in order: explicit request
 * parameters, the message text, the dispatch context, a default.
 */
export interface ArgSource {
  params?: readonly string[];
  message?: (input: RuleInput) => unknown;
  context?: (ctx: DispatchContext) => unknown;
  fallback?: unknown;
  required?: boolean;
}

export interface DispatchRule {
  tool: string;
  /** Short label used in the agent's reply. */
  label: string;
  sideEffect: boolean;
  /** Argument names, mapped to "required" or "optional". */
  arguments: Readonly<Record<string, "required" | "optional">>;
  matches(input: RuleInput): boolean;
  extract(input: RuleInput): Extracted;
}

const SIDE_EFFECT_TOOL = /^(book|cancel)_/;

export function isSideEffectTool(tool: string): boolean {
  return SIDE_EFFECT_TOOL.test(tool);
}

function present(v: unknown): boolean {
  return v !== undefined && v !== null && v !== "";
}

export function resolveArgs(input: RuleInput, sources: Record<string, ArgSource>): Extracted {
  const args: Record<string, unknown> = {};

  for (const [name, src] of Object.entries(sources)) {
    let value: unknown;
    for (const key of src.params ?? [name]) {
      if (present(input.parameters[key])) {
        value = input.parameters[key];
        break;
      }
    }
    if (!present(value) && src.message) value = src.message(input);
    if (!present(value) && src.context) value = src.context(input.context);
    if (!present(value)) value = src.fallback;

    if (present(value)) args[name] = value;
    else if (src.required) return { ok: false, missing: name };
  }
  return { ok: true, args };
}

export function hasWord(lower: string, words: readonly string[]): boolean {
  return words.some((w) => new RegExp(`\\b${w}\\b`).test(lower));
}

export interface RuleDefinition {
  tool: string;
  label: string;
  when: (input: RuleInput) => boolean;
  args: Record<string, ArgSource>;
}

export function rule(def: RuleDefinition): DispatchRule {
  return {
    tool: def.tool,
    label: def.label,
    sideEffect: isSideEffectTool(def.tool),
    arguments: Object.fromEntries(
      Object.entries(def.args).map(([name, src]) => [name, src.required ? "required" : "optional"]),
    ),
    matches: def.when,
    extract: (input) => resolveArgs(input, def.args),
  };
}

/** First rule whose predicate holds. */
export function matchRule(rules: readonly DispatchRule[], input: RuleInput): DispatchRule | undefined {
  return rules.find((r) => r.matches(input));
}
