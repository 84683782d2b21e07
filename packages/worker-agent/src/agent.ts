// packages/worker-agent/src/agent.ts
import { HopError, userMessage } from "@hopguard/errors";
import { updateHopContext } from "@hopguard/request-context";
import type { ToolGatewayClient } from "@hopguard/tool-gateway";
import {
  emptyDispatchContext,
  type AgentRequest,
  type AgentResponse,
  type Domain,
} from "@hopguard/travel-core";
import type { FallbackClassifier } from "./fallback";
import { RULES_BY_DOMAIN, matchRule, type DispatchRule, type RuleInput } from "./rules";

export interface WorkerAgentOptions {
  identity: string;
  domain: Domain;
  gateway: ToolGatewayClient;
  /** Defaults to the domain's built-in table. */
  rules?: readonly DispatchRule[];
  fallback?: FallbackClassifier;
}

export interface ProcessOptions {
  /** Orchestrator of record, forwarded to the gateway as on-behalf-of. */
  onBehalfOf?: string;
}

export interface AgentMetrics {
  requests: number;
  rule_matches: number;
  tool_calls: number;
  tool_errors: number;
  missing_arguments: number;
  confirmations_requested: number;
  fallback_answers: number;
  capability_answers: number;
}

export interface WorkerAgent {
  readonly identity: string;
  readonly domain: Domain;
  readonly rules: readonly DispatchRule[];
  process(req: AgentRequest, opts?: ProcessOptions): Promise<AgentResponse>;
  metrics(): AgentMetrics;
}

const clip = (s: string) => (s.length > 100 ? `${s.slice(0, 100)}...` : s);

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return { result: value };
}

function summarize(rule: DispatchRule, data: Record<string, unknown>): string {
  if (typeof data.count === "number") return `Found ${data.count} ${rule.label}.`;
  if (rule.sideEffect) return `Done: ${rule.label}.`;
  return `Retrieved ${rule.label}.`;
}

export function createWorkerAgent(opts: WorkerAgentOptions): WorkerAgent {
  const rules = opts.rules ?? RULES_BY_DOMAIN[opts.domain];
  const counters: AgentMetrics = {
    requests: 0,
    rule_matches: 0,
    tool_calls: 0,
    tool_errors: 0,
    missing_arguments: 0,
    confirmations_requested: 0,
    fallback_answers: 0,
    capability_answers: 0,
  };

  function log(event: Record<string, unknown>) {
    console.log("[agent]", JSON.stringify({ agent: opts.identity, ...event }));
  }

  function capabilities(): AgentResponse {
    counters.capability_answers++;
    const tools = rules.map((r) => r.tool);
    return {
      success: true,
      message: `I can help with ${opts.domain}: ${rules.map((r) => r.label).join(", ")}.`,
      data: { capabilities: tools },
      tools_called: [],
    };
  }

  async function answerWithFallback(fallback: FallbackClassifier, message: string): Promise<AgentResponse> {
    try {
      const category = await fallback.classify(message);
      if (category !== opts.domain) return capabilities();
      const answer = await fallback.generate(message);
      counters.fallback_answers++;
      return { success: true, message: answer, data: { fallback: true, category }, tools_called: [] };
    } catch (err) {
      console.warn("[agent:fallback_error]", err instanceof Error ? err.message : String(err));
      return capabilities();
    }
  }

  async function runRule(
    rule: DispatchRule,
    input: RuleInput,
    req: AgentRequest,
    call: ProcessOptions,
  ): Promise<AgentResponse> {
    const extracted = rule.extract(input);
    if (!extracted.ok) {
      counters.missing_arguments++;
      log({ tool: rule.tool, outcome: "missing_argument", missing: extracted.missing });
      return {
        success: false,
        message: `Cannot run ${rule.label}: missing ${extracted.missing}.`,
        error: "missing_argument",
        data: { tool: rule.tool, missing: extracted.missing },
        tools_called: [],
      };
    }

    if (rule.sideEffect && req.confirm !== true) {
      counters.confirmations_requested++;
      log({ tool: rule.tool, outcome: "confirmation_required" });
      return {
        success: true,
        message: `Confirm to proceed with ${rule.label}.`,
        data: { pending_action: { tool: rule.tool, arguments: extracted.args } },
        confirmation_required: true,
        tools_called: [],
      };
    }

    const toolsCalled = [rule.tool];
    counters.tool_calls++;
    try {
      const result = await opts.gateway.callTool(rule.tool, extracted.args, { onBehalfOf: call.onBehalfOf });
      if (!result.ok) {
        counters.tool_errors++;
        log({ tool: rule.tool, outcome: "tool_error" });
        return { success: false, message: result.error, error: "tool_error", tools_called: toolsCalled };
      }
      const data = asRecord(result.data);
      log({ tool: rule.tool, outcome: "ok" });
      return { success: true, message: summarize(rule, data), data, tools_called: toolsCalled };
    } catch (err) {
      if (!(err instanceof HopError)) throw err;
      counters.tool_errors++;
      log({ tool: rule.tool, outcome: err.kind, detail: err.message });
      return { success: false, message: userMessage(err.kind), error: err.kind, tools_called: toolsCalled };
    }
  }

  return {
    identity: opts.identity,
    domain: opts.domain,
    rules,

    async process(req, call = {}) {
      counters.requests++;
      const input: RuleInput = {
        message: req.message,
        lower: req.message.toLowerCase(),
        parameters: req.parameters ?? {},
        context: req.context ?? emptyDispatchContext(),
      };

      const rule = matchRule(rules, input);
      updateHopContext({ routing: { domain: opts.domain, agent: opts.identity, tool: rule?.tool } });
      if (rule) {
        counters.rule_matches++;
        log({ rule: rule.tool, message: clip(req.message) });
        return runRule(rule, input, req, call);
      }
      return opts.fallback ? answerWithFallback(opts.fallback, req.message) : capabilities();
    },

    metrics() {
      return { ...counters };
    },
  };
}
