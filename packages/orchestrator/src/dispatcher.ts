// packages/orchestrator/src/dispatcher.ts
import { RateLimitedError, UpstreamUnavailableError, errorFromBody } from "@hopguard/errors";
import type { HopClient } from "@hopguard/enforcement";
import { agentResponseSchema, type AgentRequest, type AgentResponse } from "@hopguard/travel-core";
import type { AgentEntry } from "./registry";

export interface DispatchOptions {
  onBehalfOf?: string;
}

export interface AgentDispatcher {
  dispatch(agent: AgentEntry, req: AgentRequest, opts?: DispatchOptions): Promise<AgentResponse>;
}

/**
 * Calls an agent's /invoke with this orchestrator's identity headers.
 * Failures the agent answered with carry its status in `detail.status`.
 */
export function createHttpDispatcher(client: HopClient): AgentDispatcher {
  return {
    async dispatch(agent, req, opts = {}) {
      const res = await client.postJson(`${agent.url}/invoke`, req, {
        target: agent.identity,
        onBehalfOf: opts.onBehalfOf,
      });
      if (res.status === 429) {
        throw new RateLimitedError(`Agent ${agent.identity} answered 429`, { status: res.status });
      }
      if (res.status !== 200) {
        throw (
          errorFromBody(res.body) ??
          new UpstreamUnavailableError(`Agent ${agent.identity} answered ${res.status}`, { status: res.status })
        );
      }
      const parsed = agentResponseSchema.safeParse(res.body);
      if (!parsed.success) {
        throw new UpstreamUnavailableError(`Agent ${agent.identity} answer malformed`, { status: res.status });
      }
      return parsed.data;
    },
  };
}
