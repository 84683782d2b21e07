// packages/enforcement/src/decision-client.ts
import { DecisionUnavailableError } from "@hopguard/errors";
import {
  decide,
  decisionSchema,
  type AuthorizationRequest,
  type Decision,
  type PolicyRegistry,
} from "@hopguard/policy-core";
import { createHopClient, type HopClient, type HopResponse } from "./hop-client";

export interface DecideOptions {
  signal?: AbortSignal;
}

/**
 * How an enforcement point reaches the decision point.
 * Any rejection is treated as "decision unavailable".
 */
export interface DecisionClient {
  decide(req: AuthorizationRequest, opts?: DecideOptions): Promise<Decision>;
}

/** In-process decisions against a loaded registry. */
export function createLocalDecisionClient(registry: PolicyRegistry): DecisionClient {
  return {
    decide: async (req) => decide(registry, req),
  };
}

export interface HttpDecisionClientOptions {
  /** PDP base URL, e.g. http://pdp:8181 */
  baseUrl: string;
  /** Identity presented to the PDP. */
  identity: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  client?: HopClient;
}

/** Decisions from the PDP service (`POST /v1/decide`). */
export function createHttpDecisionClient(opts: HttpDecisionClientOptions): DecisionClient {
  const base = opts.baseUrl.replace(/\/+$/, "");
  const client =
    opts.client ??
    createHopClient({ identity: opts.identity, timeoutMs: opts.timeoutMs, fetchImpl: opts.fetchImpl });

  return {
    async decide(req, decideOpts = {}) {
      let res: HopResponse;
      try {
        res = await client.postJson(`${base}/v1/decide`, req, { signal: decideOpts.signal });
      } catch (e) {
        throw new DecisionUnavailableError(
          `PDP unreachable: ${e instanceof Error ? e.message : String(e)}`,
        );
      }

      if (res.status !== 200) {
        throw new DecisionUnavailableError(`PDP answered ${res.status}`);
      }
      const parsed = decisionSchema.safeParse(res.body);
      if (!parsed.success) {
        throw new DecisionUnavailableError("PDP answer malformed");
      }
      return parsed.data;
    },
  };
}
