// packages/request-context/src/context.ts

import { AsyncLocalStorage } from "async_hooks";
import type { HopContext, HopRequestMeta } from "./types";

export type HopContextOverrides = Omit<Partial<HopContext>, "request"> & {
  request?: Partial<HopRequestMeta>;
};

export function createHopContext(overrides: HopContextOverrides = {}): HopContext {
  const reqOverrides: Partial<HopRequestMeta> = overrides.request ?? {};

  const request: HopRequestMeta = {
    requestId: reqOverrides.requestId ?? `hop_${Math.random().toString(36).slice(2)}`,
    startedAt: reqOverrides.startedAt ?? new Date().toISOString(),
    method: reqOverrides.method ?? "UNKNOWN",
    path: reqOverrides.path ?? "UNKNOWN",
    ip: reqOverrides.ip,
    userAgent: reqOverrides.userAgent,
  };

  return {
    request,
    hop: overrides.hop,
    user: overrides.user,
    authz: overrides.authz,
    routing: overrides.routing,
    extras: overrides.extras ?? {},
  };
}

export function mergeHopContext(base: HopContext, updates: Partial<HopContext>): HopContext {
  return {
    ...base,
    ...updates,
    request: { ...base.request, ...(updates.request ?? {}) },
    hop: updates.hop ?? base.hop,
    user: updates.user ?? base.user,
    authz: { ...base.authz, ...updates.authz },
    routing: { ...base.routing, ...updates.routing },
    extras: { ...(base.extras ?? {}), ...(updates.extras ?? {}) },
  };
}

const hopAls = new AsyncLocalStorage<HopContext>();

/**
 * Run a function with a fresh HopContext bound to the current async call chain.
 * Called once per inbound HTTP request.
 */
export function runWithHopContext<T>(overrides: HopContextOverrides, fn: () => T): T {
  return hopAls.run(createHopContext(overrides), fn);
}

/**
 * Current HopContext for this async call chain, or undefined outside
 * runWithHopContext.
 */
export function getHopContext(): HopContext | undefined {
  return hopAls.getStore();
}

/**
 * Merge updates into the current context in place, so references held
 * elsewhere (the access log, for one) see them.
 */
export function updateHopContext(updates: Partial<HopContext>): void {
  const current = hopAls.getStore();
  if (!current) return;

  Object.assign(current, mergeHopContext(current, updates));
}

/** Request id of the current hop, if any. */
export function currentRequestId(): string | undefined {
  return hopAls.getStore()?.request.requestId;
}
