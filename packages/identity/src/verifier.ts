// packages/identity/src/verifier.ts
import { createRemoteJWKSet, jwtVerify, type JWTPayload, type JWTVerifyGetKey } from "jose";
import type { EndUserIdentity } from "@hopguard/request-context";

export interface BearerVerifierConfig {
  /** Expected issuer, with or without trailing slash. */
  issuer: string;
  audience: string;
  /** Defaults to `${issuer}/.well-known/jwks.json`. */
  jwksUri?: string;
  /** Key source to use instead of fetching jwksUri. */
  keySet?: JWTVerifyGetKey;
  scopeClaim?: string;
}

export type VerifyResult =
  | { ok: true; identity: EndUserIdentity }
  | { ok: false; error: "invalid_token"; detail?: string };

function escapeForRegex(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function toIdentity(payload: JWTPayload, issuer: string, scopeClaim: string): EndUserIdentity {
  const sub = typeof payload.sub === "string" ? payload.sub : "";
  if (!sub) {
    throw new Error('missing "sub" claim in token');
  }

  const rawScope = payload[scopeClaim];
  return {
    sub,
    issuer,
    email: typeof payload.email === "string" ? payload.email : undefined,
    scopes: typeof rawScope === "string" ? rawScope.split(" ").filter(Boolean) : undefined,
    raw: { ...payload },
  };
}

/**
 * Token verifier for end users at the entry hop. Usable outside Express.
 */
export function createBearerVerifier(
  config: BearerVerifierConfig,
): (token: string) => Promise<VerifyResult> {
  const issuerNoSlash = config.issuer.replace(/\/+$/, "");
  const issuerPattern = new RegExp(`^${escapeForRegex(issuerNoSlash)}\\/?$`);
  const keys =
    config.keySet ??
    createRemoteJWKSet(new URL(config.jwksUri || `${issuerNoSlash}/.well-known/jwks.json`));
  const scopeClaim = config.scopeClaim ?? "scope";

  return async (token) => {
    try {
      const { payload } = await jwtVerify(token, keys, {
        audience: config.audience,
        algorithms: ["RS256"],
        clockTolerance: "60s",
      });

      const iss = String(payload.iss || "");
      if (!issuerPattern.test(iss)) {
        return { ok: false, error: "invalid_token", detail: `unexpected "iss" claim value: ${iss}` };
      }

      return { ok: true, identity: toIdentity(payload, issuerNoSlash, scopeClaim) };
    } catch (e) {
      return {
        ok: false,
        error: "invalid_token",
        detail: e instanceof Error ? e.message : String(e),
      };
    }
  };
}
