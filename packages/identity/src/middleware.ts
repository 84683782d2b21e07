// packages/identity/src/middleware.ts
import type { RequestHandler } from "express";
import { updateHopContext } from "@hopguard/request-context";
import type { VerifyResult } from "./verifier";

/**
 * Require a valid end-user bearer token. The verified user lands on
 * req.user and in the request context.
 */
export function requireEndUser(verify: (token: string) => Promise<VerifyResult>): RequestHandler {
  return (req, res, next) => {
    const auth = req.get("authorization") ?? "";
    const token = auth.startsWith("Bearer ") ? auth.slice(7).trim() : "";

    if (!token) {
      res.status(401).json({ success: false, error: "unauthorized", message: "Missing bearer token" });
      return;
    }

    verify(token)
      .then((result) => {
        if (!result.ok) {
          console.warn("[identity:invalid_token]", { detail: result.detail });
          res.status(401).json({ success: false, error: "unauthorized", message: "Invalid token" });
          return;
        }
        req.user = result.identity;
        updateHopContext({ user: result.identity });
        next();
      })
      .catch(next);
  };
}
