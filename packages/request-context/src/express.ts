// packages/request-context/src/express.ts
import { AsyncResource } from "async_hooks";
import type { RequestHandler } from "express";
import { runWithHopContext } from "./context";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

/**
 * Bind a HopContext to every inbound request. An incoming x-request-id is
 * kept for correlation when it looks sane; otherwise a new one is minted.
 */
export function withHopContext(): RequestHandler {
  return (req, _res, next) => {
    const incoming = req.get("x-request-id");
    const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : undefined;

    runWithHopContext(
      {
        request: {
          requestId,
          method: req.method,
          path: req.path,
          ip: req.ip,
          userAgent: req.get("user-agent") ?? undefined,
        },
      },
      () => next(),
    );
  };
}

/**
 * Wrap a middleware that calls `next` from stream callbacks (body parsers)
 * so the rest of the chain resumes inside the current hop context.
 */
export function keepHopContext(handler: RequestHandler): RequestHandler {
  return (req, res, next) => handler(req, res, AsyncResource.bind(next));
}
