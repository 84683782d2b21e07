// packages/errors/src/express.ts
import type { ErrorRequestHandler, RequestHandler } from "express";
import { errorBody, isHopError, statusOf } from "./errors";

/**
 * Terminal Express error handler. Hop errors render as-is; anything else
 * is logged and rendered as a generic internal_error.
 */
export function hopErrorHandler(tag = "app"): ErrorRequestHandler {
  return (err, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    // body-parser throws SyntaxError with status 400 on bad JSON
    if (!isHopError(err) && err instanceof SyntaxError) {
      res.status(400).json({
        success: false,
        error: "validation_error",
        message: "Malformed JSON body",
      });
      return;
    }

    if (!isHopError(err)) {
      console.error(`[${tag}:error]`, {
        path: req.path,
        method: req.method,
        message: err instanceof Error ? err.message : String(err),
      });
    }

    res.status(statusOf(err)).json(errorBody(err));
  };
}

/** 404 for anything no router claimed. */
export function notFoundHandler(): RequestHandler {
  return (_req, res) => {
    res.status(404).json({ success: false, error: "not_found", message: "Not found" });
  };
}
