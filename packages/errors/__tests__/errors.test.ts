import { describe, it, expect, vi } from "vitest";
import express from "express";
import request from "supertest";

import {
  DecisionUnavailableError,
  ForbiddenError,
  RateLimitedError,
  ToolError,
  UpstreamTimeoutError,
  ValidationError,
  errorBody,
  errorFromBody,
  hopErrorHandler,
  isTransportError,
  notFoundHandler,
  statusOf,
  userMessage,
} from "../src";

describe("errorBody / statusOf", () => {
  it("renders hop errors with their kind and status", () => {
    const err = new ForbiddenError("nope");
    expect(errorBody(err)).toEqual({ success: false, error: "forbidden", message: "nope" });
    expect(statusOf(err)).toBe(403);
    expect(err).toBeInstanceOf(ForbiddenError);
  });

  it("collapses unknown errors to internal_error", () => {
    expect(errorBody(new Error("db password leaked here"))).toEqual({
      success: false,
      error: "internal_error",
      message: "Internal error",
    });
    expect(statusOf("boom")).toBe(500);
  });

  it("keeps tool errors at status 200", () => {
    const err = new ToolError("book_hotel", "sold out");
    expect(err.status).toBe(200);
    expect(err.tool).toBe("book_hotel");
    expect(err.kind).toBe("tool_error");
  });
});

describe("isTransportError", () => {
  it("is true only for upstream failures", () => {
    expect(isTransportError(new UpstreamTimeoutError())).toBe(true);
    expect(isTransportError(new DecisionUnavailableError())).toBe(false);
  });
});

describe("errorFromBody", () => {
  it("rebuilds a typed error from a remote failure body", () => {
    const err = errorFromBody({ success: false, error: "decision_unavailable", message: "pdp down" });
    expect(err).toBeInstanceOf(DecisionUnavailableError);
    expect(err?.message).toBe("pdp down");
  });

  it("rebuilds a rate limit refusal", () => {
    const err = errorFromBody({ success: false, error: "rate_limited", message: "Too many requests" });
    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err?.status).toBe(429);
    expect(isTransportError(err)).toBe(false);
  });

  it("returns undefined for bodies it does not recognise", () => {
    expect(errorFromBody({ error: "teapot" })).toBeUndefined();
    expect(errorFromBody("text")).toBeUndefined();
    expect(errorFromBody(null)).toBeUndefined();
  });
});

describe("hopErrorHandler", () => {
  function makeApp(err: unknown) {
    const app = express();
    app.use(express.json());
    app.post("/x", (req, res) => res.json({ got: req.body }));
    app.get("/boom", () => {
      throw err;
    });
    app.use(notFoundHandler());
    app.use(hopErrorHandler("test"));
    return app;
  }

  it("renders hop errors", async () => {
    const res = await request(makeApp(new ValidationError("message: Required"))).get("/boom");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      success: false,
      error: "validation_error",
      message: "message: Required",
    });
  });

  it("logs and hides unknown errors", async () => {
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    const res = await request(makeApp(new Error("secret detail"))).get("/boom");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, error: "internal_error", message: "Internal error" });
    expect(errSpy).toHaveBeenCalledTimes(1);
    expect(errSpy.mock.calls[0]?.[0]).toBe("[test:error]");

    errSpy.mockRestore();
  });

  it("turns malformed JSON into a validation error", async () => {
    const res = await request(makeApp(undefined))
      .post("/x")
      .set("content-type", "application/json")
      .send("{not json");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("validation_error");
    expect(res.body.message).toBe("Malformed JSON body");
  });

  it("answers 404 for unknown routes", async () => {
    const res = await request(makeApp(undefined)).get("/nowhere");
    expect(res.status).toBe(404);
    expect(res.body.error).toBe("not_found");
  });
});

describe("userMessage", () => {
  it("gives a fixed message per kind", () => {
    expect(userMessage("upstream_unavailable")).toBe("A travel service is unavailable right now. Please try again later.");
    expect(userMessage("rate_limited")).toBe("Too many requests. Please wait a moment and try again.");
  });
});
