// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { classifyModelFailure } from "./retry.ts";
import { ModelError } from "./types.ts";

describe("classifyModelFailure", () => {
  it("maps rate limits to rate_limited", () => {
    expect(classifyModelFailure(new ModelError("rate_limit", true, "slow down", 429))).toEqual({
      kind: "rate_limited",
      status: 429,
    });
  });

  it("maps overload statuses to unavailable", () => {
    expect(classifyModelFailure(new ModelError("api_error", false, "overloaded", 529))).toEqual({
      kind: "unavailable",
      status: 529,
    });
    expect(classifyModelFailure(new ModelError("api_error", false, "down", 503))).toEqual({
      kind: "unavailable",
      status: 503,
    });
  });

  it("maps other 5xx to server", () => {
    expect(classifyModelFailure(new ModelError("api_error", false, "boom", 500))).toEqual({
      kind: "server",
      status: 500,
    });
  });

  it("maps connection errors without a status to network", () => {
    expect(classifyModelFailure(new ModelError("api_error", true, "connection error"))).toEqual({ kind: "network" });
  });

  it("maps timeouts to timeout", () => {
    expect(classifyModelFailure(new ModelError("timeout", true, "request timed out"))).toEqual({ kind: "timeout" });
  });

  it("leaves auth and client errors unclassified", () => {
    expect(classifyModelFailure(new ModelError("auth", false, "bad key", 401))).toBeUndefined();
    expect(classifyModelFailure(new ModelError("api_error", false, "bad request", 400))).toBeUndefined();
  });
});
