// pattern: Functional Core

/**
 * Retry classification shared across all model adapters.
 * Adapters translate SDK errors into ModelError; this maps ModelError onto the
 * transport's failure kinds so model calls run under the same RetryPolicy as HTTP.
 */

import { classifyFailure } from "../transport/classify.ts";
import type { FailureClassification } from "../transport/types.ts";
import { ModelError } from "./types.ts";

export function classifyModelFailure(error: unknown): FailureClassification | undefined {
  if (!(error instanceof ModelError)) {
    return classifyFailure(error);
  }

  switch (error.code) {
    case "rate_limit":
      return { kind: "rate_limited", status: error.status };
    case "timeout":
      return { kind: "timeout" };
    case "auth":
      return undefined;
    case "api_error":
      if (error.status === undefined) {
        return error.retryable ? { kind: "network" } : undefined;
      }
      // 529 is Anthropic's "overloaded"
      if (error.status === 503 || error.status === 529) {
        return { kind: "unavailable", status: error.status };
      }
      if (error.status >= 500) {
        return { kind: "server", status: error.status };
      }
      return undefined;
  }
}
