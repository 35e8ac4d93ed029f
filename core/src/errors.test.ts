/**
 * Unit tests for ApiError classification and context chaining.
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ApiError,
  ApiErrorKind,
  ErrorContext,
  RUNTIME_API_ERROR_TYPE,
  formatApiErrorKind,
  isApiError,
} from "./errors.js";
import { BACKTRACE_ENV_VAR, Backtrace } from "./backtrace.js";

const saved = process.env[BACKTRACE_ENV_VAR];

function restoreToggle(): void {
  if (saved === undefined) delete process.env[BACKTRACE_ENV_VAR];
  else process.env[BACKTRACE_ENV_VAR] = saved;
}

describe("ApiError", () => {
  afterEach(restoreToggle);

  describe("isRecoverable", () => {
    it("should be true for recoverable kinds", () => {
      const err = ApiError.from(ApiErrorKind.recoverable("Some recoverable kind"));
      expect(err.isRecoverable()).toBe(true);
    });

    it("should be false for unrecoverable kinds", () => {
      const err = ApiError.from(ApiErrorKind.unrecoverable("Some unrecoverable kind"));
      expect(err.isRecoverable()).toBe(false);
    });
  });

  describe("display", () => {
    it("should render the kind label and message", () => {
      expect(ApiError.from(ApiErrorKind.recoverable("socket hang up")).message).toBe(
        "Recoverable API error: socket hang up"
      );
      expect(new ApiError(ApiErrorKind.unrecoverable("bad token")).message).toBe(
        "Unrecoverable API error: bad token"
      );
    });

    it("should match formatApiErrorKind", () => {
      const kind = ApiErrorKind.unrecoverable("gone");
      expect(ApiError.from(kind).message).toBe(formatApiErrorKind(kind));
    });
  });

  it("should report the fixed type tag for every kind", () => {
    expect(ApiError.from(ApiErrorKind.recoverable("a")).errorType()).toBe(RUNTIME_API_ERROR_TYPE);
    expect(ApiError.from(ApiErrorKind.unrecoverable("b")).errorType()).toBe("RuntimeApiError");
  });

  it("should freeze its kind", () => {
    const err = ApiError.from(ApiErrorKind.recoverable("retry me"));
    expect(Object.isFrozen(err.kind)).toBe(true);
    expect(err.kind).toEqual({ type: "recoverable", message: "retry me" });
  });

  it("should have no cause when built from a kind", () => {
    const err = ApiError.from(ApiErrorKind.recoverable("x"));
    expect(err.cause).toBeUndefined();
    expect("cause" in err).toBe(false);
    expect(err.name).toBe("ApiError");
    expect(err).toBeInstanceOf(Error);
  });

  describe("fromContext", () => {
    it("should keep the cause and backtrace already on the context", () => {
      process.env[BACKTRACE_ENV_VAR] = "1";
      const cause = new Error("connect ECONNREFUSED");
      const backtrace = Backtrace.capture();
      const ctx = new ErrorContext(ApiErrorKind.recoverable("registry down"), { cause, backtrace });

      const err = ApiError.fromContext(ctx);

      expect(err.cause).toBe(cause);
      expect(err.backtrace()).toBe(backtrace);
      expect(err.kind).toBe(ctx.kind);
    });
  });

  describe("wrap", () => {
    beforeEach(() => {
      process.env[BACKTRACE_ENV_VAR] = "1";
    });

    it("should keep the lower-level error as cause", () => {
      const cause = new TypeError("fetch failed");
      const err = ApiError.wrap(cause, ApiErrorKind.unrecoverable("invalid response"));

      expect(err.cause).toBe(cause);
      expect(err.isRecoverable()).toBe(false);
    });

    it("should reuse the backtrace of a cause that exposes one", () => {
      const inner = ApiError.from(ApiErrorKind.recoverable("inner"));
      const outer = ApiError.wrap(inner, ApiErrorKind.recoverable("outer"));

      expect(inner.backtrace()).toBeDefined();
      expect(outer.backtrace()).toBe(inner.backtrace());
    });

    it("should take the frames of an Error cause", () => {
      const cause = new Error("boom");
      const err = ApiError.wrap(cause, ApiErrorKind.unrecoverable("boom"));

      expect(err.backtrace()?.lines()).toEqual(Backtrace.fromError(cause)?.lines());
    });

    it("should capture a fresh backtrace for a non-error cause", () => {
      const err = ApiError.wrap("plain string", ApiErrorKind.unrecoverable("odd"));
      expect(err.backtrace()).toBeInstanceOf(Backtrace);
      expect(err.cause).toBe("plain string");
    });
  });

  it("should not capture a backtrace when collection is disabled", () => {
    delete process.env[BACKTRACE_ENV_VAR];
    const err = ApiError.wrap(new Error("boom"), ApiErrorKind.unrecoverable("boom"));
    expect(err.backtrace()).toBeUndefined();
  });
});

describe("isApiError", () => {
  it("should narrow ApiError instances only", () => {
    expect(isApiError(ApiError.from(ApiErrorKind.recoverable("x")))).toBe(true);
    expect(isApiError(new Error("x"))).toBe(false);
    expect(isApiError({ message: "x" })).toBe(false);
  });
});
