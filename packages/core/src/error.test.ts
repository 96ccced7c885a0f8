// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import {
  AsyncTimeoutError,
  BackendError,
  CancelledError,
  PublishError,
  ResultError,
  SerializationError,
  TransportError,
  UnexpectedStatusError,
  isPossiblyPending,
  isRetryableNetworkError,
} from "./error.js";

describe("ResultError", () => {
  it("carries the peer's code and description verbatim", () => {
    const error = new ResultError("500", "server error");

    expect(error.code).toBe("RESULT_ERROR");
    expect(error.resultCode).toBe("500");
    expect(error.description).toBe("server error");
    expect(error.message).toBe(
      "response error, code: 500, description: server error",
    );
    expect(error.name).toBe("ResultError");
    expect(error).toBeInstanceOf(BackendError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe("UnexpectedStatusError", () => {
  it("is a transport failure with status and body", () => {
    const error = new UnexpectedStatusError(503, "busy");

    expect(error).toBeInstanceOf(TransportError);
    expect(error.code).toBe("TRANSPORT_ERROR");
    expect(error.status).toBe(503);
    expect(error.body).toBe("busy");
    expect(error.message).toBe("expected: 200, got: 503 (busy)");
    expect(error.retryable).toBe(true);
  });

  it("is not retryable for client errors", () => {
    expect(new UnexpectedStatusError(400, "").retryable).toBe(false);
  });
});

describe("AsyncTimeoutError", () => {
  it("names the key and window", () => {
    const error = new AsyncTimeoutError(2000, "lora:backend:async:PRStartReq:7");

    expect(error.code).toBe("ASYNC_TIMEOUT");
    expect(error.timeoutMs).toBe(2000);
    expect(error.key).toBe("lora:backend:async:PRStartReq:7");
    expect(error.message).toBe(
      'async timeout after 2000ms waiting on "lora:backend:async:PRStartReq:7"',
    );
  });
});

describe("isPossiblyPending", () => {
  it("is true only for timeouts and cancellations", () => {
    expect(isPossiblyPending(new AsyncTimeoutError(1, "k"))).toBe(true);
    expect(isPossiblyPending(new CancelledError())).toBe(true);
    expect(isPossiblyPending(new TransportError("down"))).toBe(false);
    expect(isPossiblyPending(new SerializationError("bad"))).toBe(false);
    expect(isPossiblyPending(new ResultError("Other", ""))).toBe(false);
    expect(isPossiblyPending(new PublishError("nope"))).toBe(false);
    expect(isPossiblyPending(new Error("plain"))).toBe(false);
  });
});

describe("isRetryableNetworkError", () => {
  it("matches well-known codes", () => {
    const error = Object.assign(new Error("connect failed"), {
      code: "ECONNREFUSED",
    });
    expect(isRetryableNetworkError(error)).toBe(true);
  });

  it("follows the cause chain", () => {
    const inner = Object.assign(new Error("socket"), { code: "ECONNRESET" });
    const outer = new TypeError("fetch failed", { cause: inner });
    expect(isRetryableNetworkError(outer)).toBe(true);
  });

  it("rejects unknown errors and non-errors", () => {
    expect(isRetryableNetworkError(new Error("bad certificate"))).toBe(false);
    expect(isRetryableNetworkError("ECONNRESET")).toBe(false);
  });
});
