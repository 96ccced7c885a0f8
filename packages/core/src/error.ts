// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Error codes for every failure a backend client call can surface.
 *
 * Final for the attempt:
 * - SERIALIZATION_ERROR: payload could not be encoded or decoded
 * - TRANSPORT_ERROR: the HTTP send/receive or the answer subscription failed
 * - RESULT_ERROR: the peer answered with a non-success result code
 * - PUBLISH_FAILED: an async answer could not be handed to the broker
 * - CONFIGURATION_ERROR: the client was built or used inconsistently
 *
 * Possibly still pending at the peer:
 * - ASYNC_TIMEOUT: no answer was published within the async window
 * - CANCELLED: the caller aborted the wait
 */
export type BackendErrorCode =
  | "SERIALIZATION_ERROR"
  | "TRANSPORT_ERROR"
  | "ASYNC_TIMEOUT"
  | "RESULT_ERROR"
  | "PUBLISH_FAILED"
  | "CANCELLED"
  | "CONFIGURATION_ERROR";

/**
 * Base error class for backend client failures.
 *
 * Check `code` for the failure kind. `retryable` is a hint only; the client
 * itself never retries.
 */
export class BackendError extends Error {
  declare readonly code: BackendErrorCode;

  retryable: boolean;

  override cause?: unknown;

  constructor(
    message: string,
    options?: {
      code?: BackendErrorCode;
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = "BackendError";
    this.code = options?.code ?? "TRANSPORT_ERROR";
    this.retryable = options?.retryable ?? false;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, BackendError.prototype);
  }
}

/**
 * Payload could not be encoded, or a received body could not be decoded as
 * the expected answer.
 */
export class SerializationError extends BackendError {
  declare readonly code: "SERIALIZATION_ERROR";

  constructor(
    message: string,
    public readonly issues: { path: (string | number)[]; message: string }[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, {
      code: "SERIALIZATION_ERROR",
      retryable: false,
      ...options,
    });
    this.name = "SerializationError";
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * The HTTP exchange (or the answer subscription) could not complete.
 */
export class TransportError extends BackendError {
  declare readonly code: "TRANSPORT_ERROR";

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, { code: "TRANSPORT_ERROR", ...options });
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * The peer replied, but not with the status an answer push requires.
 */
export class UnexpectedStatusError extends TransportError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly expected = 200,
  ) {
    super(`expected: ${expected}, got: ${status} (${body})`, {
      retryable: status >= 500,
    });
    this.name = "UnexpectedStatusError";
    Object.setPrototypeOf(this, UnexpectedStatusError.prototype);
  }
}

/**
 * No answer was published on the correlation key within the async window.
 * The request may still be processed by the peer.
 */
export class AsyncTimeoutError extends BackendError {
  declare readonly code: "ASYNC_TIMEOUT";

  constructor(
    public readonly timeoutMs: number,
    public readonly key: string,
    options?: { cause?: unknown },
  ) {
    super(`async timeout after ${timeoutMs}ms waiting on "${key}"`, {
      code: "ASYNC_TIMEOUT",
      retryable: true,
      ...options,
    });
    this.name = "AsyncTimeoutError";
    Object.setPrototypeOf(this, AsyncTimeoutError.prototype);
  }
}

/**
 * The peer answered with a result code other than Success.
 *
 * `resultCode` and `description` are the peer's values, verbatim. `answer`
 * holds the full decoded answer for callers that need its other fields.
 */
export class ResultError<TAnswer = unknown> extends BackendError {
  declare readonly code: "RESULT_ERROR";

  constructor(
    public readonly resultCode: string,
    public readonly description: string,
    public readonly answer?: TAnswer,
  ) {
    super(
      `response error, code: ${resultCode}, description: ${description}`,
      { code: "RESULT_ERROR", retryable: false },
    );
    this.name = "ResultError";
    Object.setPrototypeOf(this, ResultError.prototype);
  }
}

/**
 * An async answer could not be published to the broker.
 */
export class PublishError extends BackendError {
  declare readonly code: "PUBLISH_FAILED";

  channel?: string | undefined;

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      cause?: unknown;
      channel?: string;
    },
  ) {
    super(message, {
      code: "PUBLISH_FAILED",
      retryable: options?.retryable ?? false,
      cause: options?.cause,
    });
    this.name = "PublishError";
    this.channel = options?.channel;
    Object.setPrototypeOf(this, PublishError.prototype);
  }
}

/**
 * The caller's AbortSignal fired before an answer arrived.
 */
export class CancelledError extends BackendError {
  declare readonly code: "CANCELLED";

  constructor(message = "request cancelled", options?: { cause?: unknown }) {
    super(message, { code: "CANCELLED", retryable: false, ...options });
    this.name = "CancelledError";
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

/**
 * Invalid client options or an operation the configured mode cannot serve.
 */
export class ConfigurationError extends BackendError {
  declare readonly code: "CONFIGURATION_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, {
      code: "CONFIGURATION_ERROR",
      retryable: false,
      ...options,
    });
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * True when the request may still be answered by the peer: the local wait
 * ended (timeout or abort) without a final outcome.
 */
export function isPossiblyPending(error: unknown): boolean {
  return error instanceof AsyncTimeoutError || error instanceof CancelledError;
}

const RETRYABLE_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * Check whether an error (or its `cause` chain) is a transient network error.
 *
 * Checks `code` before `name` before the message text. Unknown errors are not
 * retryable.
 */
export function isRetryableNetworkError(error: unknown, depth = 0): boolean {
  if (!(error instanceof Error) || depth > 4) {
    return false;
  }

  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string" && RETRYABLE_ERROR_CODES.has(code)) {
    return true;
  }

  if (RETRYABLE_ERROR_CODES.has(error.name)) {
    return true;
  }

  const message = (error.message || "").toUpperCase();
  for (const known of RETRYABLE_ERROR_CODES) {
    if (message.includes(known)) {
      return true;
    }
  }

  return isRetryableNetworkError(error.cause, depth + 1);
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
