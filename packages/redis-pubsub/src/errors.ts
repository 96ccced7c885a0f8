/**
 * Error codes raised by RedisPubSub itself. Publish failures use
 * `PublishError` from `@roamlink/core` so callers see one publish failure kind
 * whatever the channel implementation.
 */
export type PubSubErrorCode =
  | "SUBSCRIBE_FAILED"
  | "DISCONNECTED"
  | "MAX_SUBSCRIPTIONS_EXCEEDED";

/**
 * Base error class for RedisPubSub
 *
 * Check the `code` field for specific error types and `retryable` to decide
 * whether the condition is transient.
 */
export class PubSubError extends Error {
  declare readonly code: PubSubErrorCode;

  /**
   * Whether this error is transient
   * - true: network/connection issues
   * - false: permanent issues (destroyed instance, limits)
   */
  retryable: boolean;

  override cause?: unknown;

  channel?: string | undefined;

  constructor(
    message: string,
    options?: {
      code?: PubSubErrorCode;
      retryable?: boolean;
      cause?: unknown;
      channel?: string;
    },
  ) {
    super(message);
    this.name = "PubSubError";
    this.code = options?.code ?? "SUBSCRIBE_FAILED";
    this.retryable = options?.retryable ?? false;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.channel = options?.channel;
    Object.setPrototypeOf(this, PubSubError.prototype);
  }
}

/**
 * Subscribe operation failed
 */
export class SubscribeError extends PubSubError {
  declare readonly code: "SUBSCRIBE_FAILED";

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      cause?: unknown;
      channel?: string;
    },
  ) {
    super(message, { code: "SUBSCRIBE_FAILED", ...options });
    this.name = "SubscribeError";
    Object.setPrototypeOf(this, SubscribeError.prototype);
  }
}

/**
 * Instance is disconnected or destroyed
 */
export class DisconnectedError extends PubSubError {
  declare readonly code: "DISCONNECTED";

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, {
      code: "DISCONNECTED",
      ...options,
      retryable: options?.retryable ?? true,
    });
    this.name = "DisconnectedError";
    Object.setPrototypeOf(this, DisconnectedError.prototype);
  }
}

/**
 * Maximum subscriptions limit exceeded
 */
export class MaxSubscriptionsExceededError extends PubSubError {
  declare readonly code: "MAX_SUBSCRIPTIONS_EXCEEDED";

  constructor(
    message: string,
    public readonly limit: number,
  ) {
    super(message, { code: "MAX_SUBSCRIPTIONS_EXCEEDED", retryable: false });
    this.name = "MaxSubscriptionsExceededError";
    Object.setPrototypeOf(this, MaxSubscriptionsExceededError.prototype);
  }
}
