import {
  LOG_CONTEXT,
  PublishError,
  ConfigurationError,
  isRetryableNetworkError,
  toError,
} from "@roamlink/core";
import type {
  AnswerChannel,
  MessageHandler,
  PublishResult,
  Subscription,
} from "@roamlink/core";
import type { createClient } from "redis";
import {
  DisconnectedError,
  MaxSubscriptionsExceededError,
  PubSubError,
  SubscribeError,
} from "./errors.js";
import type {
  EventName,
  Events,
  PubSubStatus,
  RedisClient,
  RedisPubSubOptions,
} from "./types.js";

type NodeRedisClient = ReturnType<typeof createClient>;

type Listeners = { [K in EventName]: Set<(payload: Events[K]) => void> };

/**
 * Answer channel backed by Redis pub/sub.
 *
 * Carries serialized answers between peer instances: the instance that sent
 * an async request subscribes to the correlation key, the instance that
 * produced the answer publishes on it.
 *
 * ## Core Invariants
 *
 * **`ready` means armed**: a subscription's `ready` resolves only after Redis
 * has acknowledged SUBSCRIBE, and rejects with {@link SubscribeError} when it
 * could not be established. Anything published after `ready` resolves is
 * delivered.
 *
 * **Fail-fast publish (no buffering)**: `publish()` while disconnected rejects
 * with a retryable `PublishError`. No queue.
 *
 * **Two Redis connections**: `publish()` and `subscribe()` use separate
 * connections; a connection in subscriber mode cannot publish. A provided
 * client must support `duplicate()`.
 *
 * **Automatic re-subscription on reconnect**: `desiredChannels` persist across
 * reconnects; `confirmedChannels` are cleared as soon as the subscriber
 * connection errors.
 *
 * ## Semantics
 *
 * - **Delivery**: at-most-once per live subscription; messages published
 *   while the subscriber connection is down are lost
 * - **Ordering**: per-channel FIFO
 * - **Lifecycle ownership**: if you pass `client`, you own it
 */
export class RedisPubSub implements AnswerChannel {
  private publishClient: RedisClient | null = null;
  private subscribeClient: RedisClient | null = null;
  private subscriptions = new Map<string, Set<MessageHandler>>();

  // INVARIANT: desiredChannels persist across reconnects; confirmedChannels are cleared on disconnect.
  private desiredChannels = new Set<string>();
  private confirmedChannels = new Set<string>();
  private pendingSubs = new Map<string, Promise<void>>();

  private connected = false;
  private destroyed = false;
  private reconnectAttempts = 0;
  private reconnectDelay: number;
  private maxReconnectDelay: number;
  private maxReconnectAttempts: number | "infinite";
  // userOwnedClient: if true, close() never calls quit() on the base client
  private userOwnedClient: boolean;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private inflightPublishes = 0;
  private lastError: { error: Error; at: number } | undefined;

  private listeners: Listeners = {
    connect: new Set(),
    disconnect: new Set(),
    reconnecting: new Set(),
    reconnected: new Set(),
    error: new Set(),
  };

  public readonly options: RedisPubSubOptions;

  constructor(options: RedisPubSubOptions = {}) {
    validateOptions(options);
    this.options = options;
    this.reconnectDelay = options.retry?.initialMs ?? 100;
    this.maxReconnectDelay = options.retry?.maxMs ?? 30000;
    this.maxReconnectAttempts = options.retry?.maxAttempts ?? "infinite";
    this.userOwnedClient = !!options.client;
  }

  /**
   * Publish a serialized answer on a channel.
   * **Fails immediately if the connection cannot be established.**
   *
   * @returns `capability: "estimate"` with Redis' receiver count
   *
   * @throws {PublishError} if the instance is destroyed or Redis rejected the publish
   */
  async publish(channel: string, message: string): Promise<PublishResult> {
    if (this.destroyed) {
      throw new PublishError(
        `Cannot publish to channel "${channel}": instance has been destroyed`,
        { channel, retryable: false },
      );
    }

    this.inflightPublishes++;

    try {
      const client = await this.ensurePublishClient();
      const receivers = await client.publish?.(channel, message);
      return typeof receivers === "number"
        ? { capability: "estimate", matched: receivers }
        : { capability: "unknown" };
    } catch (error) {
      // Reset client on error to force reconnect on next publish
      this.publishClient = null;
      const err = toError(error);
      this.recordError(err);

      if (error instanceof PublishError) {
        throw error;
      }

      throw new PublishError(
        `Failed to publish to channel "${channel}": ${err.message}`,
        {
          cause: err,
          channel,
          retryable: this.isRetryable(err),
        },
      );
    } finally {
      this.inflightPublishes--;
    }
  }

  /**
   * Subscribe to an exact channel.
   *
   * The handler is registered immediately; `ready` resolves after Redis
   * confirms the subscription and rejects with {@link SubscribeError} if it
   * cannot be established. Callers must observe `ready`.
   *
   * @throws {MaxSubscriptionsExceededError} if the channel limit would be exceeded
   * @throws {DisconnectedError} if the instance is destroyed
   *
   * @example
   * ```typescript
   * const sub = pubsub.subscribe("lora:backend:async:PRStartReq:7", (msg) => {
   *   console.log("answer:", msg);
   * });
   * await sub.ready; // Wait for Redis ACK
   * sub.unsubscribe();
   * ```
   */
  subscribe(channel: string, handler: MessageHandler): Subscription {
    if (this.destroyed) {
      throw new DisconnectedError(
        "Cannot subscribe: instance has been destroyed",
        { retryable: false },
      );
    }

    if (
      this.options.maxSubscriptions !== undefined &&
      !this.subscriptions.has(channel) &&
      this.subscriptions.size >= this.options.maxSubscriptions
    ) {
      throw new MaxSubscriptionsExceededError(
        `Maximum subscriptions (${this.options.maxSubscriptions}) exceeded`,
        this.options.maxSubscriptions,
      );
    }

    // Wrap so that the same function subscribed twice is two subscriptions
    const entry: MessageHandler = (message, meta) => handler(message, meta);
    let handlers = this.subscriptions.get(channel);
    if (!handlers) {
      handlers = new Set();
      this.subscriptions.set(channel, handlers);
    }
    handlers.add(entry);
    this.desiredChannels.add(channel);

    let ready: Promise<void>;
    if (this.confirmedChannels.has(channel)) {
      ready = Promise.resolve();
    } else {
      ready = this.pendingSubs.get(channel) ?? this.startSubscription(channel);
    }

    return {
      channel,
      ready,
      unsubscribe: () => {
        this.unsubscribe(channel, entry);
      },
    };
  }

  status(): PubSubStatus {
    return {
      connected: this.connected,
      inflightPublishes: this.inflightPublishes,
      channels: Array.from(this.subscriptions.keys()),
      ...(this.lastError && {
        lastError: {
          code:
            this.lastError.error instanceof PubSubError ||
            this.lastError.error instanceof PublishError
              ? this.lastError.error.code
              : "UNKNOWN",
          message: this.lastError.error.message,
          at: this.lastError.at,
        },
      }),
    };
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Whether Redis has confirmed a subscription for the channel.
   */
  isSubscribed(channel: string): boolean {
    return this.confirmedChannels.has(channel);
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Establish the publish connection eagerly (otherwise lazy, on first use).
   */
  async connect(): Promise<void> {
    if (this.destroyed) {
      throw new DisconnectedError(
        "Cannot connect: instance has been destroyed",
        { retryable: false },
      );
    }
    await this.ensurePublishClient();
  }

  /**
   * Close all connections and destroy the instance.
   * Idempotent: safe to call multiple times.
   */
  async close(): Promise<void> {
    this.destroyed = true;
    this.subscriptions.clear();
    this.desiredChannels.clear();
    this.confirmedChannels.clear();
    this.pendingSubs.clear();

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const clients: RedisClient[] = [];
    if (this.publishClient?.isOpen && !this.userOwnedClient) {
      clients.push(this.publishClient);
    }
    // The subscriber is always our own connection (created or duplicated)
    if (
      this.subscribeClient?.isOpen &&
      this.subscribeClient !== this.publishClient
    ) {
      clients.push(this.subscribeClient);
    }

    const results = await Promise.allSettled(
      clients.map(async (client) => client.quit?.()),
    );
    for (const result of results) {
      if (result.status === "rejected") {
        this.options.logger?.warn(
          LOG_CONTEXT.PUBSUB,
          "Failed to quit Redis connection",
          toError(result.reason).message,
        );
      }
    }

    this.publishClient = null;
    this.subscribeClient = null;
    this.connected = false;
    for (const set of Object.values(this.listeners)) {
      set.clear();
    }
  }

  /**
   * Listen for lifecycle events with strongly typed payloads
   * @returns Function to unsubscribe
   */
  on<K extends EventName>(
    event: K,
    handler: (payload: Events[K]) => void,
  ): () => void {
    this.listeners[event].add(handler);
    return () => {
      this.off(event, handler);
    };
  }

  off<K extends EventName>(
    event: K,
    handler: (payload: Events[K]) => void,
  ): void {
    this.listeners[event].delete(handler);
  }

  // ========== Private Methods ==========

  private unsubscribe(channel: string, handler: MessageHandler): void {
    const handlers = this.subscriptions.get(channel);
    if (!handlers) return;

    handlers.delete(handler);
    if (handlers.size > 0) return;

    this.subscriptions.delete(channel);
    this.desiredChannels.delete(channel);
    const wasConfirmed = this.confirmedChannels.delete(channel);

    // A pending SUBSCRIBE is undone by startSubscription() once it lands
    if (wasConfirmed) {
      this.unsubscribeFromChannel(channel).catch((error) => {
        this.options.logger?.warn(
          LOG_CONTEXT.PUBSUB,
          `Failed to unsubscribe from channel "${channel}"`,
          toError(error).message,
        );
      });
    }
  }

  private startSubscription(channel: string): Promise<void> {
    const attempt = this.establishSubscription(channel).then(
      async () => {
        this.pendingSubs.delete(channel);
        if (!this.desiredChannels.has(channel)) {
          // Every handler left while SUBSCRIBE was in flight
          this.confirmedChannels.delete(channel);
          await this.unsubscribeFromChannel(channel);
        }
      },
      (error: unknown) => {
        this.pendingSubs.delete(channel);
        const subError =
          error instanceof PubSubError || error instanceof ConfigurationError
            ? error
            : new SubscribeError(`Failed to subscribe to channel "${channel}"`, {
                cause: error,
                channel,
                retryable: this.isRetryable(error),
              });
        this.recordError(subError);
        this.options.logger?.error(
          LOG_CONTEXT.PUBSUB,
          "Subscribe error",
          subError.message,
        );
        this.emit("error", subError);
        throw subError;
      },
    );
    this.pendingSubs.set(channel, attempt);
    return attempt;
  }

  private isRetryable(error: unknown): boolean {
    const hookResult = this.options.isRetryable?.(error);
    if (hookResult !== undefined) {
      return hookResult;
    }
    return isRetryableNetworkError(error);
  }

  private recordError(error: Error): void {
    this.lastError = { error, at: Date.now() };
  }

  private emit<K extends EventName>(event: K, payload: Events[K]): void {
    for (const handler of Array.from(this.listeners[event])) {
      try {
        handler(payload);
      } catch (error) {
        this.options.logger?.error(
          LOG_CONTEXT.PUBSUB,
          `Error in "${event}" listener`,
          toError(error).message,
        );
      }
    }
  }

  private async ensurePublishClient(): Promise<RedisClient> {
    if (this.publishClient?.isOpen) {
      return this.publishClient;
    }

    try {
      this.publishClient = await this.createPublishClient();
      this.setupClientHandlers(this.publishClient, "publish");
      this.onConnected("publish");
      return this.publishClient;
    } catch (error) {
      this.handleConnectionError(error);
      throw new PublishError(
        `Failed to connect to Redis: ${toError(error).message}`,
        { cause: error, retryable: true },
      );
    }
  }

  private async ensureSubscribeClient(): Promise<RedisClient> {
    if (this.subscribeClient?.isOpen) {
      return this.subscribeClient;
    }

    try {
      this.subscribeClient = await this.createSubscribeClient();
      this.setupClientHandlers(this.subscribeClient, "subscribe");
      this.onConnected("subscribe");
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      this.handleConnectionError(error);
      throw new SubscribeError(
        `Failed to connect subscribe client: ${toError(error).message}`,
        { cause: error, retryable: true },
      );
    }

    // Re-subscribe to channels lost with the previous connection
    for (const channel of this.desiredChannels) {
      if (
        !this.confirmedChannels.has(channel) &&
        !this.pendingSubs.has(channel)
      ) {
        this.startSubscription(channel).catch(() => {
          // Reported through logger and "error" event by startSubscription
        });
      }
    }

    return this.subscribeClient;
  }

  private onConnected(kind: "publish" | "subscribe"): void {
    this.reconnectAttempts = 0;
    this.reconnectDelay = this.options.retry?.initialMs ?? 100;
    this.connected = true;
    this.options.logger?.info(LOG_CONTEXT.PUBSUB, `Connected to Redis (${kind})`);
    this.emit("connect", undefined);
  }

  private async createPublishClient(): Promise<RedisClient> {
    if (this.options.client) {
      if (!this.options.client.isOpen) {
        await this.options.client.connect?.();
      }
      return this.options.client;
    }

    return this.createClientFromUrl();
  }

  /**
   * INVARIANT: Two connections always; Redis forbids PUBLISH on a connection
   * in subscriber mode. Fails fast without duplicate() support.
   */
  private async createSubscribeClient(): Promise<RedisClient> {
    if (this.options.client) {
      const base = this.options.client;
      if (!base.duplicate) {
        throw new ConfigurationError(
          "Redis client must support duplicate() to open a separate subscriber connection",
        );
      }

      const duplicated = base.duplicate();
      if (!duplicated.isOpen) {
        await duplicated.connect?.();
      }
      return duplicated;
    }

    return this.createClientFromUrl();
  }

  private async createClientFromUrl(): Promise<RedisClient> {
    const { createClient } = await import("redis");
    const client = fromNodeRedis(
      createClient({ url: this.options.url ?? "redis://localhost:6379" }),
    );
    await client.connect?.();
    return client;
  }

  /**
   * Subscriber errors clear confirmedChannels IMMEDIATELY (before "end"), so
   * isSubscribed() never reports a channel Redis has lost.
   */
  private setupClientHandlers(
    client: RedisClient,
    kind: "publish" | "subscribe",
  ): void {
    client.on?.("error", (error: unknown) => {
      const err = toError(error);
      this.connected = false;
      this.recordError(err);
      if (kind === "subscribe") {
        this.confirmedChannels.clear();
      }
      this.options.logger?.error(
        LOG_CONTEXT.PUBSUB,
        `${kind} client error`,
        err.message,
      );
      const wrapped =
        kind === "subscribe"
          ? new SubscribeError(`Connection error: ${err.message}`, {
              cause: err,
              retryable: true,
            })
          : new PublishError(`Connection error: ${err.message}`, {
              cause: err,
              retryable: true,
            });
      this.emit("error", wrapped);
      this.handleConnectionError(err);
    });

    client.on?.("end", () => {
      this.connected = false;
      if (kind === "subscribe") {
        this.confirmedChannels.clear();
        this.subscribeClient = null;
      } else {
        this.publishClient = null;
      }
      this.options.logger?.warn(
        LOG_CONTEXT.PUBSUB,
        `${kind} client disconnected`,
      );
      this.emit("disconnect", { willReconnect: !this.destroyed });
      this.attemptReconnect();
    });
  }

  private async establishSubscription(channel: string): Promise<void> {
    const client = await this.ensureSubscribeClient();

    await client.subscribe?.(channel, (message: string) => {
      this.handleMessage(channel, message);
    });

    this.confirmedChannels.add(channel);
  }

  /**
   * Deliver a message to every handler of the channel; one throwing handler
   * does not stop the others.
   */
  private handleMessage(channel: string, message: string): void {
    const handlers = this.subscriptions.get(channel);
    if (!handlers) return;

    for (const handler of Array.from(handlers)) {
      try {
        handler(message, { channel });
      } catch (error) {
        this.options.logger?.error(
          LOG_CONTEXT.PUBSUB,
          "Handler error",
          toError(error).message,
        );
      }
    }
  }

  private async unsubscribeFromChannel(channel: string): Promise<void> {
    if (this.subscribeClient?.isOpen) {
      await this.subscribeClient.unsubscribe?.(channel);
    }
  }

  private handleConnectionError(error: unknown): void {
    this.connected = false;

    if (this.destroyed) {
      return;
    }

    this.options.logger?.error(
      LOG_CONTEXT.PUBSUB,
      "Connection error",
      toError(error).message,
    );

    this.attemptReconnect();
  }

  /**
   * Reconnect with exponential backoff: delay = initialMs * factor^(attempt-1),
   * capped at maxMs, with full jitter unless disabled. A newer error
   * reschedules the pending timer.
   */
  private attemptReconnect(): void {
    if (this.destroyed) {
      return;
    }

    if (
      this.maxReconnectAttempts !== "infinite" &&
      this.reconnectAttempts >= this.maxReconnectAttempts
    ) {
      this.options.logger?.error(
        LOG_CONTEXT.PUBSUB,
        `Max reconnection attempts (${this.maxReconnectAttempts}) exceeded`,
      );
      return;
    }

    this.reconnectAttempts++;

    const factor = this.options.retry?.factor ?? 2;
    const baseDelay = Math.min(
      this.reconnectDelay * Math.pow(factor, this.reconnectAttempts - 1),
      this.maxReconnectDelay,
    );
    const delayMs = Math.round(
      (this.options.retry?.jitter ?? "full") === "none"
        ? baseDelay
        : baseDelay * Math.random(),
    );

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
    }

    this.options.logger?.info(
      LOG_CONTEXT.PUBSUB,
      `Reconnecting in ${delayMs}ms (attempt ${this.reconnectAttempts})`,
    );
    this.emit("reconnecting", { delayMs, attempt: this.reconnectAttempts });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;

      if (this.destroyed) {
        return;
      }

      this.publishClient = null;
      this.subscribeClient = null;

      void Promise.allSettled([
        this.ensurePublishClient(),
        this.desiredChannels.size > 0
          ? this.ensureSubscribeClient()
          : Promise.resolve(null),
      ]).then((results) => {
        // Failures were already reported and rescheduled by ensure*Client()
        if (
          !this.destroyed &&
          results.every((result) => result.status === "fulfilled")
        ) {
          this.emit("reconnected", undefined);
        }
      });
    }, delayMs);
  }
}

/**
 * Adapt a node-redis v4 client to the duck-typed {@link RedisClient}.
 */
export function fromNodeRedis(client: NodeRedisClient): RedisClient {
  return {
    get isOpen() {
      return client.isOpen;
    },
    connect: async () => {
      await client.connect();
    },
    quit: async () => {
      await client.quit();
    },
    publish: (channel, message) => client.publish(channel, message),
    subscribe: (channel, listener) =>
      client.subscribe(channel, (message) => {
        listener(message);
      }),
    unsubscribe: (channel) => client.unsubscribe(channel),
    on: (event, handler) => {
      client.on(event, handler);
    },
    duplicate: () => fromNodeRedis(client.duplicate()),
  };
}

/**
 * Factory function to create a RedisPubSub instance
 */
export function createRedisPubSub(options?: RedisPubSubOptions): RedisPubSub {
  return new RedisPubSub(options);
}

const ALLOWED_OPTIONS = new Set([
  "url",
  "client",
  "retry",
  "maxSubscriptions",
  "logger",
  "isRetryable",
]);

/**
 * Reject unknown keys and incompatible combinations.
 *
 * @throws {TypeError} on invalid options
 */
function validateOptions(options: RedisPubSubOptions): void {
  for (const key of Object.keys(options)) {
    if (!ALLOWED_OPTIONS.has(key)) {
      throw new TypeError(
        `Unknown option "${key}". Allowed options: ${Array.from(ALLOWED_OPTIONS).join(", ")}`,
      );
    }
  }

  if (options.url && options.client) {
    throw new TypeError(
      'Options "url" and "client" are mutually exclusive. Use one or the other.',
    );
  }

  if (
    options.maxSubscriptions !== undefined &&
    (!Number.isInteger(options.maxSubscriptions) || options.maxSubscriptions < 1)
  ) {
    throw new TypeError(
      `Option "maxSubscriptions" must be a positive integer, got ${options.maxSubscriptions}`,
    );
  }
}
