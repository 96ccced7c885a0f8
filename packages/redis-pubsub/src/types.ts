import type { LoggerAdapter } from "@roamlink/core";
import type { PubSubError } from "./errors.js";

/**
 * Redis client type (duck-typed; see `fromNodeRedis()` for node-redis v4).
 * Represents the minimal interface a compatible Redis client must implement.
 */
export interface RedisClient {
  readonly isOpen?: boolean;
  connect?(): Promise<void>;
  quit?(): Promise<void>;
  publish?(channel: string, message: string): Promise<unknown>;
  subscribe?(
    channel: string,
    listener: (message: string) => void,
  ): Promise<unknown>;
  unsubscribe?(channel: string): Promise<unknown>;
  on?(event: string, handler: (data: unknown) => void): void;
  duplicate?(): RedisClient;
}

/**
 * Options for configuring RedisPubSub
 */
export interface RedisPubSubOptions {
  /**
   * Redis connection URL (e.g., "redis://localhost:6379" or "rediss://localhost:6379" for TLS)
   */
  url?: string;

  /**
   * Pre-configured Redis client instance.
   * If provided, `url` must not be set. RedisPubSub will not quit() a
   * user-owned client; you own its lifecycle. It must support duplicate():
   * Redis forbids publishing on a connection in subscriber mode.
   */
  client?: RedisClient;

  /**
   * Reconnection behavior (exponential backoff with optional jitter)
   */
  retry?: {
    /** Initial delay in milliseconds (default: 100) */
    initialMs?: number;
    /** Backoff multiplier (default: 2) */
    factor?: number;
    /** Maximum delay cap in milliseconds (default: 30000) */
    maxMs?: number;
    /** "full": random delay in [0, delay] (default); "none": exact delay */
    jitter?: "full" | "none";
    /** Maximum reconnection attempts; "infinite" for unlimited (default: "infinite") */
    maxAttempts?: number | "infinite";
  };

  /**
   * Safety limit: maximum number of concurrently subscribed channels (default: Infinity).
   * One channel is held per in-flight async request.
   */
  maxSubscriptions?: number;

  /**
   * Optional structured logger. Never logs by default.
   */
  logger?: LoggerAdapter;

  /**
   * Optional custom error classification, consulted before the built-in
   * network-error check. Return undefined to fall back to it.
   */
  isRetryable?: (err: unknown) => boolean | undefined;
}

/**
 * Status snapshot of RedisPubSub instance
 */
export interface PubSubStatus {
  connected: boolean;

  /** Number of concurrent publish() calls in-flight (not buffered) */
  inflightPublishes: number;

  /** Channels with at least one handler */
  channels: string[];

  /** Last error that occurred, if any (never auto-cleared) */
  lastError?: {
    code: string;
    message: string;
    at: number;
  };
}

/**
 * Event payloads for on() listeners
 */
export interface Events {
  connect: undefined;
  disconnect: { willReconnect: boolean };
  reconnecting: { attempt: number; delayMs: number };
  reconnected: undefined;
  error: Error | PubSubError;
}

export type EventName = keyof Events;
