/**
 * @roamlink/redis-pubsub - Redis answer channel for multi-instance deployments
 *
 * Lets one instance publish an async answer that another instance, the one
 * holding the original request, is waiting on:
 * - Exact-channel subscriptions keyed by the correlation key
 * - Separate publish and subscribe connections
 * - Automatic reconnect with exponential backoff and re-subscription
 *
 * ## Semantics
 *
 * - **Delivery**: At-most-once per live subscription
 * - **Ordering**: Per-channel FIFO
 * - **Publish while disconnected**: Fails immediately (no buffering)
 * - **Lifecycle**: If you pass `client`, you own cleanup; RedisPubSub owns created clients
 *
 * ## Example
 *
 * ```typescript
 * import { createBackendClient } from "@roamlink/client";
 * import { createRedisPubSub } from "@roamlink/redis-pubsub";
 *
 * const client = createBackendClient({
 *   server: "https://backend.example.net/api",
 *   senderID: "000001",
 *   receiverID: "000002",
 *   pubsub: createRedisPubSub({ url: "redis://localhost:6379" }),
 *   asyncTimeoutMs: 5000,
 * });
 * ```
 */

export { RedisPubSub, createRedisPubSub, fromNodeRedis } from "./pubsub.js";
export type {
  EventName,
  Events,
  PubSubStatus,
  RedisClient,
  RedisPubSubOptions,
} from "./types.js";

export {
  DisconnectedError,
  MaxSubscriptionsExceededError,
  PubSubError,
  SubscribeError,
} from "./errors.js";
export type { PubSubErrorCode } from "./errors.js";
