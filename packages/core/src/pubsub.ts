// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Pub/sub contract used to deliver async answers.
 *
 * Messages are serialized answer bodies (strings); encoding is the codec's
 * job, not the channel's. Implementations must be safe for many concurrent
 * logical requests sharing one instance.
 */

/**
 * Handler invoked for each message delivered on a subscribed channel.
 */
export type MessageHandler = (
  message: string,
  meta: { channel: string },
) => void;

/**
 * A single exact-channel subscription.
 *
 * - `ready` resolves once the broker has confirmed the subscription and
 *   rejects when it could not be established. Nothing published before
 *   `ready` resolves is guaranteed to be seen.
 * - `unsubscribe()` detaches the handler (idempotent).
 */
export interface Subscription {
  readonly channel: string;
  readonly ready: Promise<void>;
  unsubscribe(): void;
}

/**
 * Outcome of a publish.
 *
 * - "exact": `matched` is the number of local subscribers that received it
 * - "estimate": `matched` is the broker's receiver count
 * - "unknown": the broker cannot tell
 */
export interface PublishResult {
  capability: "exact" | "estimate" | "unknown";
  matched?: number;
}

/**
 * Publish-by-key / subscribe-by-key channel for async answers.
 */
export interface AnswerChannel {
  /**
   * Publish a serialized message on a channel.
   *
   * @throws {PublishError} if the broker could not take the message
   */
  publish(channel: string, message: string): Promise<PublishResult>;

  /**
   * Subscribe a handler to an exact channel.
   *
   * Throws synchronously when the channel is closed; connection failures
   * reject `ready` instead.
   */
  subscribe(channel: string, handler: MessageHandler): Subscription;
}
