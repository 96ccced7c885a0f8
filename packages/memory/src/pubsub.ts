// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LOG_CONTEXT, PublishError } from "@roamlink/core";
import type {
  AnswerChannel,
  LoggerAdapter,
  MessageHandler,
  PublishResult,
  Subscription,
} from "@roamlink/core";

/**
 * Memory channel with the inspection helpers tests rely on.
 */
export interface MemoryAnswerChannel extends AnswerChannel {
  hasTopic(topic: string): boolean;
  listTopics(): readonly string[];
  subscriberCount(topic: string): number;
  dispose(): void;
}

export interface MemoryPubSubOptions {
  /** Sink for handler errors (default: console) */
  logger?: LoggerAdapter;
}

/**
 * In-memory answer channel: exact-topic handler registry with synchronous
 * local fan-out.
 *
 * Suitable for a single process (answers produced and awaited by the same
 * instance) and for tests. For peers on different hosts use
 * `@roamlink/redis-pubsub`.
 *
 * Usage:
 * ```ts
 * import { createBackendClient } from "@roamlink/client";
 * import { memoryPubSub } from "@roamlink/memory";
 *
 * const client = createBackendClient({
 *   server: "http://localhost:8080",
 *   senderID: "000001",
 *   receiverID: "000002",
 *   pubsub: memoryPubSub(),
 *   asyncTimeoutMs: 2000,
 * });
 * ```
 */
export function memoryPubSub(
  options: MemoryPubSubOptions = {},
): MemoryAnswerChannel {
  // Topic -> handlers subscribed to that topic
  const topics = new Map<string, Set<MessageHandler>>();
  let disposed = false;

  const report = (topic: string, error: unknown) => {
    const message = `Handler error on topic "${topic}"`;
    if (options.logger) {
      options.logger.error(LOG_CONTEXT.PUBSUB, message, error);
    } else {
      console.error(message, error);
    }
  };

  const detach = (topic: string, handler: MessageHandler) => {
    const handlers = topics.get(topic);
    if (!handlers) return;
    handlers.delete(handler);
    if (handlers.size === 0) {
      topics.delete(topic);
    }
  };

  return {
    async publish(topic: string, message: string): Promise<PublishResult> {
      if (disposed) {
        throw new PublishError(
          `Cannot publish to "${topic}": channel has been disposed`,
          { channel: topic },
        );
      }

      // Snapshot so handlers that unsubscribe during delivery don't skip others
      const handlers = Array.from(topics.get(topic) ?? []);
      for (const handler of handlers) {
        try {
          handler(message, { channel: topic });
        } catch (error) {
          report(topic, error);
        }
      }

      return { capability: "exact", matched: handlers.length };
    },

    subscribe(topic: string, handler: MessageHandler): Subscription {
      if (disposed) {
        throw new Error(
          `Cannot subscribe to "${topic}": channel has been disposed`,
        );
      }

      // Wrap so the same function subscribed twice is two subscriptions
      const entry: MessageHandler = (message, meta) => handler(message, meta);
      const handlers = topics.get(topic) ?? new Set<MessageHandler>();
      handlers.add(entry);
      topics.set(topic, handlers);

      return {
        channel: topic,
        ready: Promise.resolve(),
        unsubscribe: () => detach(topic, entry),
      };
    },

    hasTopic(topic: string): boolean {
      return (topics.get(topic)?.size ?? 0) > 0;
    },

    listTopics(): readonly string[] {
      return Object.freeze(Array.from(topics.keys()));
    },

    subscriberCount(topic: string): number {
      return topics.get(topic)?.size ?? 0;
    },

    dispose() {
      disposed = true;
      topics.clear();
    },
  };
}
