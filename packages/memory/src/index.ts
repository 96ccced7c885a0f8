// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * In-memory answer channel for single-process deployments and tests.
 *
 * Exports:
 * - `memoryPubSub()`: exact-topic registry with synchronous local delivery
 */

export {
  memoryPubSub,
  type MemoryAnswerChannel,
  type MemoryPubSubOptions,
} from "./pubsub.js";
export type { AnswerChannel } from "@roamlink/core";
