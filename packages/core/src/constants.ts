// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Global constants: default values and protocol fixtures.
 */

export const DEFAULTS = {
  PROTOCOL_VERSION: "1.0",
  KEY_NAMESPACE: "lora",
  KEY_COMPONENT: "backend",
  CONTENT_TYPE: "application/json",
  ANSWER_ACK_STATUS: 200,
} as const;

// Segment of every correlation key between component and message type
export const ASYNC_KEY_SEGMENT = "async";

export const MAX_TRANSACTION_ID = 0xffff_ffff;
