// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { ASYNC_KEY_SEGMENT, DEFAULTS, MAX_TRANSACTION_ID } from "./constants.js";

export interface CorrelationKeyOptions {
  /** Leading key segment (default: "lora") */
  namespace?: string;
  /** Segment naming the subsystem that owns the keys (default: "backend") */
  component?: string;
}

const SEGMENT_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Validate a fixed key segment. Colons are rejected so that the
 * colon-joined key stays unambiguous.
 *
 * @throws {TypeError} on an invalid segment
 */
export function validateKeySegment(name: string, value: string): void {
  if (!SEGMENT_PATTERN.test(value)) {
    throw new TypeError(
      `Invalid ${name} "${value}". Must start with an alphanumeric and contain only alphanumerics, underscores, and hyphens.`,
    );
  }
}

/**
 * Build the pub/sub key an async answer is published on:
 * `<namespace>:<component>:async:<message-type>:<transaction-id>`.
 *
 * Publisher and subscriber must agree on namespace and component.
 *
 * @example
 * ```typescript
 * asyncKey("PRStartReq", 7, { namespace: "ns" });
 * // => "ns:backend:async:PRStartReq:7"
 * ```
 */
export function asyncKey(
  messageType: string,
  transactionID: number,
  options: CorrelationKeyOptions = {},
): string {
  const namespace = options.namespace ?? DEFAULTS.KEY_NAMESPACE;
  const component = options.component ?? DEFAULTS.KEY_COMPONENT;
  validateKeySegment("namespace", namespace);
  validateKeySegment("component", component);
  validateKeySegment("message type", messageType);

  if (
    !Number.isInteger(transactionID) ||
    transactionID < 0 ||
    transactionID > MAX_TRANSACTION_ID
  ) {
    throw new TypeError(
      `Invalid transaction id ${transactionID}: must be an integer in [0, ${MAX_TRANSACTION_ID}]`,
    );
  }

  return [
    namespace,
    component,
    ASYNC_KEY_SEGMENT,
    messageType,
    transactionID.toString(10),
  ].join(":");
}

/**
 * Key builder bound to a namespace and component, validated once.
 */
export function createKeyBuilder(
  options: CorrelationKeyOptions = {},
): (messageType: string, transactionID: number) => string {
  const bound = {
    namespace: options.namespace ?? DEFAULTS.KEY_NAMESPACE,
    component: options.component ?? DEFAULTS.KEY_COMPONENT,
  };
  validateKeySegment("namespace", bound.namespace);
  validateKeySegment("component", bound.component);
  return (messageType, transactionID) =>
    asyncKey(messageType, transactionID, bound);
}
