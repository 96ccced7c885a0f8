// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * JSON codec for request and answer bodies.
 *
 * Both directions fail with {@link SerializationError}; callers never see a
 * raw SyntaxError or zod error.
 */

import { SerializationError } from "./error.js";
import type { AnswerOf, RequestType } from "./protocol/messages.js";
import { ANSWER_SCHEMAS } from "./protocol/schema.js";

/**
 * Encode a payload as a JSON document.
 *
 * @throws {SerializationError} for values JSON cannot represent (BigInt,
 *   cycles, top-level undefined)
 */
export function encodePayload(payload: unknown): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(payload);
  } catch (error) {
    throw new SerializationError(
      `json marshal error: ${error instanceof Error ? error.message : String(error)}`,
      [],
      { cause: error },
    );
  }
  if (encoded === undefined) {
    throw new SerializationError(
      `json marshal error: ${typeof payload} is not serializable`,
    );
  }
  return encoded;
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new SerializationError(
      `unmarshal response error: ${error instanceof Error ? error.message : String(error)}`,
      [],
      { cause: error },
    );
  }
}

function toIssues(
  issues: { path: (string | number)[]; message: string }[],
): { path: (string | number)[]; message: string }[] {
  return issues.map(({ path, message }) => ({ path, message }));
}

/**
 * Decode an answer body for the given operation.
 *
 * @throws {SerializationError} if the body is not JSON or lacks the
 *   TransactionID / Result.ResultCode the client relies on
 */
export function decodeAnswer<T extends RequestType>(
  type: T,
  body: string,
): AnswerOf<T> {
  const schema: (typeof ANSWER_SCHEMAS)[T] = ANSWER_SCHEMAS[type];
  const result = schema.safeParse(parseJson(body));
  if (!result.success) {
    throw new SerializationError(
      `unmarshal response error: not a valid ${type} answer`,
      toIssues(result.error.issues),
    );
  }
  return result.data;
}
