// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  ConfigurationError,
  LOG_CONTEXT,
  PublishError,
  encodePayload,
  isRetryableNetworkError,
  toError,
} from "@roamlink/core";
import type {
  AnswerChannel,
  AnswerOf,
  LoggerAdapter,
  RequestType,
} from "@roamlink/core";

/**
 * Publishes locally produced answers on the correlation key of the peer's
 * async request.
 */
export class AsyncAnswerPublisher {
  constructor(
    private readonly pubsub: AnswerChannel | undefined,
    private readonly keyFor: (messageType: string, transactionID: number) => string,
    private readonly logger: LoggerAdapter,
  ) {}

  /**
   * @param type - request tag of the operation being answered
   *
   * @throws {ConfigurationError} if the client has no answer channel
   * @throws {SerializationError} if the answer cannot be encoded
   * @throws {PublishError} if the channel did not take the message
   */
  async publish<T extends RequestType>(
    type: T,
    answer: AnswerOf<T>,
  ): Promise<void> {
    if (!this.pubsub) {
      throw new ConfigurationError(
        `Cannot publish ${type} answer: client is in sync mode (no pubsub configured)`,
      );
    }

    const key = this.keyFor(type, answer.TransactionID);
    const body = encodePayload(answer);

    let matched: number | undefined;
    try {
      ({ matched } = await this.pubsub.publish(key, body));
    } catch (error) {
      if (error instanceof PublishError) {
        throw error;
      }
      const err = toError(error);
      throw new PublishError(`publish error: ${err.message}`, {
        cause: err,
        channel: key,
        retryable: isRetryableNetworkError(err),
      });
    }

    if (matched === 0) {
      this.logger.warn(LOG_CONTEXT.PUBLISH, "answer published with no listener", {
        key,
      });
    } else {
      this.logger.debug(LOG_CONTEXT.PUBLISH, "answer published", {
        key,
        matched,
      });
    }
  }
}
