// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  BackendError,
  DEFAULTS,
  LOG_CONTEXT,
  TransportError,
  UnexpectedStatusError,
  encodePayload,
  isRetryableNetworkError,
  toError,
} from "@roamlink/core";
import type {
  BasePayloadResult,
  HttpTransport,
  LoggerAdapter,
} from "@roamlink/core";

/**
 * Pushes an answer to the peer over HTTP.
 */
export class AnswerSender {
  constructor(
    private readonly server: string,
    private readonly transport: HttpTransport,
    private readonly logger: LoggerAdapter,
  ) {}

  /**
   * @throws {SerializationError} if the answer cannot be encoded
   * @throws {TransportError} if the POST could not complete
   * @throws {UnexpectedStatusError} if the peer replied with anything but 200
   */
  async send(answer: BasePayloadResult): Promise<void> {
    const body = encodePayload(answer);

    let status: number;
    let responseBody: string;
    try {
      ({ status, body: responseBody } = await this.transport.post(
        this.server,
        body,
      ));
    } catch (error) {
      if (error instanceof BackendError) {
        throw error;
      }
      const err = toError(error);
      throw new TransportError(`http post error: ${err.message}`, {
        cause: err,
        retryable: isRetryableNetworkError(err),
      });
    }

    if (status !== DEFAULTS.ANSWER_ACK_STATUS) {
      this.logger.warn(LOG_CONTEXT.TRANSPORT, "answer push rejected", {
        transactionID: answer.TransactionID,
        status,
      });
      throw new UnexpectedStatusError(
        status,
        responseBody,
        DEFAULTS.ANSWER_ACK_STATUS,
      );
    }
  }
}
