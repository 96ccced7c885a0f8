// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  LOG_CONTEXT,
  MAX_TRANSACTION_ID,
  ResultCode,
  ResultError,
  SerializationError,
  decodeAnswer,
  encodePayload,
  randomTransactionID,
} from "@roamlink/core";
import type {
  AnswerOf,
  LoggerAdapter,
  RequestInput,
  RequestType,
} from "@roamlink/core";
import type { ResponseCorrelator } from "./correlator.js";
import type { RequestOptions } from "./types.js";

/**
 * Endpoint identity stamped on every request.
 */
export interface Identity {
  readonly senderID: string;
  readonly receiverID: string;
  readonly protocolVersion: string;
}

function requestedTransactionID(input: {
  TransactionID?: number;
}): number | undefined {
  return input.TransactionID;
}

/**
 * Stamps, encodes, correlates and decodes requests of every operation.
 */
export class RequestDispatcher {
  constructor(
    private readonly identity: Identity,
    private readonly correlator: ResponseCorrelator,
    private readonly logger: LoggerAdapter,
  ) {}

  /**
   * @throws {TypeError} if the caller's TransactionID is not a uint32
   * @throws {SerializationError} if the payload cannot be encoded or the
   *   answer cannot be decoded, or carries another TransactionID
   * @throws {ResultError} if the answer's ResultCode is not Success
   */
  async request<T extends RequestType>(
    type: T,
    input: RequestInput<T>,
    opts?: RequestOptions,
  ): Promise<AnswerOf<T>> {
    const transactionID = requestedTransactionID(input) ?? randomTransactionID();
    if (
      !Number.isInteger(transactionID) ||
      transactionID < 0 ||
      transactionID > MAX_TRANSACTION_ID
    ) {
      throw new TypeError(
        `Invalid transaction id ${transactionID}: must be an integer in [0, ${MAX_TRANSACTION_ID}]`,
      );
    }

    // Stamped fields win over anything the body carries
    const payload = {
      ...input,
      ProtocolVersion: this.identity.protocolVersion,
      SenderID: this.identity.senderID,
      ReceiverID: this.identity.receiverID,
      TransactionID: transactionID,
      MessageType: type,
    };

    this.logger.debug(LOG_CONTEXT.DISPATCH, `sending ${type}`, {
      transactionID,
    });

    const raw = await this.correlator.correlate(
      { messageType: type, transactionID, body: encodePayload(payload) },
      opts,
    );

    const answer = decodeAnswer(type, raw);
    if (answer.TransactionID !== transactionID) {
      throw new SerializationError(
        `transaction id mismatch: expected ${transactionID}, got ${answer.TransactionID}`,
      );
    }

    if (answer.Result.ResultCode !== ResultCode.Success) {
      this.logger.debug(LOG_CONTEXT.DISPATCH, `${type} failed`, {
        transactionID,
        resultCode: answer.Result.ResultCode,
      });
      throw new ResultError(
        answer.Result.ResultCode,
        answer.Result.Description ?? "",
        answer,
      );
    }

    return answer;
  }
}
