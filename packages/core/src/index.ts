// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @roamlink/core: protocol types and building blocks for roaming backend clients
 *
 * Public API surface:
 * - Message types, result codes and payload shapes per operation
 * - JSON codec with zod-checked answer decoding
 * - randomTransactionID() and asyncKey() for async correlation
 * - Error classes for every failure kind
 * - HttpTransport / AnswerChannel contracts implemented by adapters
 * - LoggerAdapter and createLogger()
 */

// Protocol
export {
  MessageType,
  REQUEST_TYPES,
  ResultCode,
} from "./protocol/messages.js";
export type {
  AnswerOf,
  BasePayload,
  BasePayloadResult,
  DLMetaData,
  GWInfoElement,
  HEXBytes,
  HomeNSAnsPayload,
  HomeNSReqPayload,
  KeyEnvelope,
  KnownResultCode,
  OperationMap,
  PRStartAnsPayload,
  PRStartReqPayload,
  PRStopAnsPayload,
  PRStopReqPayload,
  ProfileAnsPayload,
  ProfileReqPayload,
  RequestInput,
  RequestOf,
  RequestType,
  Result,
  ResultCodeValue,
  StampedField,
  ULMetaData,
  XmitDataAnsPayload,
  XmitDataReqPayload,
} from "./protocol/messages.js";
export {
  ANSWER_SCHEMAS,
  BaseAnswerSchema,
  ResultSchema,
  TransactionIDSchema,
} from "./protocol/schema.js";
export type { BaseAnswer } from "./protocol/schema.js";

// Codec
export { decodeAnswer, encodePayload } from "./codec.js";

// Correlation
export { randomTransactionID } from "./transaction-id.js";
export {
  asyncKey,
  createKeyBuilder,
  validateKeySegment,
} from "./correlation-key.js";
export type { CorrelationKeyOptions } from "./correlation-key.js";

// Errors
export {
  AsyncTimeoutError,
  BackendError,
  CancelledError,
  ConfigurationError,
  PublishError,
  ResultError,
  SerializationError,
  TransportError,
  UnexpectedStatusError,
  isPossiblyPending,
  isRetryableNetworkError,
  toError,
} from "./error.js";
export type { BackendErrorCode } from "./error.js";

// Contracts
export type { HttpResponse, HttpTransport } from "./transport.js";
export type {
  AnswerChannel,
  MessageHandler,
  PublishResult,
  Subscription,
} from "./pubsub.js";

// Logging
export { LOG_CONTEXT, createLogger, silentLogger } from "./logger.js";
export type { LogLevel, LoggerAdapter, LoggerOptions } from "./logger.js";

export { ASYNC_KEY_SEGMENT, DEFAULTS, MAX_TRANSACTION_ID } from "./constants.js";
