// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * TypeScript types for the roaming backend client.
 */

import type {
  AnswerChannel,
  AnswerOf,
  BasePayloadResult,
  HomeNSAnsPayload,
  HttpTransport,
  LoggerAdapter,
  PRStartAnsPayload,
  PRStopAnsPayload,
  ProfileAnsPayload,
  RequestInput,
  RequestType,
  XmitDataAnsPayload,
} from "@roamlink/core";

/**
 * What to do when the HTTP send of an async request fails.
 *
 * - "fail-fast": end the wait immediately with the transport error
 * - "await-answer": log it and keep waiting; the peer may have received the
 *   request anyway. A timeout then carries the send failure as `cause`.
 */
export type AsyncSendFailure = "fail-fast" | "await-answer";

export interface BackendClientOptions {
  /** Endpoint every request and answer push is POSTed to. */
  server: string;
  senderID: string;
  receiverID: string;
  protocolVersion?: string; // default: "1.0"

  /** Paths to PEM files, read once at construction. Default transport only. */
  caCert?: string;
  tlsCert?: string;
  tlsKey?: string;

  /**
   * Answer channel. Setting it switches the client to async mode: answers are
   * awaited on the channel instead of read from the HTTP response.
   */
  pubsub?: AnswerChannel;
  asyncTimeoutMs?: number; // required with pubsub
  asyncSendFailure?: AsyncSendFailure; // default: "fail-fast"

  keyNamespace?: string; // default: "lora"
  keyComponent?: string; // default: "backend"

  /** Replaces the default undici transport. The caller owns its lifecycle. */
  transport?: HttpTransport;
  logger?: LoggerAdapter;
}

export interface RequestOptions {
  /** Overrides `asyncTimeoutMs` for this call (async mode only). */
  timeoutMs?: number;
  /**
   * Stops waiting for the answer. A request already on the wire is not
   * recalled.
   */
  signal?: AbortSignal;
}

export interface BackendClient {
  readonly senderID: string;
  readonly receiverID: string;
  readonly protocolVersion: string;
  /** True when answers arrive over the answer channel. */
  readonly isAsync: boolean;

  randomTransactionID(): number;

  prStartReq(
    input: RequestInput<"PRStartReq">,
    opts?: RequestOptions,
  ): Promise<PRStartAnsPayload>;
  prStopReq(
    input: RequestInput<"PRStopReq">,
    opts?: RequestOptions,
  ): Promise<PRStopAnsPayload>;
  xmitDataReq(
    input: RequestInput<"XmitDataReq">,
    opts?: RequestOptions,
  ): Promise<XmitDataAnsPayload>;
  profileReq(
    input: RequestInput<"ProfileReq">,
    opts?: RequestOptions,
  ): Promise<ProfileAnsPayload>;
  homeNSReq(
    input: RequestInput<"HomeNSReq">,
    opts?: RequestOptions,
  ): Promise<HomeNSAnsPayload>;

  /**
   * Send any request type. The per-operation methods above delegate here.
   */
  request<T extends RequestType>(
    type: T,
    input: RequestInput<T>,
    opts?: RequestOptions,
  ): Promise<AnswerOf<T>>;

  handleAsyncPRStartAns(answer: PRStartAnsPayload): Promise<void>;
  handleAsyncPRStopAns(answer: PRStopAnsPayload): Promise<void>;
  handleAsyncXmitDataAns(answer: XmitDataAnsPayload): Promise<void>;
  handleAsyncProfileAns(answer: ProfileAnsPayload): Promise<void>;
  handleAsyncHomeNSAns(answer: HomeNSAnsPayload): Promise<void>;

  /**
   * Publish an answer for a peer's async request on its correlation key.
   */
  publishAnswer<T extends RequestType>(
    type: T,
    answer: AnswerOf<T>,
  ): Promise<void>;

  /**
   * POST an answer to the peer; anything but status 200 is a failure.
   */
  sendAnswer(answer: BasePayloadResult): Promise<void>;

  /** Release the default transport's connections. */
  close(): Promise<void>;
}
