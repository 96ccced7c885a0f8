// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Roaming backend client with sync and async answer correlation.
 *
 * @example
 * ```typescript
 * const client = createBackendClient({
 *   server: "https://peer.example.net/backend",
 *   senderID: "000001",
 *   receiverID: "000002",
 * });
 * const answer = await client.prStartReq({
 *   PHYPayload: "40040302010000000001",
 *   ULMetaData: { DevAddr: "01020304", FPort: 1 },
 * });
 * ```
 */

import { createKeyBuilder, createLogger, randomTransactionID } from "@roamlink/core";
import type { AnswerOf, RequestInput, RequestType } from "@roamlink/core";
import { AnswerSender } from "./answer-sender.js";
import { ResponseCorrelator } from "./correlator.js";
import { RequestDispatcher } from "./dispatcher.js";
import { resolveOptions, validateTimeout } from "./options.js";
import { AsyncAnswerPublisher } from "./publisher.js";
import { createFetchTransport } from "./transport.js";
import type {
  BackendClient,
  BackendClientOptions,
  RequestOptions,
} from "./types.js";

export { AnswerSender } from "./answer-sender.js";
export { ResponseCorrelator } from "./correlator.js";
export type { CorrelationRequest, CorrelatorOptions } from "./correlator.js";
export { RequestDispatcher } from "./dispatcher.js";
export type { Identity } from "./dispatcher.js";
export { resolveOptions } from "./options.js";
export type { ResolvedOptions } from "./options.js";
export { AsyncAnswerPublisher } from "./publisher.js";
export { createFetchTransport } from "./transport.js";
export type { FetchTransportOptions } from "./transport.js";
export type * from "./types.js";

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
} from "@roamlink/core";

/**
 * Create a backend client.
 *
 * Mode is fixed here: async when `pubsub` is set, sync otherwise.
 *
 * @throws {TypeError} on unknown options
 * @throws {ConfigurationError} on inconsistent options or unreadable TLS files
 */
export function createBackendClient(opts: BackendClientOptions): BackendClient {
  const options = resolveOptions(opts);
  const logger = options.logger ?? createLogger({ minLevel: "info" });
  const transport = options.transport ?? createFetchTransport(options.tls);
  const ownsTransport = options.transport === undefined;
  const keyFor = createKeyBuilder({
    namespace: options.keyNamespace,
    component: options.keyComponent,
  });

  const identity = {
    senderID: options.senderID,
    receiverID: options.receiverID,
    protocolVersion: options.protocolVersion,
  } as const;

  const correlator = new ResponseCorrelator({
    server: options.server,
    transport,
    logger,
    keyFor,
    ...(options.async && { async: options.async }),
  });
  const dispatcher = new RequestDispatcher(identity, correlator, logger);
  const publisher = new AsyncAnswerPublisher(
    options.async?.pubsub,
    keyFor,
    logger,
  );
  const sender = new AnswerSender(options.server, transport, logger);

  const request = async <T extends RequestType>(
    type: T,
    input: RequestInput<T>,
    requestOpts?: RequestOptions,
  ): Promise<AnswerOf<T>> => {
    if (requestOpts?.timeoutMs !== undefined) {
      validateTimeout(requestOpts.timeoutMs);
    }
    return dispatcher.request(type, input, requestOpts);
  };

  return {
    ...identity,
    isAsync: correlator.isAsync,

    randomTransactionID,

    request,
    prStartReq: (input, requestOpts) =>
      request("PRStartReq", input, requestOpts),
    prStopReq: (input, requestOpts) => request("PRStopReq", input, requestOpts),
    xmitDataReq: (input, requestOpts) =>
      request("XmitDataReq", input, requestOpts),
    profileReq: (input, requestOpts) =>
      request("ProfileReq", input, requestOpts),
    homeNSReq: (input, requestOpts) => request("HomeNSReq", input, requestOpts),

    publishAnswer: (type, answer) => publisher.publish(type, answer),
    handleAsyncPRStartAns: (answer) => publisher.publish("PRStartReq", answer),
    handleAsyncPRStopAns: (answer) => publisher.publish("PRStopReq", answer),
    handleAsyncXmitDataAns: (answer) =>
      publisher.publish("XmitDataReq", answer),
    handleAsyncProfileAns: (answer) => publisher.publish("ProfileReq", answer),
    handleAsyncHomeNSAns: (answer) => publisher.publish("HomeNSReq", answer),

    sendAnswer: (answer) => sender.send(answer),

    async close() {
      if (ownsTransport) {
        await transport.close?.();
      }
    },
  };
}
