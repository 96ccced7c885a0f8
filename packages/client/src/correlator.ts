// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Answer correlation for sync and async mode.
 *
 * Sync: the HTTP response body is the answer. Async: subscribe to the
 * correlation key, wait for the subscription to be armed, then send; the
 * first of {answer, timeout, abort} settles the request.
 */

import {
  AsyncTimeoutError,
  BackendError,
  CancelledError,
  LOG_CONTEXT,
  TransportError,
  isRetryableNetworkError,
  toError,
} from "@roamlink/core";
import type {
  AnswerChannel,
  HttpResponse,
  HttpTransport,
  LoggerAdapter,
  RequestType,
  Subscription,
} from "@roamlink/core";
import type { AsyncSendFailure, RequestOptions } from "./types.js";

export interface CorrelatorOptions {
  server: string;
  transport: HttpTransport;
  logger: LoggerAdapter;
  keyFor: (messageType: string, transactionID: number) => string;
  async?: {
    pubsub: AnswerChannel;
    timeoutMs: number;
    sendFailure: AsyncSendFailure;
  };
}

export interface CorrelationRequest {
  messageType: RequestType;
  transactionID: number;
  body: string;
}

/**
 * A promise that settles once; later attempts report false.
 */
class Outcome<T> {
  readonly promise: Promise<T>;
  private done = false;
  private resolveFn: (value: T) => void = () => undefined;
  private rejectFn: (reason: Error) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });
  }

  get settled(): boolean {
    return this.done;
  }

  resolve(value: T): boolean {
    if (this.done) return false;
    this.done = true;
    this.resolveFn(value);
    return true;
  }

  reject(reason: Error): boolean {
    if (this.done) return false;
    this.done = true;
    this.rejectFn(reason);
    return true;
  }
}

function cancelled(signal: AbortSignal, message?: string): CancelledError {
  return new CancelledError(message, { cause: signal.reason });
}

export class ResponseCorrelator {
  constructor(private readonly options: CorrelatorOptions) {}

  get isAsync(): boolean {
    return this.options.async !== undefined;
  }

  /**
   * Send a serialized request and return the serialized answer.
   *
   * @throws {CancelledError} if `signal` fires first (or already has)
   * @throws {TransportError} if the request could not be sent, or the answer
   *   subscription could not be set up
   * @throws {AsyncTimeoutError} if no answer was published in time
   */
  async correlate(
    request: CorrelationRequest,
    opts: RequestOptions = {},
  ): Promise<string> {
    const { signal } = opts;
    if (signal?.aborted) {
      throw cancelled(signal, "request cancelled before dispatch");
    }

    const async = this.options.async;
    if (!async) {
      return this.correlateSync(request, signal);
    }
    return this.correlateAsync(
      async.pubsub,
      request,
      opts.timeoutMs ?? async.timeoutMs,
      async.sendFailure,
      signal,
    );
  }

  private async correlateSync(
    request: CorrelationRequest,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    if (!signal) {
      const response = await this.post(request.body);
      return response.body;
    }

    const outcome = new Outcome<string>();
    const onAbort = () => {
      outcome.reject(cancelled(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    void this.post(request.body).then(
      (response) => {
        if (!outcome.resolve(response.body)) {
          this.options.logger.warn(
            LOG_CONTEXT.CORRELATION,
            "answer received after the request was cancelled",
            { messageType: request.messageType, transactionID: request.transactionID },
          );
        }
      },
      (error: Error) => {
        if (!outcome.reject(error)) {
          this.logLateSendFailure(request, error);
        }
      },
    );

    try {
      return await outcome.promise;
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private async correlateAsync(
    pubsub: AnswerChannel,
    request: CorrelationRequest,
    timeoutMs: number,
    sendFailure: AsyncSendFailure,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    const { logger } = this.options;
    const key = this.options.keyFor(request.messageType, request.transactionID);
    const outcome = new Outcome<string>();

    let subscription: Subscription;
    try {
      subscription = pubsub.subscribe(key, (message) => {
        if (!outcome.resolve(message)) {
          logger.debug(LOG_CONTEXT.CORRELATION, "ignoring extra answer", { key });
        }
      });
    } catch (error) {
      throw this.subscribeFailure(key, error);
    }

    try {
      try {
        await subscription.ready;
      } catch (error) {
        throw this.subscribeFailure(key, error);
      }

      if (signal?.aborted) {
        throw cancelled(signal, "request cancelled before dispatch");
      }

      let sendError: Error | undefined;
      const timer = setTimeout(() => {
        if (
          outcome.reject(
            new AsyncTimeoutError(
              timeoutMs,
              key,
              sendError ? { cause: sendError } : undefined,
            ),
          )
        ) {
          logger.warn(LOG_CONTEXT.CORRELATION, "async answer timed out", {
            key,
            timeoutMs,
          });
        }
      }, timeoutMs);

      const onAbort = () => {
        if (signal && outcome.reject(cancelled(signal))) {
          logger.debug(LOG_CONTEXT.CORRELATION, "async wait cancelled", { key });
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      void this.post(request.body).then(
        () => {
          logger.debug(LOG_CONTEXT.TRANSPORT, "async request sent", { key });
        },
        (error: Error) => {
          if (outcome.settled) {
            this.logLateSendFailure(request, error);
          } else if (sendFailure === "fail-fast") {
            outcome.reject(error);
          } else {
            sendError = error;
            logger.warn(
              LOG_CONTEXT.TRANSPORT,
              "async request send failed, still awaiting answer",
              { key, error: error.message },
            );
          }
        },
      );

      try {
        return await outcome.promise;
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      }
    } finally {
      subscription.unsubscribe();
    }
  }

  /**
   * POST to the endpoint. Whatever the transport throws surfaces as a
   * BackendError.
   */
  private async post(body: string): Promise<HttpResponse> {
    try {
      return await this.options.transport.post(this.options.server, body);
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
  }

  private subscribeFailure(key: string, error: unknown): TransportError {
    const err = toError(error);
    this.options.logger.error(
      LOG_CONTEXT.CORRELATION,
      "answer subscription failed",
      { key, error: err.message },
    );
    return new TransportError(`subscribe error: ${err.message}`, {
      cause: err,
      retryable: "retryable" in err && typeof err.retryable === "boolean"
        ? err.retryable
        : isRetryableNetworkError(err),
    });
  }

  private logLateSendFailure(request: CorrelationRequest, error: Error): void {
    this.options.logger.warn(
      LOG_CONTEXT.TRANSPORT,
      "request send failed after the wait ended",
      {
        messageType: request.messageType,
        transactionID: request.transactionID,
        error: error.message,
      },
    );
  }
}
