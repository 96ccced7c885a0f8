// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Default HTTP transport: undici fetch over a dedicated Agent.
 */

import { readFileSync } from "node:fs";
import {
  ConfigurationError,
  DEFAULTS,
  TransportError,
  isRetryableNetworkError,
  toError,
} from "@roamlink/core";
import type { HttpResponse, HttpTransport } from "@roamlink/core";
import { Agent, fetch } from "undici";
import type { Dispatcher } from "undici";

export interface FetchTransportOptions {
  caCert?: string;
  tlsCert?: string;
  tlsKey?: string;
  /**
   * Use this dispatcher instead of creating an Agent (e.g. a MockAgent in
   * tests). TLS options are ignored and close() leaves it open.
   */
  dispatcher?: Dispatcher;
}

function readPem(name: string, path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read ${name} from "${path}": ${toError(error).message}`,
      { cause: error },
    );
  }
}

/**
 * Create the undici transport. Certificate files are read here, once.
 *
 * @throws {ConfigurationError} if a certificate file cannot be read
 */
export function createFetchTransport(
  options: FetchTransportOptions = {},
): HttpTransport {
  let owned: Agent | undefined;
  let dispatcher: Dispatcher;

  if (options.dispatcher) {
    dispatcher = options.dispatcher;
  } else {
    owned = new Agent({
      connect: {
        ...(options.caCert && { ca: readPem("caCert", options.caCert) }),
        ...(options.tlsCert && { cert: readPem("tlsCert", options.tlsCert) }),
        ...(options.tlsKey && { key: readPem("tlsKey", options.tlsKey) }),
      },
    });
    dispatcher = owned;
  }

  return {
    async post(url: string, body: string): Promise<HttpResponse> {
      try {
        const response = await fetch(url, {
          method: "POST",
          headers: { "content-type": DEFAULTS.CONTENT_TYPE },
          body,
          dispatcher,
        });
        return { status: response.status, body: await response.text() };
      } catch (error) {
        const err = toError(error);
        const detail =
          err.cause instanceof Error ? `${err.message}: ${err.cause.message}` : err.message;
        throw new TransportError(`http post error: ${detail}`, {
          cause: err,
          retryable: isRetryableNetworkError(err),
        });
      }
    },

    async close(): Promise<void> {
      await owned?.close();
    },
  };
}
