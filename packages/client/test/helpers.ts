// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Test helpers for client tests
 */

import type { HttpResponse, HttpTransport, LoggerAdapter } from "@roamlink/core";
import { vi } from "vitest";
import { z } from "zod";

export const SERVER = "https://peer.test/backend";

export interface SentRequest {
  url: string;
  body: string;
}

type Responder = (request: SentRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * In-process HTTP transport: records every POST and answers through the
 * given responder.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: SentRequest[] = [];
  closeCalls = 0;

  constructor(private readonly respond: Responder = () => ok("")) {}

  async post(url: string, body: string): Promise<HttpResponse> {
    const request = { url, body };
    this.requests.push(request);
    return this.respond(request);
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

export function ok(body: string): HttpResponse {
  return { status: 200, body };
}

const SentEnvelope = z
  .object({ TransactionID: z.number(), MessageType: z.string() })
  .passthrough();

/**
 * Parse a request body the client sent.
 */
export function sent(body: string): z.infer<typeof SentEnvelope> {
  return SentEnvelope.parse(JSON.parse(body));
}

/**
 * Serialized answer echoing the request's TransactionID.
 */
export function answerTo(
  body: string,
  result: { ResultCode: string; Description?: string } = {
    ResultCode: "Success",
  },
): string {
  return JSON.stringify({ TransactionID: sent(body).TransactionID, Result: result });
}

/**
 * Logger whose methods are spies.
 */
export function spyLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LoggerAdapter;
}
