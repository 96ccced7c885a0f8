// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Response of a completed HTTP exchange. Any status counts as completed.
 */
export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Blocking POST to the single configured endpoint.
 *
 * Implementations reject with {@link TransportError} when the exchange could
 * not complete (connection refused, reset, unreadable body) and must be safe
 * for concurrent use.
 */
export interface HttpTransport {
  post(url: string, body: string): Promise<HttpResponse>;
  close?(): Promise<void>;
}
