// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  ConfigurationError,
  DEFAULTS,
  validateKeySegment,
} from "@roamlink/core";
import type { AnswerChannel, HttpTransport, LoggerAdapter } from "@roamlink/core";
import type { AsyncSendFailure, BackendClientOptions } from "./types.js";

const ALLOWED_OPTIONS = new Set<string>([
  "server",
  "senderID",
  "receiverID",
  "protocolVersion",
  "caCert",
  "tlsCert",
  "tlsKey",
  "pubsub",
  "asyncTimeoutMs",
  "asyncSendFailure",
  "keyNamespace",
  "keyComponent",
  "transport",
  "logger",
] satisfies (keyof BackendClientOptions)[]);

const SEND_FAILURE_POLICIES: readonly AsyncSendFailure[] = [
  "fail-fast",
  "await-answer",
];

/**
 * Options with defaults applied. Exactly one of `pubsub` (async mode) or
 * nothing (sync mode) is set.
 */
export interface ResolvedOptions {
  server: string;
  senderID: string;
  receiverID: string;
  protocolVersion: string;
  tls: { caCert?: string; tlsCert?: string; tlsKey?: string };
  async?: {
    pubsub: AnswerChannel;
    timeoutMs: number;
    sendFailure: AsyncSendFailure;
  };
  keyNamespace: string;
  keyComponent: string;
  transport?: HttpTransport;
  logger?: LoggerAdapter;
}

function requireString(name: string, value: unknown): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigurationError(`Option "${name}" must be a non-empty string`);
  }
  return value;
}

// Node's timers fire after 1ms for any delay above this.
const MAX_TIMEOUT_MS = 2_147_483_647;

function isPositiveTimeout(value: number): boolean {
  return Number.isFinite(value) && value > 0 && value <= MAX_TIMEOUT_MS;
}

/**
 * Validate client options and apply defaults.
 *
 * @throws {TypeError} on unknown option keys or malformed key segments
 * @throws {ConfigurationError} on missing or inconsistent settings
 */
export function resolveOptions(options: BackendClientOptions): ResolvedOptions {
  for (const key of Object.keys(options)) {
    if (!ALLOWED_OPTIONS.has(key)) {
      throw new TypeError(
        `Unknown option "${key}". Allowed options: ${Array.from(ALLOWED_OPTIONS).join(", ")}`,
      );
    }
  }

  const server = requireString("server", options.server);
  if (!URL.canParse(server)) {
    throw new ConfigurationError(`Option "server" is not a valid URL: ${server}`);
  }

  const senderID = requireString("senderID", options.senderID);
  const receiverID = requireString("receiverID", options.receiverID);
  const protocolVersion = requireString(
    "protocolVersion",
    options.protocolVersion ?? DEFAULTS.PROTOCOL_VERSION,
  );

  const keyNamespace = options.keyNamespace ?? DEFAULTS.KEY_NAMESPACE;
  const keyComponent = options.keyComponent ?? DEFAULTS.KEY_COMPONENT;
  validateKeySegment("keyNamespace", keyNamespace);
  validateKeySegment("keyComponent", keyComponent);

  if ((options.tlsCert === undefined) !== (options.tlsKey === undefined)) {
    throw new ConfigurationError(
      'Options "tlsCert" and "tlsKey" must be set together',
    );
  }
  const tls = {
    ...(options.caCert !== undefined && { caCert: options.caCert }),
    ...(options.tlsCert !== undefined && { tlsCert: options.tlsCert }),
    ...(options.tlsKey !== undefined && { tlsKey: options.tlsKey }),
  };
  if (options.transport && Object.keys(tls).length > 0) {
    throw new ConfigurationError(
      'Options "caCert", "tlsCert" and "tlsKey" apply to the default transport only; configure TLS on the custom transport instead',
    );
  }

  const resolved: ResolvedOptions = {
    server,
    senderID,
    receiverID,
    protocolVersion,
    tls,
    keyNamespace,
    keyComponent,
    ...(options.transport && { transport: options.transport }),
    ...(options.logger && { logger: options.logger }),
  };

  if (!options.pubsub) {
    if (options.asyncTimeoutMs !== undefined) {
      throw new ConfigurationError(
        'Option "asyncTimeoutMs" requires "pubsub" (async mode)',
      );
    }
    if (options.asyncSendFailure !== undefined) {
      throw new ConfigurationError(
        'Option "asyncSendFailure" requires "pubsub" (async mode)',
      );
    }
    return resolved;
  }

  if (options.asyncTimeoutMs === undefined) {
    throw new ConfigurationError(
      'Option "asyncTimeoutMs" is required when "pubsub" is set',
    );
  }
  if (!isPositiveTimeout(options.asyncTimeoutMs)) {
    throw new ConfigurationError(
      `Option "asyncTimeoutMs" must be a positive number of at most ${MAX_TIMEOUT_MS}ms, got ${options.asyncTimeoutMs}`,
    );
  }

  const sendFailure = options.asyncSendFailure ?? "fail-fast";
  if (!SEND_FAILURE_POLICIES.includes(sendFailure)) {
    throw new ConfigurationError(
      `Option "asyncSendFailure" must be one of ${SEND_FAILURE_POLICIES.join(", ")}`,
    );
  }

  resolved.async = {
    pubsub: options.pubsub,
    timeoutMs: options.asyncTimeoutMs,
    sendFailure,
  };
  return resolved;
}

/**
 * @throws {ConfigurationError} if a per-call timeout is not positive or exceeds the timer maximum
 */
export function validateTimeout(timeoutMs: number): void {
  if (!isPositiveTimeout(timeoutMs)) {
    throw new ConfigurationError(
      `Option "timeoutMs" must be a positive number of at most ${MAX_TIMEOUT_MS}ms, got ${timeoutMs}`,
    );
  }
}
