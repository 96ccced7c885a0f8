// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { silentLogger } from "@roamlink/core";
import { memoryPubSub } from "@roamlink/memory";
import { describe, expect, it } from "vitest";
import { ConfigurationError, createBackendClient } from "../../src/index.js";
import type { BackendClientOptions } from "../../src/index.js";
import { FakeTransport, SERVER } from "../helpers.js";

const BASE: BackendClientOptions = {
  server: SERVER,
  senderID: "000001",
  receiverID: "000002",
  transport: new FakeTransport(),
  logger: silentLogger,
};

describe("client options", () => {
  it("applies defaults", () => {
    const client = createBackendClient(BASE);

    expect(client.senderID).toBe("000001");
    expect(client.receiverID).toBe("000002");
    expect(client.protocolVersion).toBe("1.0");
    expect(client.isAsync).toBe(false);
  });

  it("keeps an explicit protocol version", () => {
    const client = createBackendClient({ ...BASE, protocolVersion: "1.1" });

    expect(client.protocolVersion).toBe("1.1");
  });

  it("is async when a pubsub is configured", () => {
    const client = createBackendClient({
      ...BASE,
      pubsub: memoryPubSub(),
      asyncTimeoutMs: 500,
    });

    expect(client.isAsync).toBe(true);
  });

  it("rejects unknown options", () => {
    const options = { ...BASE, timeout: 5 };

    expect(() => createBackendClient(options)).toThrow(
      'Unknown option "timeout"',
    );
  });

  it.each([
    ["an empty senderID", { senderID: "" }, 'Option "senderID" must be a non-empty string'],
    ["an invalid server URL", { server: "not a url" }, 'Option "server" is not a valid URL: not a url'],
    ["asyncTimeoutMs without pubsub", { asyncTimeoutMs: 100 }, 'Option "asyncTimeoutMs" requires "pubsub" (async mode)'],
    ["asyncSendFailure without pubsub", { asyncSendFailure: "await-answer" }, 'Option "asyncSendFailure" requires "pubsub" (async mode)'],
    ["tlsCert without tlsKey", { tlsCert: "/etc/peer/cert.pem" }, 'Options "tlsCert" and "tlsKey" must be set together'],
    ["TLS files with a custom transport", { caCert: "/etc/peer/ca.pem" }, 'Options "caCert", "tlsCert" and "tlsKey" apply to the default transport only; configure TLS on the custom transport instead'],
  ] satisfies [string, Partial<BackendClientOptions>, string][])(
    "rejects %s",
    (_, overrides, message) => {
      expect(() => createBackendClient({ ...BASE, ...overrides })).toThrow(
        new ConfigurationError(message),
      );
    },
  );

  it("requires asyncTimeoutMs with pubsub", () => {
    expect(() =>
      createBackendClient({ ...BASE, pubsub: memoryPubSub() }),
    ).toThrow('Option "asyncTimeoutMs" is required when "pubsub" is set');
  });

  it("requires a positive asyncTimeoutMs", () => {
    expect(() =>
      createBackendClient({ ...BASE, pubsub: memoryPubSub(), asyncTimeoutMs: 0 }),
    ).toThrow(ConfigurationError);
  });

  it("rejects a key namespace that could collide", () => {
    expect(() =>
      createBackendClient({ ...BASE, keyNamespace: "lora:eu" }),
    ).toThrow(TypeError);
  });

  it("rejects a non-positive per-call timeout", async () => {
    const client = createBackendClient({
      ...BASE,
      pubsub: memoryPubSub(),
      asyncTimeoutMs: 500,
    });

    await expect(
      client.profileReq({ DevEUI: "01" }, { timeoutMs: -1 }),
    ).rejects.toThrow(
      'Option "timeoutMs" must be a positive number of at most 2147483647ms, got -1',
    );
  });

  it("rejects an asyncTimeoutMs beyond the timer maximum", () => {
    expect(() =>
      createBackendClient({
        ...BASE,
        pubsub: memoryPubSub(),
        asyncTimeoutMs: 2 ** 31,
      }),
    ).toThrow(
      new ConfigurationError(
        'Option "asyncTimeoutMs" must be a positive number of at most 2147483647ms, got 2147483648',
      ),
    );
  });

  it("accepts an asyncTimeoutMs at the timer maximum", () => {
    const client = createBackendClient({
      ...BASE,
      pubsub: memoryPubSub(),
      asyncTimeoutMs: 2_147_483_647,
    });

    expect(client.isAsync).toBe(true);
  });

  it("rejects a per-call timeout beyond the timer maximum without sending", async () => {
    const transport = new FakeTransport();
    const client = createBackendClient({
      ...BASE,
      transport,
      pubsub: memoryPubSub(),
      asyncTimeoutMs: 500,
    });

    await expect(
      client.prStopReq({ DevEUI: "01", TransactionID: 9 }, { timeoutMs: 2 ** 31 }),
    ).rejects.toThrow(ConfigurationError);
    expect(transport.requests).toEqual([]);
  });

  it("fails when a certificate file cannot be read", () => {
    const { transport: _transport, ...rest } = BASE;

    expect(() =>
      createBackendClient({ ...rest, caCert: "/nonexistent/roamlink/ca.pem" }),
    ).toThrow('Failed to read caCert from "/nonexistent/roamlink/ca.pem"');
  });

  it("closes the default transport but not a custom one", async () => {
    const transport = new FakeTransport();
    await createBackendClient({ ...BASE, transport }).close();
    expect(transport.closeCalls).toBe(0);

    const { transport: _transport, ...rest } = BASE;
    await expect(createBackendClient(rest).close()).resolves.toBeUndefined();
  });
});
