// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { silentLogger } from "@roamlink/core";
import { describe, expect, it } from "vitest";
import {
  TransportError,
  UnexpectedStatusError,
  createBackendClient,
} from "../../src/index.js";
import type { BackendClient } from "../../src/index.js";
import { FakeTransport, SERVER, ok } from "../helpers.js";

const ANSWER = {
  ProtocolVersion: "1.0",
  SenderID: "000002",
  ReceiverID: "000001",
  TransactionID: 12,
  MessageType: "PRStartAns",
  Result: { ResultCode: "Success" },
};

function client(transport: FakeTransport): BackendClient {
  return createBackendClient({
    server: SERVER,
    senderID: "000002",
    receiverID: "000001",
    transport,
    logger: silentLogger,
  });
}

describe("sendAnswer", () => {
  it("posts the encoded answer and accepts 200", async () => {
    const transport = new FakeTransport(() => ok(""));

    await client(transport).sendAnswer(ANSWER);

    expect(transport.requests).toEqual([
      { url: SERVER, body: JSON.stringify(ANSWER) },
    ]);
  });

  it("fails with status and body on anything but 200", async () => {
    const transport = new FakeTransport(() => ({
      status: 503,
      body: "overloaded",
    }));

    const error = await client(transport)
      .sendAnswer(ANSWER)
      .then(
        () => expect.unreachable(),
        (err: unknown) => err,
      );

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({
      status: 503,
      body: "overloaded",
      message: "expected: 200, got: 503 (overloaded)",
      retryable: true,
    });
  });

  it("treats other 2xx statuses as failures", async () => {
    const transport = new FakeTransport(() => ({ status: 202, body: "" }));

    await expect(client(transport).sendAnswer(ANSWER)).rejects.toMatchObject({
      status: 202,
      retryable: false,
    });
  });

  it("wraps transport failures", async () => {
    const transport = new FakeTransport(() => {
      throw new Error("socket hang up");
    });

    await expect(client(transport).sendAnswer(ANSWER)).rejects.toThrow(
      TransportError,
    );
  });
});
