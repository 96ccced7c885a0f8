// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { decodeAnswer, encodePayload } from "./codec.js";
import { SerializationError } from "./error.js";
import type {
  HomeNSAnsPayload,
  PRStartAnsPayload,
  PRStopAnsPayload,
  ProfileAnsPayload,
  XmitDataAnsPayload,
} from "./protocol/messages.js";

const base = {
  ProtocolVersion: "1.0",
  SenderID: "000002",
  ReceiverID: "000001",
  TransactionID: 1234,
};

describe("decodeAnswer", () => {
  it("decodes a minimal answer", () => {
    const answer = decodeAnswer(
      "PRStartReq",
      '{"TransactionID":42,"Result":{"ResultCode":"Success"}}',
    );

    expect(answer).toEqual({
      TransactionID: 42,
      Result: { ResultCode: "Success" },
    });
  });

  it("keeps operation fields the schema does not check", () => {
    const answer = decodeAnswer(
      "HomeNSReq",
      JSON.stringify({
        ...base,
        MessageType: "HomeNSAns",
        Result: { ResultCode: "Success" },
        HNetID: "000013",
      }),
    );

    expect(answer.HNetID).toBe("000013");
  });

  it("round-trips every operation's answer", () => {
    const startAns: PRStartAnsPayload = {
      ...base,
      MessageType: "PRStartAns",
      Result: { ResultCode: "Success", Description: "ok" },
      PHYPayload: "600102030480010001",
      DevEUI: "0102030405060708",
      Lifetime: 3600,
      FNwkSIntKey: { KEKLabel: "", AESKey: "00112233445566778899aabbccddeeff" },
      FCntUp: 10,
      DLMetaData: { DevEUI: "0102030405060708", DLFreq1: 868.1, RXDelay1: 1 },
    };
    const stopAns: PRStopAnsPayload = {
      ...base,
      MessageType: "PRStopAns",
      Result: { ResultCode: "UnknownDevEUI", Description: "no such device" },
    };
    const xmitAns: XmitDataAnsPayload = {
      ...base,
      MessageType: "XmitDataAns",
      Result: { ResultCode: "Success" },
      DLFreq1: 868.3,
    };
    const profileAns: ProfileAnsPayload = {
      ...base,
      MessageType: "ProfileAns",
      Result: { ResultCode: "Success" },
      DeviceProfile: { SupportsClassB: false, MACVersion: "1.0.3" },
      RoamingActivationType: "Passive",
    };
    const homeAns: HomeNSAnsPayload = {
      ...base,
      MessageType: "HomeNSAns",
      Result: { ResultCode: "Success" },
      HNetID: "000013",
    };

    expect(decodeAnswer("PRStartReq", encodePayload(startAns))).toEqual(startAns);
    expect(decodeAnswer("PRStopReq", encodePayload(stopAns))).toEqual(stopAns);
    expect(decodeAnswer("XmitDataReq", encodePayload(xmitAns))).toEqual(xmitAns);
    expect(decodeAnswer("ProfileReq", encodePayload(profileAns))).toEqual(
      profileAns,
    );
    expect(decodeAnswer("HomeNSReq", encodePayload(homeAns))).toEqual(homeAns);
  });

  it("rejects a body that is not JSON", () => {
    expect(() => decodeAnswer("PRStopReq", "<html>")).toThrow(
      SerializationError,
    );
  });

  it("rejects an answer without a result code", () => {
    try {
      decodeAnswer("PRStopReq", '{"TransactionID":1,"Result":{}}');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SerializationError);
      if (error instanceof SerializationError) {
        expect(error.code).toBe("SERIALIZATION_ERROR");
        expect(error.issues[0]?.path).toEqual(["Result", "ResultCode"]);
      }
    }
  });

  it("rejects a transaction id outside 32 bits", () => {
    expect(() =>
      decodeAnswer(
        "PRStopReq",
        '{"TransactionID":4294967296,"Result":{"ResultCode":"Success"}}',
      ),
    ).toThrow(SerializationError);
  });
});

describe("encodePayload", () => {
  it("encodes plain objects", () => {
    expect(encodePayload({ TransactionID: 1 })).toBe('{"TransactionID":1}');
  });

  it("fails on values JSON cannot represent", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(() => encodePayload(cyclic)).toThrow(SerializationError);
    expect(() => encodePayload({ n: 1n })).toThrow(SerializationError);
    expect(() => encodePayload(undefined)).toThrow(SerializationError);
  });
});
