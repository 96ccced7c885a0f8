// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { asyncKey, createKeyBuilder } from "./correlation-key.js";

describe("asyncKey", () => {
  it("uses the default namespace and component", () => {
    expect(asyncKey("PRStartReq", 7)).toBe("lora:backend:async:PRStartReq:7");
  });

  it("honors a custom namespace", () => {
    expect(asyncKey("PRStartReq", 7, { namespace: "ns" })).toBe(
      "ns:backend:async:PRStartReq:7",
    );
  });

  it("is deterministic and distinct per input", () => {
    expect(asyncKey("ProfileReq", 1)).toBe(asyncKey("ProfileReq", 1));
    expect(asyncKey("ProfileReq", 1)).not.toBe(asyncKey("ProfileReq", 11));
    expect(asyncKey("ProfileReq", 1)).not.toBe(asyncKey("HomeNSReq", 1));
  });

  it("encodes the id in decimal across the full 32-bit range", () => {
    expect(asyncKey("HomeNSReq", 0)).toBe("lora:backend:async:HomeNSReq:0");
    expect(asyncKey("HomeNSReq", 4294967295)).toBe(
      "lora:backend:async:HomeNSReq:4294967295",
    );
  });

  it("rejects ids outside uint32", () => {
    expect(() => asyncKey("HomeNSReq", -1)).toThrow(TypeError);
    expect(() => asyncKey("HomeNSReq", 4294967296)).toThrow(TypeError);
    expect(() => asyncKey("HomeNSReq", 1.5)).toThrow(TypeError);
  });

  it("rejects segments containing the delimiter", () => {
    expect(() => asyncKey("PRStartReq", 1, { namespace: "a:b" })).toThrow(
      TypeError,
    );
    expect(() => asyncKey("PRStartReq", 1, { component: "" })).toThrow(
      TypeError,
    );
    expect(() => asyncKey("PR:StartReq", 1)).toThrow(TypeError);
  });
});

describe("createKeyBuilder", () => {
  it("binds namespace and component", () => {
    const key = createKeyBuilder({ namespace: "ns", component: "roaming" });
    expect(key("XmitDataReq", 99)).toBe("ns:roaming:async:XmitDataReq:99");
  });

  it("validates segments up front", () => {
    expect(() => createKeyBuilder({ namespace: "bad ns" })).toThrow(TypeError);
  });
});
