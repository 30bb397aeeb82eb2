/**
 * Unit tests for luma-frame-codec.ts
 */

import { describe, it, expect } from "vitest";
import {
  decodeLumaFrame,
  encodeLumaFrame,
  isLumaFrame,
  isValidLumaFrameHeader,
  toRawFrame,
} from "./luma-frame-codec.js";
import type { LumaFrameHeader } from "./types.js";

function header(overrides: Partial<LumaFrameHeader> = {}): LumaFrameHeader {
  return { timestampNs: 1000, seq: 3, width: 4, height: 2, rowStride: 4, ...overrides };
}

function withHeaderJson(json: string, payload: Uint8Array = new Uint8Array(8)): Buffer {
  const h = Buffer.from(json, "utf-8");
  return Buffer.concat([Buffer.from([0x43, 0x47, 0x4c, 0, (h.length >> 8) & 0xff, h.length & 0xff]), h, payload]);
}

describe("encodeLumaFrame", () => {
  it("writes magic, type, a big-endian header length, the header and the payload", () => {
    const h = header();
    const json = JSON.stringify(h);
    const buf = encodeLumaFrame(h, Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8]));

    expect([...buf.subarray(0, 3)]).toEqual([0x43, 0x47, 0x4c]);
    expect((buf[3] << 16) | (buf[4] << 8) | buf[5]).toBe(json.length);
    expect(buf.toString("utf-8", 6, 6 + json.length)).toBe(json);
    expect([...buf.subarray(6 + json.length)]).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });
});

describe("decodeLumaFrame", () => {
  it("reads back header and payload", () => {
    const h = header({ focusDiopters: 4 });
    const decoded = decodeLumaFrame(encodeLumaFrame(h, Uint8Array.from([9, 8, 7, 6, 5, 4, 3, 2])));
    expect(decoded?.header).toEqual(h);
    expect([...(decoded?.luma ?? [])]).toEqual([9, 8, 7, 6, 5, 4, 3, 2]);
  });

  it("accepts a short last row", () => {
    // rowStride 6: one full row plus the 4 used bytes of the last
    const h = header({ rowStride: 6 });
    expect(decodeLumaFrame(encodeLumaFrame(h, new Uint8Array(10)))).not.toBeNull();
    expect(decodeLumaFrame(encodeLumaFrame(h, new Uint8Array(9)))).toBeNull();
  });

  it.each([
    ["too short", Buffer.from([0x43, 0x47, 0x4c])],
    ["wrong magic", Buffer.from([0x41, 0x47, 0x4c, 0, 0, 2, 0x7b, 0x7d])],
    ["wrong type", Buffer.from([0x43, 0x47, 0x4a, 0, 0, 2, 0x7b, 0x7d])],
    ["zero header length", Buffer.from([0x43, 0x47, 0x4c, 0, 0, 0])],
    ["header longer than the buffer", Buffer.from([0x43, 0x47, 0x4c, 0, 0, 50, 0x7b])],
    ["header over 4096 bytes", Buffer.from([0x43, 0x47, 0x4c, 0, 0x10, 0x01])],
    ["invalid JSON", withHeaderJson("{nope")],
    ["missing fields", withHeaderJson('{"timestampNs":1}')],
  ])("rejects %s", (_label, data) => {
    expect(decodeLumaFrame(data)).toBeNull();
  });
});

describe("isValidLumaFrameHeader", () => {
  it("accepts a complete header", () => {
    expect(isValidLumaFrameHeader(header())).toBe(true);
  });

  it.each([
    ["negative timestamp", { timestampNs: -1 }],
    ["fractional seq", { seq: 1.5 }],
    ["zero width", { width: 0 }],
    ["width over 4096", { width: 5000, rowStride: 5000 }],
    ["row stride under width", { rowStride: 3 }],
    ["negative focus", { focusDiopters: -2 }],
    ["infinite focus", { focusDiopters: Number.POSITIVE_INFINITY }],
  ])("rejects %s", (_label, overrides) => {
    expect(isValidLumaFrameHeader({ ...header(), ...overrides })).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isValidLumaFrameHeader(null)).toBe(false);
    expect(isValidLumaFrameHeader([1, 2])).toBe(false);
  });
});

describe("isLumaFrame", () => {
  it("checks only the prefix", () => {
    expect(isLumaFrame(Buffer.from([0x43, 0x47, 0x4c]))).toBe(true);
    expect(isLumaFrame(Buffer.from([0x43, 0x47]))).toBe(false);
    expect(isLumaFrame(Buffer.from("{}"))).toBe(false);
  });
});

describe("toRawFrame", () => {
  it("exposes the payload as a packed luma frame", () => {
    const decoded = decodeLumaFrame(encodeLumaFrame(header({ rowStride: 5 }), new Uint8Array(9)));
    expect(decoded).not.toBeNull();
    if (!decoded) return;
    const frame = toRawFrame(decoded);
    expect(frame).toMatchObject({ width: 4, height: 2, rowStride: 5, pixelStride: 1, timestampNs: 1000 });
    expect(frame.luma.length).toBe(9);
  });
});
