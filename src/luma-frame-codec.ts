/**
 * Binary frame codec for CG-prefixed luma frames.
 *
 * Wire format: [0x43 0x47 magic ("CG")][type byte 0x4C ("L")][3-byte big-endian uint24 header JSON length][UTF-8 header JSON][luma bytes]
 *
 * The payload is a packed 8-bit luma plane: `height` rows, `rowStride` bytes
 * apart, the first `width` bytes of each row used.
 */

import { createLumaFrame, requiredLumaBytes } from "./luma-frame.js";
import type { LumaFrameHeader, RawFrame } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const CG_MAGIC_0 = 0x43; // 'C'
const CG_MAGIC_1 = 0x47; // 'G'
const TYPE_LUMA = 0x4c; // 'L'

/** Minimum valid frame size: 2 (magic) + 1 (type) + 3 (header len) = 6 bytes */
const MIN_FRAME_SIZE = 6;

/** Maximum header JSON size in bytes */
const MAX_HEADER_JSON_BYTES = 4096;

/** Maximum frame side in pixels */
const MAX_SIDE = 4096;

/** Maximum luma payload size (32 MB) */
const MAX_LUMA_PAYLOAD_BYTES = 32 * 1024 * 1024;

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Encode a luma frame into the CG-prefixed wire format.
 * Produces: [0x43 0x47][0x4C][uint24 header len][header JSON][luma bytes]
 */
export function encodeLumaFrame(header: LumaFrameHeader, luma: Uint8Array): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), "utf-8");
  const buf = Buffer.alloc(MIN_FRAME_SIZE + headerJson.length + luma.length);

  let offset = 0;
  buf[offset++] = CG_MAGIC_0;
  buf[offset++] = CG_MAGIC_1;
  buf[offset++] = TYPE_LUMA;

  // Write uint24 big-endian header length
  buf[offset++] = (headerJson.length >> 16) & 0xff;
  buf[offset++] = (headerJson.length >> 8) & 0xff;
  buf[offset++] = headerJson.length & 0xff;

  headerJson.copy(buf, offset);
  offset += headerJson.length;

  buf.set(luma, offset);
  return buf;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDimension(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 && value <= MAX_SIDE;
}

/**
 * Validate a LumaFrameHeader has all required fields with correct types.
 */
export function isValidLumaFrameHeader(obj: unknown): obj is LumaFrameHeader {
  if (!isRecord(obj)) return false;

  // timestampNs: number >= 0
  const ts = obj.timestampNs;
  if (typeof ts !== "number" || !Number.isFinite(ts) || ts < 0) return false;

  // seq: non-negative integer
  const seq = obj.seq;
  if (typeof seq !== "number" || !Number.isInteger(seq) || seq < 0) return false;

  const { width, height, rowStride } = obj;
  if (!isDimension(width) || !isDimension(height)) return false;
  if (typeof rowStride !== "number" || !Number.isInteger(rowStride) || rowStride < width) return false;

  // focusDiopters: optional, finite, non-negative
  const fd = obj.focusDiopters;
  if (fd !== undefined && (typeof fd !== "number" || !Number.isFinite(fd) || fd < 0)) return false;

  return true;
}

export interface DecodedLumaFrame {
  header: LumaFrameHeader;
  luma: Buffer;
}

/**
 * Decode a luma frame from the CG-prefixed wire format.
 * Returns null on malformed input.
 */
export function decodeLumaFrame(data: Buffer): DecodedLumaFrame | null {
  // Check minimum size
  if (!Buffer.isBuffer(data) || data.length < MIN_FRAME_SIZE) return null;

  // Check CG magic prefix and type byte
  if (data[0] !== CG_MAGIC_0 || data[1] !== CG_MAGIC_1) return null;
  if (data[2] !== TYPE_LUMA) return null;

  // Read uint24 big-endian header length
  const headerLen = (data[3] << 16) | (data[4] << 8) | data[5];
  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) return null;
  if (data.length < MIN_FRAME_SIZE + headerLen) return null;

  let header: unknown;
  try {
    header = JSON.parse(data.toString("utf-8", MIN_FRAME_SIZE, MIN_FRAME_SIZE + headerLen));
  } catch {
    return null;
  }
  if (!isValidLumaFrameHeader(header)) return null;

  const luma = data.subarray(MIN_FRAME_SIZE + headerLen);
  if (luma.length > MAX_LUMA_PAYLOAD_BYTES) return null;
  if (luma.length < requiredLumaBytes(header.width, header.height, header.rowStride)) return null;

  return { header, luma };
}

// ─── Inspection ─────────────────────────────────────────────────────────────────

/**
 * Check if a buffer is a CG-prefixed luma frame.
 * Checks magic prefix 0x43 0x47 and type byte 0x4C.
 */
export function isLumaFrame(data: Buffer): boolean {
  if (!Buffer.isBuffer(data) || data.length < 3) return false;
  return data[0] === CG_MAGIC_0 && data[1] === CG_MAGIC_1 && data[2] === TYPE_LUMA;
}

/** View a decoded frame as a RawFrame (packed luma, pixelStride 1). */
export function toRawFrame(decoded: DecodedLumaFrame): RawFrame {
  const { header, luma } = decoded;
  return createLumaFrame(header.width, header.height, luma, header.timestampNs, header.rowStride);
}
