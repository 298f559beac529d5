// Postcard primitives: single bytes for u8/i8/bool, varints for wider
// integers (zigzag for signed), little-endian IEEE 754 for floats, and
// length-prefixed UTF-8 / raw bytes.

import type { PrimitiveKind } from "./schema.ts";
import { encodeVarint, decodeVarint, decodeVarintNumber } from "./binary/varint.ts";
import { concat } from "./binary/bytes.ts";

export interface DecodeResult<T> {
  value: T;
  /** Offset just past the decoded value. */
  next: number;
}

/** Encoder/decoder pair for one primitive kind. encode validates its input. */
export interface Primitive<T> {
  encode(value: unknown): Uint8Array;
  decode(buf: Uint8Array, offset: number): DecodeResult<T>;
}

/** Short type description for error messages. */
export function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Uint8Array) return "bytes";
  if (value instanceof Map) return "map";
  return typeof value;
}

function checkInt(kind: string, value: unknown, min: number, max: number): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`${kind}: expected an integer, got ${describe(value)}`);
  }
  if (value < min || value > max) throw new Error(`${kind}: ${value} out of range`);
  return value;
}

function checkBigint(kind: string, value: unknown, min: bigint, max: bigint): bigint {
  if (typeof value !== "bigint") throw new Error(`${kind}: expected a bigint, got ${describe(value)}`);
  if (value < min || value > max) throw new Error(`${kind}: ${value} out of range`);
  return value;
}

function need(kind: string, buf: Uint8Array, offset: number, n: number): void {
  if (offset + n > buf.length) throw new Error(`${kind}: eof`);
}

const zigzag = {
  encode: (n: bigint): bigint => (n >= 0n ? n << 1n : (-n << 1n) - 1n),
  decode: (n: bigint): bigint => ((n & 1n) === 0n ? n >> 1n : -((n + 1n) >> 1n)),
};

const bool: Primitive<boolean> = {
  encode(value) {
    if (typeof value !== "boolean") throw new Error(`bool: expected a boolean, got ${describe(value)}`);
    return Uint8Array.of(value ? 1 : 0);
  },
  decode(buf, offset) {
    need("bool", buf, offset, 1);
    const byte = buf[offset];
    if (byte > 1) throw new Error(`bool: invalid value ${byte}`);
    return { value: byte === 1, next: offset + 1 };
  },
};

/** u8/i8: one byte, two's complement for i8. */
function byteInt(kind: "u8" | "i8", min: number, max: number): Primitive<number> {
  return {
    encode: (value) => Uint8Array.of(checkInt(kind, value, min, max) & 0xff),
    decode(buf, offset) {
      need(kind, buf, offset, 1);
      const byte = buf[offset];
      return { value: byte > max ? byte - 0x100 : byte, next: offset + 1 };
    },
  };
}

function unsignedVarint(kind: "u16" | "u32", max: number): Primitive<number> {
  return {
    encode: (value) => encodeVarint(checkInt(kind, value, 0, max)),
    decode(buf, offset) {
      const result = decodeVarintNumber(buf, offset);
      if (result.value > max) throw new Error(`${kind}: overflow`);
      return result;
    },
  };
}

function signedVarint(kind: "i16" | "i32", min: number, max: number): Primitive<number> {
  return {
    encode: (value) => encodeVarint(zigzag.encode(BigInt(checkInt(kind, value, min, max)))),
    decode(buf, offset) {
      const { value, next } = decodeVarint(buf, offset);
      const n = Number(zigzag.decode(value));
      if (n < min || n > max) throw new Error(`${kind}: overflow`);
      return { value: n, next };
    },
  };
}

const u64: Primitive<bigint> = {
  encode: (value) => encodeVarint(checkBigint("u64", value, 0n, 0xffff_ffff_ffff_ffffn)),
  decode: decodeVarint,
};

const i64: Primitive<bigint> = {
  encode: (value) =>
    encodeVarint(zigzag.encode(checkBigint("i64", value, -0x8000_0000_0000_0000n, 0x7fff_ffff_ffff_ffffn))),
  decode(buf, offset) {
    const { value, next } = decodeVarint(buf, offset);
    return { value: zigzag.decode(value), next };
  },
};

function float(kind: "f32" | "f64"): Primitive<number> {
  const size = kind === "f32" ? 4 : 8;
  return {
    encode(value) {
      if (typeof value !== "number") throw new Error(`${kind}: expected a number, got ${describe(value)}`);
      const out = new Uint8Array(size);
      const view = new DataView(out.buffer);
      if (size === 4) view.setFloat32(0, value, true);
      else view.setFloat64(0, value, true);
      return out;
    },
    decode(buf, offset) {
      need(kind, buf, offset, size);
      const view = new DataView(buf.buffer, buf.byteOffset + offset, size);
      const value = size === 4 ? view.getFloat32(0, true) : view.getFloat64(0, true);
      return { value, next: offset + size };
    },
  };
}

/** A varint length followed by that many bytes. */
function lengthPrefixed<T>(
  kind: "string" | "bytes",
  toBytes: (value: unknown) => Uint8Array,
  fromBytes: (bytes: Uint8Array) => T,
): Primitive<T> {
  return {
    encode(value) {
      const bytes = toBytes(value);
      return concat(encodeVarint(bytes.length), bytes);
    },
    decode(buf, offset) {
      const len = decodeVarintNumber(buf, offset);
      const end = len.next + len.value;
      if (end > buf.length) throw new Error(`${kind}: overrun`);
      return { value: fromBytes(buf.subarray(len.next, end)), next: end };
    },
  };
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

const string = lengthPrefixed(
  "string",
  (value) => {
    if (typeof value !== "string") throw new Error(`string: expected a string, got ${describe(value)}`);
    return utf8Encoder.encode(value);
  },
  (bytes) => utf8Decoder.decode(bytes),
);

const bytes = lengthPrefixed(
  "bytes",
  (value) => {
    if (!(value instanceof Uint8Array)) throw new Error(`bytes: expected Uint8Array, got ${describe(value)}`);
    return value;
  },
  // copied: decoded values never alias the frame buffer
  (raw) => raw.slice(),
);

export const primitives: Record<PrimitiveKind, Primitive<unknown>> = {
  bool,
  u8: byteInt("u8", 0, 0xff),
  i8: byteInt("i8", -0x80, 0x7f),
  u16: unsignedVarint("u16", 0xffff),
  u32: unsignedVarint("u32", 0xffff_ffff),
  u64,
  i16: signedVarint("i16", -0x8000, 0x7fff),
  i32: signedVarint("i32", -0x8000_0000, 0x7fff_ffff),
  i64,
  f32: float("f32"),
  f64: float("f64"),
  string,
  bytes,
};
