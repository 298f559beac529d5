import { describe, it, expect } from "vitest";
import { encodeVarint, decodeVarint, decodeVarintNumber, U64_MAX } from "./varint.ts";

describe("varint", () => {
  it("encodes seven bits per byte, low group first", () => {
    expect(Array.from(encodeVarint(0))).toEqual([0]);
    expect(Array.from(encodeVarint(127))).toEqual([0x7f]);
    expect(Array.from(encodeVarint(300))).toEqual([0xac, 0x02]);
  });

  it("carries the full u64 range", () => {
    const bytes = encodeVarint(U64_MAX);
    expect(Array.from(bytes)).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01]);
    expect(decodeVarint(bytes, 0)).toEqual({ value: U64_MAX, next: 10 });
  });

  it("rejects values outside u64", () => {
    expect(() => encodeVarint(-1)).toThrow("varint: negative value -1");
    expect(() => encodeVarint(U64_MAX + 1n)).toThrow("exceeds u64");
  });

  it("fails on truncated and overlong input", () => {
    expect(() => decodeVarint(Uint8Array.of(0x80), 0)).toThrow("varint: eof");
    expect(() => decodeVarint(new Uint8Array(11).fill(0x80), 0)).toThrow("varint: overflow");
  });

  it("refuses numbers past the safe integer range", () => {
    const bytes = encodeVarint(2n ** 60n);
    expect(() => decodeVarintNumber(bytes, 0)).toThrow("too large");
  });
});
