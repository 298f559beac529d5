// Tests for schema-driven encoding/decoding

import { describe, it, expect } from "vitest";
import { encodeWithSchema, decodeWithSchema, SchemaDecodeError } from "./schema_codec.ts";
import type { EnumSchema, Schema, StructSchema } from "./schema.ts";

// ============================================================================
// Test Schemas
// ============================================================================

const PointSchema: StructSchema = {
  kind: "struct",
  fields: {
    x: { kind: "i32" },
    y: { kind: "i32" },
  },
};

const ColorSchema: EnumSchema = {
  kind: "enum",
  variants: [
    { name: "Red", fields: null },
    { name: "Green", fields: null },
    { name: "Blue", fields: null },
  ],
};

const ValueSchema: EnumSchema = {
  kind: "enum",
  variants: [
    { name: "Text", discriminant: 0, fields: { kind: "string" } },
    { name: "Pair", discriminant: 1, fields: { left: { kind: "u8" }, right: { kind: "u8" } } },
    { name: "Big", discriminant: 7, fields: { kind: "u64" } },
  ],
};

function roundTrip(value: unknown, schema: Schema): unknown {
  const bytes = encodeWithSchema(value, schema);
  const decoded = decodeWithSchema(bytes, 0, schema);
  expect(decoded.next).toBe(bytes.length);
  return decoded.value;
}

// ============================================================================
// Encoding
// ============================================================================

describe("encodeWithSchema", () => {
  it("encodes struct fields in declaration order with zigzag ints", () => {
    expect(Array.from(encodeWithSchema({ x: 1, y: -1 }, PointSchema))).toEqual([2, 1]);
  });

  it("encodes unit variants by index", () => {
    expect(Array.from(encodeWithSchema({ tag: "Blue" }, ColorSchema))).toEqual([2]);
  });

  it("encodes newtype variants with explicit discriminants", () => {
    expect(Array.from(encodeWithSchema({ tag: "Big", value: 300n }, ValueSchema))).toEqual([
      7, 0xac, 0x02,
    ]);
  });

  it("encodes struct variants field by field", () => {
    expect(Array.from(encodeWithSchema({ tag: "Pair", left: 4, right: 9 }, ValueSchema))).toEqual([
      1, 4, 9,
    ]);
  });

  it("encodes strings with a length prefix", () => {
    expect(Array.from(encodeWithSchema("hi", { kind: "string" }))).toEqual([2, 0x68, 0x69]);
  });

  it("encodes options with a presence byte", () => {
    const schema: Schema = { kind: "option", inner: { kind: "u8" } };
    expect(Array.from(encodeWithSchema(null, schema))).toEqual([0]);
    expect(Array.from(encodeWithSchema(7, schema))).toEqual([1, 7]);
  });

  it("encodes maps as a count followed by pairs", () => {
    const schema: Schema = { kind: "map", key: { kind: "string" }, value: { kind: "u32" } };
    expect(Array.from(encodeWithSchema(new Map([["a", 1]]), schema))).toEqual([1, 1, 0x61, 1]);
  });

  it("rejects values that do not match the schema", () => {
    expect(() => encodeWithSchema({ x: "1", y: 0 }, PointSchema)).toThrow(
      "field x: i32: expected an integer, got string",
    );
    expect(() => encodeWithSchema(5, { kind: "u64" })).toThrow("u64: expected a bigint, got number");
    expect(() => encodeWithSchema(256, { kind: "u8" })).toThrow("u8: 256 out of range");
    expect(() => encodeWithSchema({ tag: "Purple" }, ColorSchema)).toThrow("Unknown variant: Purple");
  });

  it("rejects tuples of the wrong length", () => {
    const schema: Schema = { kind: "tuple", elements: [{ kind: "u8" }, { kind: "bool" }] };
    expect(() => encodeWithSchema([1], schema)).toThrow("Tuple length mismatch: got 1, expected 2");
  });
});

// ============================================================================
// Decoding
// ============================================================================

describe("decodeWithSchema", () => {
  it("round-trips nested shapes", () => {
    const schema: Schema = {
      kind: "struct",
      fields: {
        id: { kind: "u64" },
        tags: { kind: "vec", element: { kind: "string" } },
        origin: { kind: "option", inner: PointSchema },
        scores: { kind: "map", key: { kind: "string" }, value: { kind: "f64" } },
        blob: { kind: "bytes" },
        pair: { kind: "tuple", elements: [{ kind: "i64" }, { kind: "bool" }] },
      },
    };
    const value = {
      id: 42n,
      tags: ["a", "bc"],
      origin: { x: -5, y: 12 },
      scores: new Map([["math", 0.5]]),
      blob: Uint8Array.of(1, 2, 3),
      pair: [-9n, true],
    };
    expect(roundTrip(value, schema)).toEqual(value);
  });

  it("decodes enums to tagged objects", () => {
    expect(roundTrip({ tag: "Text", value: "x" }, ValueSchema)).toEqual({ tag: "Text", value: "x" });
    expect(roundTrip({ tag: "Pair", left: 1, right: 2 }, ValueSchema)).toEqual({
      tag: "Pair",
      left: 1,
      right: 2,
    });
    expect(roundTrip({ tag: "Green" }, ColorSchema)).toEqual({ tag: "Green" });
  });

  it("decodes starting at an offset", () => {
    const result = decodeWithSchema(Uint8Array.of(0xff, 2, 1), 1, PointSchema);
    expect(result).toEqual({ value: { x: 1, y: -1 }, next: 3 });
  });

  it("reports the path of an invalid value", () => {
    const schema: StructSchema = {
      kind: "struct",
      fields: { flag: { kind: "option", inner: { kind: "u8" } } },
    };
    try {
      decodeWithSchema(Uint8Array.of(2), 0, schema);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(SchemaDecodeError);
      if (!(e instanceof SchemaDecodeError)) return;
      expect(e.path).toBe("flag");
      expect(e.offset).toBe(0);
      expect(e.message).toContain("invalid option discriminant: 2 (expected 0 or 1)");
    }
  });

  it("fails on truncated input", () => {
    expect(() => decodeWithSchema(Uint8Array.of(5, 0x68), 0, { kind: "string" })).toThrow(
      SchemaDecodeError,
    );
    expect(() => decodeWithSchema(Uint8Array.of(2), 0, PointSchema)).toThrow("i32");
  });

  it("rejects unknown discriminants", () => {
    expect(() => decodeWithSchema(Uint8Array.of(3), 0, ColorSchema)).toThrow(
      "unknown enum discriminant: 3 (valid: 0=Red, 1=Green, 2=Blue)",
    );
  });

  it("returns bytes that do not alias the input buffer", () => {
    const buf = Uint8Array.of(2, 10, 20);
    const { value } = decodeWithSchema(buf, 0, { kind: "bytes" });
    buf[1] = 99;
    expect(value).toEqual(Uint8Array.of(10, 20));
  });
});
