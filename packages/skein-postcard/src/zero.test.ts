import { describe, it, expect } from "vitest";
import { zeroValue } from "./zero.ts";
import type { Schema } from "./schema.ts";

describe("zeroValue", () => {
  it("gives zero primitives", () => {
    expect(zeroValue({ kind: "bool" })).toBe(false);
    expect(zeroValue({ kind: "i32" })).toBe(0);
    expect(zeroValue({ kind: "f64" })).toBe(0);
    expect(zeroValue({ kind: "u64" })).toBe(0n);
    expect(zeroValue({ kind: "string" })).toBe("");
    expect(zeroValue({ kind: "bytes" })).toEqual(new Uint8Array(0));
    expect(zeroValue({ kind: "option", inner: { kind: "u8" } })).toBeNull();
  });

  it("gives present but empty maps and vecs", () => {
    const map = zeroValue({ kind: "map", key: { kind: "string" }, value: { kind: "u32" } });
    expect(map).toBeInstanceOf(Map);
    expect(map).toEqual(new Map());
    expect(zeroValue({ kind: "vec", element: { kind: "u8" } })).toEqual([]);
  });

  it("fills struct and tuple members recursively", () => {
    const schema: Schema = {
      kind: "struct",
      fields: {
        name: { kind: "string" },
        index: { kind: "map", key: { kind: "string" }, value: { kind: "i64" } },
        pos: { kind: "tuple", elements: [{ kind: "i16" }, { kind: "i16" }] },
      },
    };
    expect(zeroValue(schema)).toEqual({ name: "", index: new Map(), pos: [0, 0] });
  });

  it("takes the first enum variant", () => {
    expect(
      zeroValue({
        kind: "enum",
        variants: [
          { name: "Leaf", fields: { kind: "u32" } },
          { name: "Empty", fields: null },
        ],
      }),
    ).toEqual({ tag: "Leaf", value: 0 });
    expect(
      zeroValue({
        kind: "enum",
        variants: [{ name: "At", fields: { line: { kind: "u32" }, file: { kind: "string" } } }],
      }),
    ).toEqual({ tag: "At", line: 0, file: "" });
  });

  it("returns a fresh value on every call", () => {
    const schema: Schema = { kind: "vec", element: { kind: "u8" } };
    expect(zeroValue(schema)).not.toBe(zeroValue(schema));
  });
});
