import { describe, it, expect } from "vitest";
import { CodecRegistry, CodecType } from "./registry.ts";
import { BinaryCodec } from "./binary_codec.ts";
import { CodecError } from "./errors.ts";
import { createMemoryPipe } from "./memory.ts";
import type { CodecFactory } from "./codec.ts";

const custom: CodecFactory = (stream) => new BinaryCodec(stream);

function codecErrorKind(fn: () => void): string | null {
  try {
    fn();
  } catch (e) {
    if (e instanceof CodecError) return e.kind;
    throw e;
  }
  return null;
}

describe("CodecRegistry", () => {
  it("starts with the built-in codecs", () => {
    const registry = new CodecRegistry();
    expect(registry.types()).toEqual([CodecType.Binary, CodecType.Json]);
    const [a] = createMemoryPipe();
    expect(registry.lookup(CodecType.Json)?.(a).type).toBe(1);
  });

  it("registers new codec types", () => {
    const registry = new CodecRegistry();
    registry.register(7, custom);
    expect(registry.lookup(7)).toBe(custom);
    expect(registry.lookup(8)).toBeUndefined();
  });

  it("rejects duplicates", () => {
    const registry = new CodecRegistry();
    expect(codecErrorKind(() => registry.register(CodecType.Binary, custom))).toBe("duplicate");
  });

  it("seals on first lookup", () => {
    const registry = new CodecRegistry();
    expect(registry.sealed).toBe(false);
    registry.lookup(CodecType.Binary);
    expect(registry.sealed).toBe(true);
    expect(codecErrorKind(() => registry.register(9, custom))).toBe("sealed");
  });

  it("requires u32 tags", () => {
    expect(() => new CodecRegistry().register(-1, custom)).toThrow(RangeError);
  });
});
