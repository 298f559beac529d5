import type { CodecFactory } from "./codec.ts";
import { BinaryCodec } from "./binary_codec.ts";
import { JsonCodec } from "./json_codec.ts";
import { CodecError } from "./errors.ts";

/** Built-in codec type tags. */
export const CodecType = {
  Binary: 0,
  Json: 1,
} as const;

export type CodecType = (typeof CodecType)[keyof typeof CodecType];

/**
 * Codec type tag → factory.
 *
 * Populated before any connection is made: the first lookup seals the
 * registry and later registrations throw.
 */
export class CodecRegistry {
  private factories = new Map<number, CodecFactory>();
  private isSealed = false;

  constructor() {
    this.factories.set(CodecType.Binary, (stream) => new BinaryCodec(stream));
    this.factories.set(CodecType.Json, (stream) => new JsonCodec(stream));
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  register(tag: number, factory: CodecFactory): void {
    if (!Number.isInteger(tag) || tag < 0 || tag > 0xffff_ffff) {
      throw new RangeError(`codec type must be a u32, got ${tag}`);
    }
    if (this.isSealed) throw CodecError.sealed(tag);
    if (this.factories.has(tag)) throw CodecError.duplicate(tag);
    this.factories.set(tag, factory);
  }

  lookup(tag: number): CodecFactory | undefined {
    this.isSealed = true;
    return this.factories.get(tag);
  }

  types(): number[] {
    return [...this.factories.keys()].sort((a, b) => a - b);
  }
}

/** Process-wide registry used when no other is configured. */
export const codecRegistry = new CodecRegistry();

export function registerCodec(tag: number, factory: CodecFactory): void {
  codecRegistry.register(tag, factory);
}
