// Schema-driven encoding/decoding for the postcard format.
//
// encodeWithSchema/decodeWithSchema walk a runtime Schema alongside the
// value or buffer, so bodies of any method can be serialized without
// generated code.

import type { EnumSchema, EnumValue, Schema } from "./schema.ts";
import {
  findVariantByDiscriminant,
  findVariantByName,
  getVariantDiscriminant,
  isEnumValue,
  schemaToString,
  variantNewtype,
  variantStructFields,
} from "./schema.ts";
import { describe, primitives, type DecodeResult } from "./primitives.ts";
import { encodeVarint, decodeVarintNumber } from "./binary/varint.ts";
import { concat, hexDump } from "./binary/bytes.ts";

/** Raised by decodeWithSchema; carries the path to the failing value. */
export class SchemaDecodeError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = "SchemaDecodeError";
  }
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// ----------------------------------------------------------------------------
// Encoding
// ----------------------------------------------------------------------------

/**
 * Encode a value according to its schema.
 *
 * Throws when the value does not match the schema.
 */
export function encodeWithSchema(value: unknown, schema: Schema): Uint8Array {
  const out: Uint8Array[] = [];
  write(out, value, schema);
  return concat(...out);
}

function write(out: Uint8Array[], value: unknown, schema: Schema): void {
  switch (schema.kind) {
    case "vec":
      if (!Array.isArray(value)) throw new Error(`vec: expected an array, got ${describe(value)}`);
      out.push(encodeVarint(value.length));
      for (const item of value) write(out, item, schema.element);
      return;

    case "option":
      if (value === null || value === undefined) {
        out.push(Uint8Array.of(0));
      } else {
        out.push(Uint8Array.of(1));
        write(out, value, schema.inner);
      }
      return;

    case "map":
      if (!(value instanceof Map)) throw new Error(`map: expected a Map, got ${describe(value)}`);
      out.push(encodeVarint(value.size));
      for (const [k, v] of value) {
        write(out, k, schema.key);
        write(out, v, schema.value);
      }
      return;

    case "struct":
      if (typeof value !== "object" || value === null) {
        throw new Error(`struct: expected an object, got ${describe(value)}`);
      }
      for (const [name, field] of Object.entries(schema.fields)) {
        try {
          write(out, Reflect.get(value, name), field);
        } catch (e) {
          throw new Error(`field ${name}: ${messageOf(e)}`);
        }
      }
      return;

    case "tuple": {
      if (!Array.isArray(value)) throw new Error(`tuple: expected an array, got ${describe(value)}`);
      const { elements } = schema;
      if (value.length !== elements.length) {
        throw new Error(`Tuple length mismatch: got ${value.length}, expected ${elements.length}`);
      }
      elements.forEach((element, i) => write(out, value[i], element));
      return;
    }

    case "enum":
      writeEnum(out, value, schema);
      return;

    default:
      out.push(primitives[schema.kind].encode(value));
  }
}

function writeEnum(out: Uint8Array[], value: unknown, schema: EnumSchema): void {
  if (!isEnumValue(value)) throw new Error(`enum: expected a tagged object, got ${describe(value)}`);
  const variant = findVariantByName(schema, value.tag);
  if (!variant) throw new Error(`Unknown variant: ${value.tag}`);

  out.push(encodeVarint(getVariantDiscriminant(schema, variant)));
  const inner = variantNewtype(variant);
  if (inner) {
    write(out, value.value, inner);
    return;
  }
  for (const [name, field] of Object.entries(variantStructFields(variant) ?? {})) {
    write(out, value[name], field);
  }
}

// ----------------------------------------------------------------------------
// Decoding
// ----------------------------------------------------------------------------

/**
 * Decode a value according to its schema, starting at `offset`.
 *
 * @returns the value and the offset just past it
 * @throws SchemaDecodeError with the path and a hex dump around the failure
 */
export function decodeWithSchema(buf: Uint8Array, offset: number, schema: Schema): DecodeResult<unknown> {
  const reader = new Reader(buf, offset);
  const value = reader.read(schema);
  return { value, next: reader.pos };
}

/** Cursor over a buffer that remembers where in the value it is. */
class Reader {
  private readonly path: string[] = [];

  constructor(
    private readonly buf: Uint8Array,
    public pos: number,
  ) {}

  read(schema: Schema): unknown {
    const start = this.pos;
    try {
      return this.readUnchecked(schema);
    } catch (e) {
      if (e instanceof SchemaDecodeError) throw e;
      throw this.fail(messageOf(e), start, schema);
    }
  }

  private readUnchecked(schema: Schema): unknown {
    switch (schema.kind) {
      case "vec": {
        const items: unknown[] = [];
        const len = this.length();
        for (let i = 0; i < len; i++) {
          items.push(this.at(`[${i}]`, schema.element));
        }
        return items;
      }

      case "option": {
        if (this.pos >= this.buf.length) {
          throw this.fail("unexpected end of buffer reading option discriminant", this.pos, schema);
        }
        const flag = this.buf[this.pos];
        if (flag > 1) {
          throw this.fail(`invalid option discriminant: ${flag} (expected 0 or 1)`, this.pos, schema);
        }
        this.pos++;
        return flag === 0 ? null : this.at("Some", schema.inner);
      }

      case "map": {
        const map = new Map<unknown, unknown>();
        const len = this.length();
        for (let i = 0; i < len; i++) {
          const key = this.at(`{key ${i}}`, schema.key);
          map.set(key, this.at(`{value ${i}}`, schema.value));
        }
        return map;
      }

      case "struct": {
        const obj: Record<string, unknown> = {};
        for (const [name, field] of Object.entries(schema.fields)) {
          obj[name] = this.at(name, field);
        }
        return obj;
      }

      case "tuple":
        return schema.elements.map((element, i) => this.at(`${i}`, element));

      case "enum":
        return this.readEnum(schema);

      default: {
        const { value, next } = primitives[schema.kind].decode(this.buf, this.pos);
        this.pos = next;
        return value;
      }
    }
  }

  private readEnum(schema: EnumSchema): EnumValue {
    const start = this.pos;
    const discriminant = this.length();
    const variant = findVariantByDiscriminant(schema, discriminant);
    if (!variant) {
      const valid = schema.variants.map((v, i) => `${v.discriminant ?? i}=${v.name}`).join(", ");
      throw this.fail(`unknown enum discriminant: ${discriminant} (valid: ${valid})`, start, schema);
    }

    const result: EnumValue = { tag: variant.name };
    this.path.push(variant.name);
    const inner = variantNewtype(variant);
    if (inner) {
      result.value = this.at("value", inner);
    } else {
      for (const [name, field] of Object.entries(variantStructFields(variant) ?? {})) {
        result[name] = this.at(name, field);
      }
    }
    this.path.pop();
    return result;
  }

  /** Read a nested value, labelled `segment` in error paths. */
  private at(segment: string, schema: Schema): unknown {
    this.path.push(segment);
    const value = this.read(schema);
    this.path.pop();
    return value;
  }

  private length(): number {
    const { value, next } = decodeVarintNumber(this.buf, this.pos);
    this.pos = next;
    return value;
  }

  private fail(message: string, offset: number, schema: Schema): SchemaDecodeError {
    const path = this.path.length === 0 ? "<root>" : this.path.join(".");
    const text = [
      `Decode error: ${message}`,
      `  at ${path}, offset ${offset} of ${this.buf.length}`,
      `  expected ${schemaToString(schema)}`,
      `  bytes: ${hexDump(this.buf, offset - 8, offset + 24, offset)}`,
    ].join("\n");
    return new SchemaDecodeError(text, path, offset);
  }
}
