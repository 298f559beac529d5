// Schema-guided mapping between decoded values and plain JSON.
//
// JSON has no 64-bit integers, byte strings or non-string map keys, so:
// u64/i64 travel as decimal strings, bytes as base64, and maps as arrays of
// [key, value] pairs. fromJsonValue validates against the schema and
// produces the same shapes decodeWithSchema does.

import type { Schema } from "./schema.ts";
import {
  findVariantByName,
  isEnumValue,
  variantNewtype,
  variantStructFields,
} from "./schema.ts";
import { describe } from "./primitives.ts";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

const INT_RANGES = {
  u8: [0, 0xff],
  i8: [-0x80, 0x7f],
  u16: [0, 0xffff],
  i16: [-0x8000, 0x7fff],
  u32: [0, 0xffff_ffff],
  i32: [-0x8000_0000, 0x7fff_ffff],
} as const;

const BIG_RANGES = {
  u64: [0n, 0xffff_ffff_ffff_ffffn],
  i64: [-0x8000_0000_0000_0000n, 0x7fff_ffff_ffff_ffffn],
} as const;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** Error from toJsonValue/fromJsonValue, with the path of the bad value. */
export class JsonMappingError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(`${path}: ${message}`);
    this.name = "JsonMappingError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(path: string[], message: string): never {
  throw new JsonMappingError(message, path.length === 0 ? "<root>" : path.join("."));
}

// ============================================================================
// Value -> JSON
// ============================================================================

export function toJsonValue(value: unknown, schema: Schema): JsonValue {
  return toJson(value, schema, []);
}

function toJson(value: unknown, schema: Schema, path: string[]): JsonValue {
  switch (schema.kind) {
    case "bool":
      if (typeof value !== "boolean") fail(path, `expected bool, got ${describe(value)}`);
      return value;
    case "u8":
    case "i8":
    case "u16":
    case "i16":
    case "u32":
    case "i32":
      return checkInt(value, schema.kind, path);
    case "u64":
    case "i64":
      return checkBig(value, schema.kind, path).toString();
    case "f32":
    case "f64":
      if (typeof value !== "number" || !Number.isFinite(value)) {
        fail(path, `expected finite ${schema.kind}, got ${String(value)}`);
      }
      return value;
    case "string":
      if (typeof value !== "string") fail(path, `expected string, got ${describe(value)}`);
      return value;
    case "bytes":
      if (!(value instanceof Uint8Array)) fail(path, `expected bytes, got ${describe(value)}`);
      return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64");
    case "vec":
      if (!Array.isArray(value)) fail(path, `expected array, got ${describe(value)}`);
      return value.map((item, i) => toJson(item, schema.element, [...path, `[${i}]`]));
    case "option":
      return value === null || value === undefined ? null : toJson(value, schema.inner, path);
    case "map": {
      if (!(value instanceof Map)) fail(path, `expected Map, got ${describe(value)}`);
      const pairs: JsonValue[] = [];
      let i = 0;
      for (const [k, v] of value) {
        const entry = [...path, `{${i++}}`];
        pairs.push([toJson(k, schema.key, entry), toJson(v, schema.value, entry)]);
      }
      return pairs;
    }
    case "struct": {
      if (!isRecord(value)) fail(path, `expected object, got ${describe(value)}`);
      const out: { [key: string]: JsonValue } = {};
      for (const [name, field] of Object.entries(schema.fields)) {
        out[name] = toJson(value[name], field, [...path, name]);
      }
      return out;
    }
    case "tuple": {
      if (!Array.isArray(value) || value.length !== schema.elements.length) {
        fail(path, `expected tuple of ${schema.elements.length}`);
      }
      return schema.elements.map((el, i) => toJson(value[i], el, [...path, `${i}`]));
    }
    case "enum": {
      if (!isEnumValue(value)) fail(path, `expected enum value, got ${describe(value)}`);
      const variant = findVariantByName(schema, value.tag);
      if (!variant) fail(path, `unknown variant ${value.tag}`);
      const out: { [key: string]: JsonValue } = { tag: variant.name };
      const inner = variantNewtype(variant);
      if (inner) {
        out.value = toJson(value.value, inner, [...path, variant.name]);
      }
      for (const [name, field] of Object.entries(variantStructFields(variant) ?? {})) {
        out[name] = toJson(value[name], field, [...path, variant.name, name]);
      }
      return out;
    }
  }
}

// ============================================================================
// JSON -> Value
// ============================================================================

export function fromJsonValue(json: unknown, schema: Schema): unknown {
  return fromJson(json, schema, []);
}

function fromJson(json: unknown, schema: Schema, path: string[]): unknown {
  switch (schema.kind) {
    case "bool":
      if (typeof json !== "boolean") fail(path, `expected bool, got ${describe(json)}`);
      return json;
    case "u8":
    case "i8":
    case "u16":
    case "i16":
    case "u32":
    case "i32":
      return checkInt(json, schema.kind, path);
    case "u64":
    case "i64": {
      if (typeof json !== "string" || !/^-?\d+$/.test(json)) {
        fail(path, `expected ${schema.kind} as a decimal string, got ${describe(json)}`);
      }
      return checkBig(BigInt(json), schema.kind, path);
    }
    case "f32":
    case "f64":
      if (typeof json !== "number") fail(path, `expected number, got ${describe(json)}`);
      return json;
    case "string":
      if (typeof json !== "string") fail(path, `expected string, got ${describe(json)}`);
      return json;
    case "bytes":
      if (typeof json !== "string" || json.length % 4 !== 0 || !BASE64.test(json)) {
        fail(path, "expected base64 string");
      }
      return new Uint8Array(Buffer.from(json, "base64"));
    case "vec":
      if (!Array.isArray(json)) fail(path, `expected array, got ${describe(json)}`);
      return json.map((item, i) => fromJson(item, schema.element, [...path, `[${i}]`]));
    case "option":
      return json === null || json === undefined ? null : fromJson(json, schema.inner, path);
    case "map": {
      if (!Array.isArray(json)) fail(path, `expected array of pairs, got ${describe(json)}`);
      const map = new Map<unknown, unknown>();
      json.forEach((pair: unknown, i) => {
        const entry = [...path, `{${i}}`];
        if (!Array.isArray(pair) || pair.length !== 2) fail(entry, "expected [key, value] pair");
        map.set(fromJson(pair[0], schema.key, entry), fromJson(pair[1], schema.value, entry));
      });
      return map;
    }
    case "struct": {
      if (!isRecord(json)) fail(path, `expected object, got ${describe(json)}`);
      const out: Record<string, unknown> = {};
      for (const [name, field] of Object.entries(schema.fields)) {
        if (!(name in json) && field.kind !== "option") fail(path, `missing field ${name}`);
        out[name] = fromJson(json[name], field, [...path, name]);
      }
      return out;
    }
    case "tuple": {
      if (!Array.isArray(json) || json.length !== schema.elements.length) {
        fail(path, `expected tuple of ${schema.elements.length}`);
      }
      return schema.elements.map((el, i) => fromJson(json[i], el, [...path, `${i}`]));
    }
    case "enum": {
      if (!isRecord(json)) fail(path, `expected enum object, got ${describe(json)}`);
      const tag = json.tag;
      if (typeof tag !== "string") fail(path, "missing tag");
      const variant = findVariantByName(schema, tag);
      if (!variant) fail(path, `unknown variant ${tag}`);
      const out: Record<string, unknown> = { tag: variant.name };
      const inner = variantNewtype(variant);
      if (inner) {
        out.value = fromJson(json.value, inner, [...path, variant.name]);
      }
      for (const [name, field] of Object.entries(variantStructFields(variant) ?? {})) {
        out[name] = fromJson(json[name], field, [...path, variant.name, name]);
      }
      return out;
    }
  }
}

function checkInt(value: unknown, kind: keyof typeof INT_RANGES, path: string[]): number {
  const [min, max] = INT_RANGES[kind];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    fail(path, `expected ${kind}, got ${describe(value)}`);
  }
  if (value < min || value > max) fail(path, `${value} out of ${kind} range`);
  return value;
}

function checkBig(value: unknown, kind: keyof typeof BIG_RANGES, path: string[]): bigint {
  const [min, max] = BIG_RANGES[kind];
  if (typeof value !== "bigint") fail(path, `expected ${kind} bigint, got ${describe(value)}`);
  if (value < min || value > max) fail(path, `${value} out of ${kind} range`);
  return value;
}
