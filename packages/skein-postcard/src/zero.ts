import type { Schema } from "./schema.ts";
import { variantNewtype, variantStructFields } from "./schema.ts";

/**
 * Allocate the empty instance of a schema.
 *
 * Maps and vecs come back empty but present, structs have every field set
 * to its own zero value, options are `null`, and enums take their first
 * variant. Every call returns a fresh value.
 */
export function zeroValue(schema: Schema): unknown {
  switch (schema.kind) {
    case "bool":
      return false;
    case "u8":
    case "i8":
    case "u16":
    case "i16":
    case "u32":
    case "i32":
    case "f32":
    case "f64":
      return 0;
    case "u64":
    case "i64":
      return 0n;
    case "string":
      return "";
    case "bytes":
      return new Uint8Array(0);
    case "vec":
      return [];
    case "option":
      return null;
    case "map":
      return new Map();
    case "struct": {
      const obj: Record<string, unknown> = {};
      for (const [name, field] of Object.entries(schema.fields)) {
        obj[name] = zeroValue(field);
      }
      return obj;
    }
    case "tuple":
      return schema.elements.map(zeroValue);
    case "enum": {
      const first = schema.variants[0];
      if (!first) throw new Error("enum: no variants");
      const value: Record<string, unknown> = { tag: first.name };
      const inner = variantNewtype(first);
      if (inner) {
        value.value = zeroValue(inner);
      }
      for (const [name, field] of Object.entries(variantStructFields(first) ?? {})) {
        value[name] = zeroValue(field);
      }
      return value;
    }
  }
}

