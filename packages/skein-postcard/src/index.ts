// Postcard binary format driven by runtime schemas.
//
// Values are encoded and decoded by walking a Schema, so any shape can be
// carried without generated code. The same schemas allocate empty values
// (zeroValue) and map values to plain JSON (toJsonValue/fromJsonValue).

// ============================================================================
// Schema Types
// ============================================================================

export type {
  PrimitiveKind,
  PrimitiveSchema,
  VecSchema,
  OptionSchema,
  MapSchema,
  StructSchema,
  TupleSchema,
  EnumVariant,
  EnumSchema,
  EnumValue,
  Schema,
} from "./schema.ts";

export {
  findVariantByDiscriminant,
  findVariantByName,
  getVariantDiscriminant,
  isEnumValue,
  isSchema,
  schemaToString,
  variantNewtype,
  variantStructFields,
} from "./schema.ts";

// ============================================================================
// Encoding
// ============================================================================

export type { DecodeResult } from "./primitives.ts";
export { encodeWithSchema, decodeWithSchema, SchemaDecodeError } from "./schema_codec.ts";
export { encodeVarint, decodeVarint, decodeVarintNumber, U64_MAX } from "./binary/varint.ts";
export { concat, hexDump } from "./binary/bytes.ts";

// ============================================================================
// Allocation and JSON
// ============================================================================

export { zeroValue } from "./zero.ts";
export { toJsonValue, fromJsonValue, JsonMappingError, type JsonValue } from "./json.ts";
