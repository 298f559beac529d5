// Schema types for runtime type description.
//
// A schema describes the shape of a value so that codecs can encode it,
// decode it, and allocate an empty instance of it. Schemas are plain data:
// the same schema object is shared by client and server.

// ============================================================================
// Primitive Schema Kinds
// ============================================================================

/** Primitive types that map directly to a postcard encoding. */
export type PrimitiveKind =
  | "bool"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "f32"
  | "f64"
  | "string"
  | "bytes";

export interface PrimitiveSchema {
  kind: PrimitiveKind;
}

// ============================================================================
// Container Schemas
// ============================================================================

/** Ordered sequence, decoded as an array. */
export interface VecSchema {
  kind: "vec";
  element: Schema;
}

/** Optional value, decoded as the value or `null`. */
export interface OptionSchema {
  kind: "option";
  inner: Schema;
}

/** Keyed mapping, decoded as a `Map`. */
export interface MapSchema {
  kind: "map";
  key: Schema;
  value: Schema;
}

// ============================================================================
// Composite Schemas
// ============================================================================

/** Struct with named fields, decoded as a plain object. */
export interface StructSchema {
  kind: "struct";
  /** Fields in declaration order. Order is significant for encoding! */
  fields: Record<string, Schema>;
}

/** Fixed-size tuple, decoded as an array. Elements are concatenated on the wire. */
export interface TupleSchema {
  kind: "tuple";
  elements: Schema[];
}

/**
 * A variant in an enum.
 *
 * `fields` is one of:
 * - null/undefined: unit variant, value `{ tag }`
 * - Schema: newtype variant, value `{ tag, value }`
 * - Record<string, Schema>: struct variant, value `{ tag, ...fields }`
 */
export interface EnumVariant {
  name: string;
  /** Wire discriminant. Defaults to the variant's index. */
  discriminant?: number;
  fields?: null | Schema | Record<string, Schema>;
}

/** Tagged union; the discriminant is a varint followed by the variant fields. */
export interface EnumSchema {
  kind: "enum";
  variants: EnumVariant[];
}

/** Decoded form of an enum value. */
export interface EnumValue {
  tag: string;
  [field: string]: unknown;
}

/** Union of all schema types. */
export type Schema =
  | PrimitiveSchema
  | VecSchema
  | OptionSchema
  | MapSchema
  | StructSchema
  | TupleSchema
  | EnumSchema;

// ============================================================================
// Enum Helper Functions
// ============================================================================

export function findVariantByDiscriminant(
  schema: EnumSchema,
  discriminant: number,
): EnumVariant | undefined {
  return schema.variants.find((v, index) => (v.discriminant ?? index) === discriminant);
}

export function findVariantByName(schema: EnumSchema, name: string): EnumVariant | undefined {
  return schema.variants.find((v) => v.name === name);
}

export function getVariantDiscriminant(schema: EnumSchema, variant: EnumVariant): number {
  if (variant.discriminant !== undefined) {
    return variant.discriminant;
  }
  const index = schema.variants.indexOf(variant);
  if (index === -1) {
    throw new Error(`Variant "${variant.name}" not found in schema`);
  }
  return index;
}

/** A schema, as opposed to a record of named fields. */
export function isSchema(fields: Schema | Record<string, Schema>): fields is Schema {
  return typeof fields.kind === "string";
}

/**
 * Named fields of a variant, or null for unit and newtype variants.
 */
export function variantStructFields(variant: EnumVariant): Record<string, Schema> | null {
  if (variant.fields === null || variant.fields === undefined) return null;
  if (isSchema(variant.fields)) return null;
  return variant.fields;
}

/** Inner schema of a newtype variant, or null. */
export function variantNewtype(variant: EnumVariant): Schema | null {
  if (variant.fields === null || variant.fields === undefined) return null;
  return isSchema(variant.fields) ? variant.fields : null;
}

export function isEnumValue(value: unknown): value is EnumValue {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "tag") === "string";
}

/** Readable, abbreviated rendering of a schema for error messages. */
export function schemaToString(schema: Schema): string {
  switch (schema.kind) {
    case "enum":
      return `enum { ${schema.variants.map((v) => v.name).join(" | ")} }`;
    case "struct":
      return `struct { ${Object.keys(schema.fields).join(", ")} }`;
    case "vec":
      return `vec<${schemaToString(schema.element)}>`;
    case "option":
      return `option<${schemaToString(schema.inner)}>`;
    case "map":
      return `map<${schemaToString(schema.key)}, ${schemaToString(schema.value)}>`;
    case "tuple":
      return `tuple(${schema.elements.map(schemaToString).join(", ")})`;
    default:
      return schema.kind;
  }
}
