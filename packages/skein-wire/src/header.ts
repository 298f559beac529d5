import type { StructSchema } from "@skein/postcard";

/**
 * Metadata preceding every request and response body.
 *
 * A request carries the call's sequence number and "Service.Method" name.
 * A response echoes both; a non-empty `error` marks a failed call whose
 * body is an empty placeholder.
 */
export interface Header {
  seq: bigint;
  serviceMethod: string;
  error: string;
}

export const HeaderSchema: StructSchema = {
  kind: "struct",
  fields: {
    seq: { kind: "u64" },
    serviceMethod: { kind: "string" },
    error: { kind: "string" },
  },
};

export function isHeader(value: unknown): value is Header {
  if (typeof value !== "object" || value === null) return false;
  return (
    typeof Reflect.get(value, "seq") === "bigint" &&
    typeof Reflect.get(value, "serviceMethod") === "string" &&
    typeof Reflect.get(value, "error") === "string"
  );
}
