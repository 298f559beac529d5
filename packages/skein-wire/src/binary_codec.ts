import { decodeWithSchema, encodeWithSchema, type Schema } from "@skein/postcard";
import { FramedCodec } from "./codec.ts";
import { HeaderSchema, isHeader, type Header } from "./header.ts";

/** Postcard payloads. Codec type 0, the default. */
export class BinaryCodec extends FramedCodec {
  readonly type = 0;

  protected encodeHeader(header: Header): Uint8Array {
    return encodeWithSchema(header, HeaderSchema);
  }

  protected decodeHeader(payload: Uint8Array): Header {
    const value = decodeExact(payload, HeaderSchema);
    if (!isHeader(value)) throw new Error("header: unexpected shape");
    return value;
  }

  protected encodeBody(body: unknown, schema: Schema): Uint8Array {
    return encodeWithSchema(body, schema);
  }

  protected decodeBody(payload: Uint8Array, schema: Schema): unknown {
    return decodeExact(payload, schema);
  }

  protected emptyBody(): Uint8Array {
    return new Uint8Array(0);
  }
}

function decodeExact(payload: Uint8Array, schema: Schema): unknown {
  const { value, next } = decodeWithSchema(payload, 0, schema);
  if (next !== payload.length) {
    throw new Error(`${payload.length - next} trailing bytes after value`);
  }
  return value;
}
