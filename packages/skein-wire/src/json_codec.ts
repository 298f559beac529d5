import { fromJsonValue, toJsonValue, type Schema } from "@skein/postcard";
import { FramedCodec } from "./codec.ts";
import { HeaderSchema, isHeader, type Header } from "./header.ts";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * UTF-8 JSON payloads, mapped through the schema (64-bit integers as
 * decimal strings, bytes as base64, maps as [key, value] pairs). Codec type 1.
 */
export class JsonCodec extends FramedCodec {
  readonly type = 1;

  protected encodeHeader(header: Header): Uint8Array {
    return encoder.encode(JSON.stringify(toJsonValue(header, HeaderSchema)));
  }

  protected decodeHeader(payload: Uint8Array): Header {
    const value = fromJsonValue(parse(payload), HeaderSchema);
    if (!isHeader(value)) throw new Error("header: unexpected shape");
    return value;
  }

  protected encodeBody(body: unknown, schema: Schema): Uint8Array {
    return encoder.encode(JSON.stringify(toJsonValue(body, schema)));
  }

  protected decodeBody(payload: Uint8Array, schema: Schema): unknown {
    return fromJsonValue(parse(payload), schema);
  }

  protected emptyBody(): Uint8Array {
    return encoder.encode("null");
  }
}

function parse(payload: Uint8Array): unknown {
  return JSON.parse(decoder.decode(payload));
}
