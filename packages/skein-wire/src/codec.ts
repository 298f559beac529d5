// The codec contract: reads and writes (header, body) pairs on a stream.

import type { Schema } from "@skein/postcard";
import { CodecError, ConnectionError } from "./errors.ts";
import { encodeFrame, readFrame, unexpectedEof } from "./framing.ts";
import type { Header } from "./header.ts";
import type { ByteStream } from "./stream.ts";

export interface Codec {
  /** Codec type tag this codec was negotiated under. */
  readonly type: number;

  readHeader(): Promise<Header>;

  /**
   * Read the body that follows the last header.
   *
   * With a schema, resolves with the decoded value (a decode failure is a
   * CodecError "decode" and the stream stays aligned). With `null`, the
   * body is consumed and discarded.
   */
  readBody(schema: Schema | null): Promise<unknown>;

  /**
   * Write a header and its body as one unit.
   *
   * A `null` schema writes the empty placeholder body. Encode failures
   * throw CodecError "encode" before anything is written. A transport
   * failure closes the stream and rethrows. Callers serialize writes.
   */
  write(header: Header, body: unknown, schema: Schema | null): Promise<void>;

  close(): void;
}

export type CodecFactory = (stream: ByteStream) => Codec;

/**
 * Base for codecs that put each header and body in its own frame.
 * Subclasses supply the payload encoding.
 */
export abstract class FramedCodec implements Codec {
  abstract readonly type: number;

  constructor(protected readonly stream: ByteStream) {}

  protected abstract encodeHeader(header: Header): Uint8Array;
  protected abstract decodeHeader(payload: Uint8Array): Header;
  protected abstract encodeBody(body: unknown, schema: Schema): Uint8Array;
  protected abstract decodeBody(payload: Uint8Array, schema: Schema): unknown;
  protected abstract emptyBody(): Uint8Array;

  async readHeader(): Promise<Header> {
    const payload = await readFrame(this.stream);
    try {
      return this.decodeHeader(payload);
    } catch (e) {
      // no sequence number to blame, so a bad header is fatal
      throw ConnectionError.io("malformed header", CodecError.decode(e));
    }
  }

  async readBody(schema: Schema | null): Promise<unknown> {
    let payload: Uint8Array;
    try {
      payload = await readFrame(this.stream);
    } catch (e) {
      throw unexpectedEof(e);
    }
    if (schema === null) return undefined;
    try {
      return this.decodeBody(payload, schema);
    } catch (e) {
      throw CodecError.decode(e);
    }
  }

  async write(header: Header, body: unknown, schema: Schema | null): Promise<void> {
    let unit: Uint8Array;
    try {
      const head = encodeFrame(this.encodeHeader(header));
      const tail = encodeFrame(schema === null ? this.emptyBody() : this.encodeBody(body, schema));
      unit = new Uint8Array(head.length + tail.length);
      unit.set(head, 0);
      unit.set(tail, head.length);
    } catch (e) {
      throw CodecError.encode(e);
    }
    try {
      await this.stream.write(unit);
    } catch (e) {
      this.stream.close();
      throw e;
    }
  }

  close(): void {
    this.stream.close();
  }
}
