// Length-prefixed framing: [len: u32 BE][payload].
//
// Headers and bodies are separate frames, so a reader can skip a body it
// has no schema for and stay aligned.

import { ConnectionError } from "./errors.ts";
import type { ByteStream } from "./stream.ts";

export const MAX_FRAME_SIZE = 64 * 1024 * 1024;

export function encodeFrame(payload: Uint8Array): Uint8Array {
  if (payload.length > MAX_FRAME_SIZE) {
    throw ConnectionError.io(`frame of ${payload.length} bytes exceeds ${MAX_FRAME_SIZE}`);
  }
  const out = new Uint8Array(4 + payload.length);
  new DataView(out.buffer).setUint32(0, payload.length, false);
  out.set(payload, 4);
  return out;
}

/**
 * Read one frame. An "eof" before the length prefix propagates as-is; a
 * stream that ends inside the frame is an "io" error.
 */
export async function readFrame(stream: ByteStream): Promise<Uint8Array> {
  const prefix = await stream.readExact(4);
  const len = new DataView(prefix.buffer, prefix.byteOffset, 4).getUint32(0, false);
  if (len > MAX_FRAME_SIZE) {
    throw ConnectionError.io(`frame of ${len} bytes exceeds ${MAX_FRAME_SIZE}`);
  }
  try {
    return await stream.readExact(len);
  } catch (e) {
    throw unexpectedEof(e);
  }
}

/** Turn a clean end of stream into a short-read error. */
export function unexpectedEof(e: unknown): unknown {
  if (e instanceof ConnectionError && e.kind === "eof") {
    return ConnectionError.io("unexpected end of stream", e);
  }
  return e;
}
