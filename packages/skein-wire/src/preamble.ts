// Connection preamble: the first 8 bytes a client writes.
//
//   [magic: u32 BE = 0x5a2b71c3][codec type: u32 BE]

import { ConnectionError } from "./errors.ts";

export const MAGIC = 0x5a2b71c3;
export const PREAMBLE_SIZE = 8;

export interface Preamble {
  magic: number;
  codecType: number;
}

export function encodePreamble(codecType: number): Uint8Array {
  const out = new Uint8Array(PREAMBLE_SIZE);
  const view = new DataView(out.buffer);
  view.setUint32(0, MAGIC, false);
  view.setUint32(4, codecType, false);
  return out;
}

/** Parse a preamble; throws a handshake error when the magic does not match. */
export function decodePreamble(bytes: Uint8Array): Preamble {
  if (bytes.length !== PREAMBLE_SIZE) {
    throw ConnectionError.handshake(`preamble must be ${PREAMBLE_SIZE} bytes, got ${bytes.length}`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const magic = view.getUint32(0, false);
  if (magic !== MAGIC) {
    throw ConnectionError.handshake(`invalid magic number 0x${magic.toString(16).padStart(8, "0")}`);
  }
  return { magic, codecType: view.getUint32(4, false) };
}
