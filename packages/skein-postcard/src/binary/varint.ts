// LEB128 varints as used by postcard: 7 bits per byte, low group first,
// high bit set on every byte except the last.

/** Largest value a u64 varint may carry. */
export const U64_MAX = 0xffff_ffff_ffff_ffffn;

export function encodeVarint(value: number | bigint): Uint8Array {
  let remaining = typeof value === "bigint" ? value : BigInt(value);
  if (remaining < 0n) throw new Error(`varint: negative value ${remaining}`);
  if (remaining > U64_MAX) throw new Error(`varint: ${remaining} exceeds u64`);
  const out: number[] = [];
  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining !== 0n) byte |= 0x80;
    out.push(byte);
  } while (remaining !== 0n);
  return Uint8Array.from(out);
}

export function decodeVarint(buf: Uint8Array, offset: number): { value: bigint; next: number } {
  let result = 0n;
  let shift = 0n;
  let i = offset;
  while (true) {
    if (i >= buf.length) throw new Error("varint: eof");
    // 10 bytes carry 70 bits, enough for any u64
    if (shift >= 70n) throw new Error("varint: overflow");
    const byte = buf[i++];
    result |= BigInt(byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) {
      if (result > U64_MAX) throw new Error("varint: overflow");
      return { value: result, next: i };
    }
    shift += 7n;
  }
}

/** Decode a varint that must fit a JS number (lengths, discriminants, small ints). */
export function decodeVarintNumber(buf: Uint8Array, offset: number): { value: number; next: number } {
  const { value, next } = decodeVarint(buf, offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw new Error(`varint: ${value} too large`);
  return { value: Number(value), next };
}
