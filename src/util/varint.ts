/**
 * LEB128 varints for non-negative safe integers (up to 2^53 - 1).
 * Division is used instead of `>>>` so values past 32 bits survive.
 */

/** Write a varint at offset; returns the number of bytes written. */
export function writeIntVarint(buf: Uint8Array, offset: number, value: number): number {
  let i = offset;
  while (value > 0x7f) {
    buf[i++] = (value % 0x80) | 0x80;
    value = Math.floor(value / 0x80);
  }
  buf[i++] = value;
  return i - offset;
}

/** Byte length of a varint without writing it. */
export function intVarintSize(n: number): number {
  let size = 1;
  while (n > 0x7f) {
    size++;
    n = Math.floor(n / 0x80);
  }
  return size;
}

/** Read a varint at offset. Throws on a truncated or over-long encoding. */
export function readIntVarint(buf: Uint8Array, offset: number): { value: number; length: number } {
  let value = 0;
  let scale = 1;
  for (let i = offset; i < buf.length; i++) {
    const byte = buf[i]!;
    value += (byte & 0x7f) * scale;
    if ((byte & 0x80) === 0) return { value, length: i - offset + 1 };
    scale *= 0x80;
    if (scale > Number.MAX_SAFE_INTEGER) break;
  }
  throw new RangeError(`Malformed varint at offset ${offset}`);
}

/** Encode a single varint into a fresh buffer. */
export function encodeVarint(value: number): Uint8Array {
  const buf = new Uint8Array(intVarintSize(value));
  writeIntVarint(buf, 0, value);
  return buf;
}
