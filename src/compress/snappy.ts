/** Snappy block compression for snapshot bodies (raw block format, no framing). */

import { compressSync, uncompressSync } from 'snappy';

export function snappyCompress(data: Uint8Array): Uint8Array {
  return compressSync(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
}

export function snappyUncompress(data: Uint8Array): Uint8Array {
  const out = uncompressSync(Buffer.from(data.buffer, data.byteOffset, data.byteLength), { asBuffer: true });
  return typeof out === 'string' ? Buffer.from(out, 'binary') : out;
}
