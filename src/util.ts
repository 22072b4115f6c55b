import sum from 'lodash/sum';

/** High-resolution timestamp in milliseconds */
export function now(): number {
  return performance.now();
}

const CRC_TABLE = (() => {
  const t = new Int32Array(256);
  for (let i = 0; i < 256; ++i) {
    let c = i,
      k = 9;
    while (--k) c = (c & 1 && -306674912) ^ (c >>> 1);
    t[i] = c;
  }
  return t;
})();

/** CRC-32 as used by PNG chunks and ZIP archives. Accepts several byte
 *  arrays that are checksummed as if they were concatenated, the result is
 *  an unsigned 32 bit integer. */
export function crc32(...parts: Uint8Array[]): number {
  let c = -1;
  for (const data of parts) {
    for (let i = 0; i < data.length; ++i) {
      c = CRC_TABLE[(c & 255) ^ data[i]] ^ (c >>> 8);
    }
  }
  return ~c >>> 0;
}

/** Concatenate byte arrays into a single new array */
export function concatBytes(parts: ReadonlyArray<Uint8Array>): Uint8Array {
  const size = sum(parts.map((p) => p.length));
  const out = new Uint8Array(size);
  let pos = 0;
  for (const part of parts) {
    out.set(part, pos);
    pos += part.length;
  }
  return out;
}

/** Read a big endian unsigned 32 bit integer */
export function readUint32BE(buf: Uint8Array, pos = 0): number {
  return (
    ((buf[pos] << 24) | (buf[pos + 1] << 16) | (buf[pos + 2] << 8) | buf[pos + 3]) >>> 0
  );
}
