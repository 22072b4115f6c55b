import zlib from 'zlib';
import nodeCrypto from 'crypto';

import type { PdfDictionary } from './common.js';

export const textEncoder = new TextEncoder();

export function randomData(length: number): Uint8Array {
  if (length > 2 ** 16) {
    length = 2 ** 16;
  }
  const buf = new Uint8Array(length);
  nodeCrypto.randomFillSync(buf);
  return buf;
}

/** Compress a stream's content and build the matching stream dictionary. */
export async function deflateStream(
  pdfStream: Uint8Array | string
): Promise<{ stream: Uint8Array; dict: PdfDictionary }> {
  const data =
    pdfStream instanceof Uint8Array ? pdfStream : textEncoder.encode(pdfStream);
  const compressed = await new Promise<Uint8Array>((resolve, reject) =>
    zlib.deflate(data, (err, buf) =>
      err ? reject(err) : resolve(new Uint8Array(buf))
    )
  );
  return {
    dict: {
      Length: compressed.length,
      Filter: '/FlateDecode',
    },
    stream: compressed,
  };
}
