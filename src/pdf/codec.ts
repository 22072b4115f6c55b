import zlib from 'zlib';
import { unzlibSync, zlibSync } from 'fflate';

/** Synchronous zlib (RFC 1950) compression, i.e. what PDF calls `FlateDecode`. */
export interface FlateCodec {
  readonly name: string;
  inflate(data: Uint8Array): Uint8Array;
  deflate(data: Uint8Array): Uint8Array;
}

/** Pure JS codec, works everywhere. */
export const fflateCodec: FlateCodec = {
  name: 'fflate',
  inflate: (data) => unzlibSync(data),
  deflate: (data) => zlibSync(data, { level: 6 }),
};

/** Codec backed by the zlib bindings of Node.js */
export const nodeZlibCodec: FlateCodec = {
  name: 'node',
  inflate: (data) => new Uint8Array(zlib.inflateSync(data)),
  deflate: (data) => new Uint8Array(zlib.deflateSync(data)),
};

export type CodecName = 'fflate' | 'node';

const CODECS: Record<CodecName, FlateCodec> = {
  fflate: fflateCodec,
  node: nodeZlibCodec,
};

export function isCodecName(name: string): name is CodecName {
  return Object.prototype.hasOwnProperty.call(CODECS, name);
}

export function getCodec(name: CodecName): FlateCodec {
  return CODECS[name];
}
