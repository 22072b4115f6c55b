import { zlibSync } from 'fflate';

import { concatBytes, crc32 } from '../util';

const SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function uint32(val: number): number[] {
  return [(val >>> 24) & 0xff, (val >>> 16) & 0xff, (val >>> 8) & 0xff, val & 0xff];
}

function ascii(str: string): Uint8Array {
  return new Uint8Array(Array.from(str, (c) => c.charCodeAt(0)));
}

/** A complete chunk: length, type, payload and CRC */
export function chunk(type: string, payload: ArrayLike<number> = []): Uint8Array {
  const typeBytes = ascii(type);
  const data = new Uint8Array(payload);
  return concatBytes([
    new Uint8Array(uint32(data.length)),
    typeBytes,
    data,
    new Uint8Array(uint32(crc32(typeBytes, data))),
  ]);
}

export interface HeaderFields {
  width: number;
  height: number;
  bitDepth?: number;
  colorType: number;
  compression?: number;
  filter?: number;
  interlace?: number;
}

export function ihdr({
  width,
  height,
  bitDepth = 8,
  colorType,
  compression = 0,
  filter = 0,
  interlace = 0,
}: HeaderFields): Uint8Array {
  return chunk('IHDR', [
    ...uint32(width),
    ...uint32(height),
    bitDepth,
    colorType,
    compression,
    filter,
    interlace,
  ]);
}

/** Prefix every row with a filter type byte */
export function scanlines(rows: number[][], filterType = 0): Uint8Array {
  return new Uint8Array(rows.flatMap((row) => [filterType, ...row]));
}

export interface PngFixture extends HeaderFields {
  /** Chunks between the header and the image data */
  before?: Uint8Array[];
  /** Uncompressed scanlines, including filter bytes */
  raw?: Uint8Array;
  /** Number of IDAT chunks to split the compressed data into */
  idatCount?: number;
  /** Chunks between the image data and IEND */
  after?: Uint8Array[];
}

export function buildPng({
  before = [],
  raw = new Uint8Array(0),
  idatCount = 1,
  after = [],
  ...header
}: PngFixture): Uint8Array {
  const compressed = zlibSync(raw);
  const idats: Uint8Array[] = [];
  const size = Math.ceil(compressed.length / idatCount);
  for (let i = 0; i < idatCount; i++) {
    idats.push(chunk('IDAT', compressed.subarray(i * size, (i + 1) * size)));
  }
  return concatBytes([
    new Uint8Array(SIGNATURE),
    ihdr(header),
    ...before,
    ...idats,
    ...after,
    chunk('IEND'),
  ]);
}

/** Compressed image data as it is stored in the IDAT chunks of `buildPng` */
export function compressedData(raw: Uint8Array): Uint8Array {
  return zlibSync(raw);
}
