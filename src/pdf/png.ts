import { DecodeErrorKind, PngDecodeError, TruncatedStreamError } from '../errors.js';
import { ArraySource, ByteSource, FileSource, Reader, readFully } from '../io.js';
import log from '../log.js';
import metrics from '../metrics.js';
import { concatBytes, crc32, readUint32BE } from '../util.js';
import { splitAlphaChannel } from './alpha.js';
import { FlateCodec, fflateCodec } from './codec.js';
import type { DecodeParameters } from './predictor.js';

export const PNG_SIGNATURE = new Uint8Array([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
]);

/** Upper bound for a single read from the source, declared chunk lengths
 *  are only trusted as far as the source actually delivers bytes. */
const MAX_READ_SIZE = 64 * 1024;

export type PngColorType = 0 | 2 | 3 | 4 | 6;
export type ColorSpace = 'DeviceGray' | 'DeviceRGB' | 'Indexed';
export type BitDepth = 1 | 2 | 4 | 8;
export type PdfVersion = '1.3' | '1.4';

export type Transparency =
  | { type: 'gray'; value: number }
  | { type: 'rgb'; rgb: [number, number, number] }
  | { type: 'indexed'; index: number };

/** Everything needed to embed a PNG as a PDF image XObject. */
export interface PngImageDescriptor {
  readonly width: number;
  readonly height: number;
  readonly colorType: PngColorType;
  readonly colorSpace: ColorSpace;
  readonly bitsPerComponent: BitDepth;
  readonly filter: 'FlateDecode';
  readonly decodeParameters: Readonly<DecodeParameters>;
  /** Raw RGB triples of the palette, empty for non-indexed images */
  readonly palette: Uint8Array;
  readonly transparency?: Transparency;
  /** Compressed image data, still carrying the PNG row filters */
  readonly data: Uint8Array;
  /** Compressed alpha samples for images with an alpha channel */
  readonly softMask?: Uint8Array;
  /** Whether the consumer has to support soft masks to render the image */
  readonly needsAlphaSupport: boolean;
  readonly minimumPdfVersion: PdfVersion;
}

export interface DecodeOptions {
  /** Codec for separating alpha channels, `null` if none is available */
  codec?: FlateCodec | null;
  /** Stop reading chunks at the first chunk with a length of zero, even if
   *  it is not `IEND`. */
  stopOnEmptyChunk?: boolean;
  /** Verify the CRC-32 of every chunk */
  verifyChecksums?: boolean;
}

export type ChunkKind = 'palette' | 'transparency' | 'imageData' | 'end' | 'other';

const CHUNK_KINDS: { [tag: string]: ChunkKind } = {
  PLTE: 'palette',
  tRNS: 'transparency',
  IDAT: 'imageData',
  IEND: 'end',
};

export function classifyChunk(tag: string): ChunkKind {
  return Object.prototype.hasOwnProperty.call(CHUNK_KINDS, tag)
    ? CHUNK_KINDS[tag]
    : 'other';
}

const COLOR_SPACES: { [colorType: number]: ColorSpace } = {
  0: 'DeviceGray',
  4: 'DeviceGray',
  2: 'DeviceRGB',
  6: 'DeviceRGB',
  3: 'Indexed',
};

function isColorType(val: number): val is PngColorType {
  return val === 0 || val === 2 || val === 3 || val === 4 || val === 6;
}

function isBitDepth(val: number): val is BitDepth {
  return val === 1 || val === 2 || val === 4 || val === 8;
}

function hasAlphaChannel(colorType: PngColorType): colorType is 4 | 6 {
  return colorType === 4 || colorType === 6;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function asciiString(bytes: Uint8Array): string {
  return String.fromCharCode(...bytes);
}

/** Sequential reader over a byte source that only hands out complete reads. */
class StreamCursor {
  private source: ByteSource;
  private name: string;

  constructor(source: ByteSource, name: string) {
    this.source = source;
    this.name = name;
  }

  read(length: number): Uint8Array {
    const parts: Uint8Array[] = [];
    let remaining = length;
    while (remaining > 0) {
      let part: Uint8Array;
      try {
        part = this.source.read(Math.min(remaining, MAX_READ_SIZE));
      } catch (err) {
        throw new TruncatedStreamError(
          this.name,
          length,
          length - remaining,
          { cause: err }
        );
      }
      if (part.length === 0) {
        throw new TruncatedStreamError(this.name, length, length - remaining);
      }
      // Sources may reuse their buffers, so keep a copy
      parts.push(part.slice());
      remaining -= part.length;
    }
    return parts.length === 1 ? parts[0] : concatBytes(parts);
  }

  readUint32(): number {
    return readUint32BE(this.read(4));
  }

  skip(length: number): void {
    let remaining = length;
    while (remaining > 0) {
      const step = Math.min(remaining, MAX_READ_SIZE);
      this.read(step);
      remaining -= step;
    }
  }
}

/** Decode a PNG from a byte source into a PDF image descriptor.
 *
 * Only the information required for a PDF image XObject is extracted: the
 * image data itself stays compressed and filtered, the PDF consumer undoes
 * the row filters by way of the `decodeParameters`. Images with an alpha
 * channel are inflated once to separate color and alpha samples.
 *
 * @param name Used for error messages only
 */
export function decodePng(
  source: ByteSource,
  name: string,
  {
    codec = fflateCodec,
    stopOnEmptyChunk = false,
    verifyChecksums = false,
  }: DecodeOptions = {}
): PngImageDescriptor {
  const cursor = new StreamCursor(source, name);
  const fail = (kind: DecodeErrorKind, msg: string) =>
    new PngDecodeError(kind, name, msg);

  const checkCrc = (typeTag: Uint8Array, payload: Uint8Array): void => {
    const expected = cursor.readUint32();
    if (verifyChecksums && crc32(typeTag, payload) !== expected) {
      throw fail(
        'ChecksumMismatch',
        `CRC mismatch in ${asciiString(typeTag)} chunk`
      );
    }
  };

  if (!bytesEqual(cursor.read(8), PNG_SIGNATURE)) {
    throw fail('InvalidSignature', 'Not a PNG file');
  }

  // Header chunk, its declared length is not needed
  cursor.read(4);
  const headerTag = cursor.read(4);
  if (asciiString(headerTag) !== 'IHDR') {
    throw fail('InvalidHeader', 'Incorrect PNG file');
  }
  const header: Uint8Array[] = [];
  const takeHeader = (length: number): Uint8Array => {
    const bytes = cursor.read(length);
    header.push(bytes);
    return bytes;
  };

  const width = readUint32BE(takeHeader(4));
  const height = readUint32BE(takeHeader(4));
  if (width === 0 || height === 0) {
    throw fail('InvalidHeader', `Invalid image dimensions ${width}x${height}`);
  }

  const bits = takeHeader(1)[0];
  if (bits > 8) {
    throw fail('UnsupportedBitDepth', `${bits}-bit depth not supported`);
  }
  if (!isBitDepth(bits)) {
    throw fail('UnsupportedBitDepth', `Invalid bit depth ${bits}`);
  }

  const colorType = takeHeader(1)[0];
  if (!isColorType(colorType)) {
    throw fail('UnsupportedColorType', `Unknown color type ${colorType}`);
  }
  if (hasAlphaChannel(colorType) && bits !== 8) {
    throw fail(
      'UnsupportedBitDepth',
      `${bits}-bit depth not supported for color type ${colorType}`
    );
  }
  const colorSpace = COLOR_SPACES[colorType];

  if (takeHeader(1)[0] !== 0) {
    throw fail('UnsupportedCompression', 'Unknown compression method');
  }
  if (takeHeader(1)[0] !== 0) {
    throw fail('UnsupportedFilter', 'Unknown filter method');
  }
  if (takeHeader(1)[0] !== 0) {
    throw fail('UnsupportedInterlacing', 'Interlacing not supported');
  }
  checkCrc(headerTag, concatBytes(header));

  const decodeParameters: DecodeParameters = {
    predictor: 15,
    colors: colorSpace === 'DeviceRGB' ? 3 : 1,
    bitsPerComponent: bits,
    columns: width,
  };

  // Scan chunks looking for palette, transparency and image data
  let palette: Uint8Array = new Uint8Array(0);
  let transparency: Transparency | undefined;
  const imgData: Uint8Array[] = [];
  let chunkLength: number;
  do {
    chunkLength = cursor.readUint32();
    const typeTag = cursor.read(4);
    const chunkType = asciiString(typeTag);
    const kind = classifyChunk(chunkType);
    if (kind === 'end') {
      checkCrc(typeTag, cursor.read(chunkLength));
      break;
    }
    if (kind === 'other' && !verifyChecksums) {
      log.debug(`Skipping ${chunkType} chunk (${chunkLength} bytes) in ${name}`);
      cursor.skip(chunkLength + 4);
      continue;
    }
    const payload = cursor.read(chunkLength);
    checkCrc(typeTag, payload);
    switch (kind) {
      case 'palette':
        palette = payload;
        break;
      case 'transparency':
        transparency = readTransparency(payload, colorType, name);
        break;
      case 'imageData':
        imgData.push(payload);
        break;
    }
  } while (chunkLength > 0 || !stopOnEmptyChunk);

  if (colorSpace === 'Indexed' && palette.length === 0) {
    throw fail('MissingPalette', 'Missing palette');
  }

  let data = concatBytes(imgData);
  let softMask: Uint8Array | undefined;
  if (hasAlphaChannel(colorType)) {
    log.debug(`Separating alpha channel of ${name}`);
    [data, softMask] = splitAlphaChannel(
      data,
      { width, height, colors: decodeParameters.colors },
      codec,
      name
    );
  }

  const descriptor: PngImageDescriptor = {
    width,
    height,
    colorType,
    colorSpace,
    bitsPerComponent: bits,
    filter: 'FlateDecode',
    decodeParameters: Object.freeze(decodeParameters),
    palette,
    transparency,
    data,
    softMask,
    needsAlphaSupport: softMask !== undefined,
    minimumPdfVersion: softMask !== undefined ? '1.4' : '1.3',
  };
  return Object.freeze(descriptor);
}

function readTransparency(
  chunk: Uint8Array,
  colorType: PngColorType,
  name: string
): Transparency | undefined {
  switch (colorType) {
    case 0: {
      // Greyscale, a single two byte sample, we only need the low byte
      if (chunk.length < 2) {
        log.warn(`Ignoring truncated tRNS chunk in ${name}`);
        return undefined;
      }
      return { type: 'gray', value: chunk[1] };
    }
    case 2: {
      // Truecolor, three two byte samples
      if (chunk.length < 6) {
        log.warn(`Ignoring truncated tRNS chunk in ${name}`);
        return undefined;
      }
      return { type: 'rgb', rgb: [chunk[1], chunk[3], chunk[5]] };
    }
    case 3: {
      // Indexed, one alpha value per palette entry. Only a fully transparent
      // entry can be expressed as a color key.
      const index = chunk.indexOf(0);
      return index >= 0 ? { type: 'indexed', index } : undefined;
    }
    default:
      log.debug(`Ignoring tRNS chunk for color type ${colorType} in ${name}`);
      return undefined;
  }
}

export function decodePngBuffer(
  data: Uint8Array,
  name: string,
  options?: DecodeOptions
): PngImageDescriptor {
  return decodePng(new ArraySource(data), name, options);
}

/** Decode a PNG file, the file is closed again on every exit path. */
export function decodePngFile(
  path: string,
  options?: DecodeOptions
): PngImageDescriptor {
  const source = FileSource.open(path);
  try {
    return decodePng(source, path, options);
  } finally {
    source.close();
  }
}

/** Read a PNG from an asynchronous reader and decode it. */
export async function loadPng(
  reader: Reader,
  name: string,
  options?: DecodeOptions
): Promise<PngImageDescriptor> {
  const data = await readFully(reader);
  const stopMeasuring = metrics.decodeDuration.startTimer();
  try {
    const image = decodePngBuffer(data, name, options);
    stopMeasuring({ status: 'success', color_type: image.colorType });
    return image;
  } catch (err) {
    stopMeasuring({ status: 'error', color_type: 'unknown' });
    throw err;
  }
}
