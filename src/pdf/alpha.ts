import { PngDecodeError } from '../errors.js';
import type { FlateCodec } from './codec.js';

export interface AlphaGeometry {
  width: number;
  height: number;
  /** Number of color samples per pixel, without the alpha sample */
  colors: 1 | 3;
}

export interface SeparatedChannels {
  /** Scanlines with only the color samples, each prefixed by its filter byte */
  color: Uint8Array;
  /** Scanlines with only the alpha samples, each prefixed by its filter byte */
  alpha: Uint8Array;
}

/** Split inflated 8 bit gray+alpha or RGB+alpha scanlines into two sets of
 *  scanlines.
 *
 * Every row keeps its filter type byte in both outputs. PNG filters operate
 * on each byte and the same byte of the previous pixel/row, so both outputs
 * stay decodable with the same filter types once the bytes per pixel are
 * adjusted (`colors` for the color data, 1 for the alpha data).
 */
export function separateAlpha(
  inflated: Uint8Array,
  { width, height, colors }: AlphaGeometry
): SeparatedChannels {
  const pixelBytes = colors + 1;
  const inLine = 1 + width * pixelBytes;
  if (inflated.length < inLine * height) {
    throw new RangeError(
      `Image data too short, expected ${inLine * height} bytes, got ${inflated.length}`
    );
  }
  const color = new Uint8Array(height * (1 + width * colors));
  const alpha = new Uint8Array(height * (1 + width));

  let i = 0;
  let c = 0;
  let a = 0;
  for (let row = 0; row < height; row++) {
    const filterType = inflated[i++];
    color[c++] = filterType;
    alpha[a++] = filterType;
    for (let x = 0; x < width; x++) {
      for (let colorIndex = 0; colorIndex < colors; colorIndex++) {
        color[c++] = inflated[i++];
      }
      alpha[a++] = inflated[i++];
    }
  }
  return { color, alpha };
}

/** Inflate the concatenated image data of an image with an alpha channel,
 *  separate the alpha samples and deflate both parts again.
 *
 * @returns the compressed color data and the compressed soft mask data
 */
export function splitAlphaChannel(
  compressed: Uint8Array,
  geometry: AlphaGeometry,
  codec: FlateCodec | null,
  name: string
): [Uint8Array, Uint8Array] {
  if (codec === null) {
    throw new PngDecodeError(
      'CodecUnavailable',
      name,
      "No flate codec available, can't handle alpha channel"
    );
  }
  let inflated: Uint8Array;
  try {
    inflated = codec.inflate(compressed);
  } catch (err) {
    throw new PngDecodeError(
      'CorruptImageData',
      name,
      'Could not inflate image data',
      { cause: err }
    );
  }
  let channels: SeparatedChannels;
  try {
    channels = separateAlpha(inflated, geometry);
  } catch (err) {
    throw new PngDecodeError(
      'CorruptImageData',
      name,
      err instanceof Error ? err.message : 'Could not separate alpha channel',
      { cause: err }
    );
  }
  return [codec.deflate(channels.color), codec.deflate(channels.alpha)];
}
