/** Parameters of a `/FlateDecode` stream using PNG predictors, mirrors the
 *  stream's `/DecodeParms` dictionary. */
export interface DecodeParameters {
  /** 15 means "PNG optimum", i.e. each row carries its own filter type */
  predictor: 15;
  colors: 1 | 3;
  bitsPerComponent: 1 | 2 | 4 | 8;
  columns: number;
}

export enum FilterType {
  None = 0,
  Sub = 1,
  Up = 2,
  Average = 3,
  Paeth = 4,
}

function paeth(left: number, upper: number, upperLeft: number): number {
  const p = left + upper - upperLeft;
  const pa = Math.abs(p - left);
  const pb = Math.abs(p - upper);
  const pc = Math.abs(p - upperLeft);
  if (pa <= pb && pa <= pc) {
    return left;
  } else if (pb <= pc) {
    return upper;
  } else {
    return upperLeft;
  }
}

/** Undo the PNG row filters of an inflated predictor stream.
 *
 * Returns the raw samples, row by row, without the filter type bytes.
 * Trailing data that does not make up a complete row is ignored.
 */
export function reversePredictor(
  data: Uint8Array,
  { colors, bitsPerComponent, columns }: DecodeParameters
): Uint8Array {
  const pixelBytes = Math.max(1, Math.ceil((colors * bitsPerComponent) / 8));
  const scanlineLength = Math.ceil((colors * bitsPerComponent * columns) / 8);
  const rows = Math.floor(data.length / (scanlineLength + 1));
  const pixels = new Uint8Array(scanlineLength * rows);

  let pos = 0;
  let c = 0;
  for (let row = 0; row < rows; row++) {
    const filterType = data[pos++];
    for (let i = 0; i < scanlineLength; i++) {
      const byte = data[pos++];
      const left = i < pixelBytes ? 0 : pixels[c - pixelBytes];
      const upper = row === 0 ? 0 : pixels[c - scanlineLength];
      const upperLeft =
        row === 0 || i < pixelBytes ? 0 : pixels[c - scanlineLength - pixelBytes];
      switch (filterType) {
        case FilterType.None:
          pixels[c++] = byte;
          break;
        case FilterType.Sub:
          pixels[c++] = (byte + left) & 0xff;
          break;
        case FilterType.Up:
          pixels[c++] = (byte + upper) & 0xff;
          break;
        case FilterType.Average:
          pixels[c++] = (byte + Math.floor((left + upper) / 2)) & 0xff;
          break;
        case FilterType.Paeth:
          pixels[c++] = (byte + paeth(left, upper, upperLeft)) & 0xff;
          break;
        default:
          throw new Error(`Invalid filter algorithm: ${filterType}`);
      }
    }
  }
  return pixels;
}
