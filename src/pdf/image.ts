/* Based on the `images` modules in `pdfkit` by Devon Govett, licensed under MIT.
 *
 * https://github.com/foliojs/pdfkit/blob/master/lib/image/png.js
 *
 * MIT LICENSE
 * Copyright (c) 2011 Devon Govett
 *
 * Permission is hereby granted, free of charge, to any person obtaining a copy of this
 * software and associated documentation files (the "Software"), to deal in the Software
 * without restriction, including without limitation the rights to use, copy, modify, merge,
 * publish, distribute, sublicense, and/or sell copies of the Software, and to permit persons
 * to whom the Software is furnished to do so, subject to the following conditions:
 *
 * The above copyright notice and this permission notice shall be included in all copies or
 * substantial portions of the Software.
 *
 * THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR IMPLIED, INCLUDING
 * BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY, FITNESS FOR A PARTICULAR PURPOSE AND
 * NONINFRINGEMENT. IN NO EVENT SHALL THE AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM,
 * DAMAGES OR OTHER LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
 * OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE SOFTWARE.
 */
import {
  PdfArray,
  PdfDictionary,
  PdfObject,
  makeRef,
  serialize,
} from './common.js';
import type { PngImageDescriptor, Transparency } from './png.js';

/** Number of PDF objects every image occupies, unused slots are filled with
 *  empty dummy objects to keep object numbers predictable. */
export const OBJECTS_PER_IMAGE = 3;

/** Color key mask for the image, every key is given as a `[min max]` range. */
export function colorKeyMask(transparency: Transparency): PdfArray {
  switch (transparency.type) {
    case 'gray':
      return [transparency.value, transparency.value];
    case 'indexed':
      return [transparency.index, transparency.index];
    case 'rgb': {
      const mask: PdfArray = [];
      for (const x of transparency.rgb) {
        mask.push(x, x);
      }
      return mask;
    }
  }
}

/** A decoded PNG that can be written as PDF image XObject. */
export class PngImage {
  readonly image: PngImageDescriptor;

  constructor(image: PngImageDescriptor) {
    this.image = image;
  }

  /** Build the PDF objects for the image, starting at object number `startNum`.
   *
   * The first object is always the image XObject itself, followed by the
   * palette stream and the soft mask XObject (or dummies in their place).
   */
  toObjects(startNum: number): Array<PdfObject> {
    const { image } = this;
    const out: Array<PdfObject> = [];
    let nextNum = startNum;
    const imgObj: PdfObject = {
      num: nextNum++,
      stream: image.data,
    };
    out.push(imgObj);

    const imgDict: PdfDictionary = {
      Type: '/XObject',
      Subtype: '/Image',
      Width: image.width,
      Height: image.height,
      BitsPerComponent: image.bitsPerComponent,
      Filter: `/${image.filter}`,
      DecodeParms: {
        Predictor: image.decodeParameters.predictor,
        Colors: image.decodeParameters.colors,
        BitsPerComponent: image.decodeParameters.bitsPerComponent,
        Columns: image.decodeParameters.columns,
      },
    };

    if (image.colorSpace === 'Indexed') {
      // embed the color palette in the PDF as an object stream
      const paletteObj: PdfObject = {
        num: nextNum++,
        data: serialize({ Length: image.palette.length }),
        stream: image.palette,
      };
      out.push(paletteObj);
      // build the color space array for the image
      imgDict.ColorSpace = [
        '/Indexed',
        '/DeviceRGB',
        Math.floor(image.palette.length / 3) - 1,
        makeRef(paletteObj),
      ];
    } else {
      imgDict.ColorSpace = `/${image.colorSpace}`;
      out.push({ num: nextNum++, data: null });
    }

    if (image.transparency) {
      // Color key masking, PDF Reference 1.7 section 4.8.5
      imgDict.Mask = colorKeyMask(image.transparency);
    }

    if (image.softMask) {
      // The alpha samples were separated from the color samples by the
      // decoder and are stored in their own grayscale image
      const softMaskObj: PdfObject = {
        num: nextNum++,
        data: serialize({
          Type: '/XObject',
          Subtype: '/Image',
          Width: image.width,
          Height: image.height,
          ColorSpace: '/DeviceGray',
          BitsPerComponent: 8,
          Filter: `/${image.filter}`,
          DecodeParms: {
            Predictor: 15,
            Colors: 1,
            BitsPerComponent: 8,
            Columns: image.width,
          },
          Length: image.softMask.length,
        }),
        stream: image.softMask,
      };
      imgDict.SMask = makeRef(softMaskObj);
      out.push(softMaskObj);
    } else {
      out.push({ num: nextNum++, data: null });
    }

    imgDict.Length = image.data.length;
    imgObj.data = serialize(imgDict);
    return out;
  }
}

export default PngImage;
