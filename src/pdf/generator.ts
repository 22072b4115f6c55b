/// PDF generation code
import pad from 'lodash/padStart';
import range from 'lodash/range';

import {
  Metadata,
  PdfObject,
  PdfDictionary,
  PdfRef,
  PdfValue,
  makeRef,
  serialize,
} from './common.js';
import { textEncoder, randomData, deflateStream } from './util.js';
import { Writer } from '../io.js';
import { OBJECTS_PER_IMAGE, PngImage } from './image.js';
import type { PdfVersion, PngImageDescriptor } from './png.js';
import log from '../log.js';
import metrics from '../metrics.js';

const PRODUCER = 'pdfpng';

export type GeneratorParams = {
  // Writer to output the PDF to
  writer: Writer;
  // Metadata to include in the PDF
  metadata?: Metadata;
  // Default resolution of the images, determines the page size
  ppi?: number;
  // Lowest PDF version to declare, raised as required by the images
  pdfVersion?: PdfVersion;
};

export type PageOptions = {
  // Resolution of this page's image, overrides the generator's default
  ppi?: number;
};

function maxVersion(a: PdfVersion, b: PdfVersion): PdfVersion {
  return a >= b ? a : b;
}

/** Wrap a string as PDF text string. Non-ASCII strings are later encoded as
 *  UTF-16 hex strings by `serialize`, which need no escaping. */
function textString(value: string): string {
  if (/^[\x00-\x7f]*$/.test(value)) {
    return `(${value.replace(/[\\()]/g, (c) => `\\${c}`)})`;
  }
  return `(${value})`;
}

/** Streaming PDF generator that puts every PNG image on its own page.
 *
 * Pages and their images are written out as soon as they are rendered, only
 * the page tree, catalog and document information are kept back until the
 * document is finished. The header's version is determined by the images
 * rendered before the first flush, if a later image requires a newer version
 * the catalog's `/Version` entry declares it.
 */
export default class PdfGenerator {
  _writer?: Writer;
  // Current offset into the output stream
  _offset = 0;
  // Offset of every object that was written so far, by object number
  _offsets: Map<number, number> = new Map();
  // Objects that still need to be written
  _objects: PdfObject[] = [];
  _nextObjNo = 1;
  // Object references for objects that are needed across the document
  _objRefs: { [name: string]: PdfRef } = {};
  _pageRefs: PdfRef[] = [];
  _info: PdfDictionary;
  _ppi: number;
  // Version declared in the header, once it is written
  _headerVersion?: PdfVersion;
  // Minimum version required by the document so far
  _requiredVersion: PdfVersion;
  _alphaInUse = false;

  constructor({
    writer,
    metadata = {},
    ppi = 72,
    pdfVersion = '1.3',
  }: GeneratorParams) {
    if (!(ppi > 0)) {
      throw new Error(`Invalid resolution: ${ppi}`);
    }
    this._writer = writer;
    this._ppi = ppi;
    this._requiredVersion = pdfVersion;

    this._info = { Producer: `(${PRODUCER})` };
    for (const [key, value] of Object.entries(metadata)) {
      if (value instanceof Date) {
        this._info[key] = value;
      } else if (typeof value === 'string') {
        this._info[key] = textString(value);
      }
    }
  }

  /** Whether any of the rendered images has a soft mask. */
  get alphaInUse(): boolean {
    return this._alphaInUse;
  }

  /** The PDF version the finished document declares. */
  get version(): PdfVersion {
    return this._requiredVersion;
  }

  /** Allocate the object numbers for the document level objects.  */
  async setup(): Promise<void> {
    for (const name of ['Info', 'Catalog', 'Pages']) {
      this._objRefs[name] = makeRef(this._nextObjNo++);
    }
  }

  _addObject(val: PdfValue, stream?: Uint8Array | string): PdfObject {
    if (stream) {
      if (typeof val !== 'object' || val === null || Array.isArray(val)) {
        throw new Error(
          'PDF Objects with a stream must have a dictionary as its value'
        );
      }
    }
    const obj = {
      num: this._nextObjNo,
      data: val,
      stream,
    };
    this._nextObjNo++;
    this._objects.push(obj);
    return obj;
  }

  /** Render a decoded PNG onto a new page that has exactly its size. */
  async renderPage(
    image: PngImageDescriptor,
    { ppi = this._ppi }: PageOptions = {}
  ): Promise<void> {
    if (this._writer === undefined) {
      throw new Error(
        'Cannot perform mutating operations on an already closed PdfGenerator.'
      );
    }
    if (this._objRefs.Pages === undefined) {
      throw new Error('PdfGenerator.setup() must be called first.');
    }
    const stopMeasuring = metrics.pageGenerationDuration.startTimer();
    try {
      this._requiredVersion = maxVersion(
        this._requiredVersion,
        image.minimumPdfVersion
      );
      this._alphaInUse = this._alphaInUse || image.needsAlphaSupport;

      // Factor to multiply pixels by to get equivalent PDF units (72 pdf units === 1 inch)
      const unitScale = 72 / ppi;
      const drawWidth = unitScale * image.width;
      const drawHeight = unitScale * image.height;
      const pageDict: PdfDictionary = {
        Type: '/Page',
        Parent: this._objRefs.Pages,
        MediaBox: [0, 0, drawWidth, drawHeight],
      };
      const page = this._addObject(pageDict);
      this._pageRefs.push(makeRef(page));

      const contentOps = [
        `q ${serialize(drawWidth)} 0 0 ${serialize(drawHeight)} 0 0 cm`,
        '/Im1 Do',
        'Q',
      ];
      log.debug('Compressing content stream.');
      const contentStreamComp = await deflateStream(contentOps.join('\n'));
      const contentsObj = this._addObject(
        contentStreamComp.dict,
        contentStreamComp.stream
      );

      log.debug('Creating image objects.');
      const imageObjs = new PngImage(image).toObjects(this._nextObjNo);
      for (const obj of imageObjs) {
        this._objects.push(obj);
      }
      this._nextObjNo += OBJECTS_PER_IMAGE;

      pageDict.Contents = makeRef(contentsObj);
      pageDict.Resources = {
        ProcSet: [
          '/PDF',
          image.colorSpace === 'Indexed'
            ? '/ImageI'
            : image.colorSpace === 'DeviceGray'
            ? '/ImageB'
            : '/ImageC',
        ],
        XObject: { Im1: makeRef(imageObjs[0]) },
      };
      await this._flush();
      stopMeasuring({ status: 'success' });
    } catch (err) {
      stopMeasuring({ status: 'error' });
      throw err;
    }
  }

  /** Flush remaining data to output. */
  async _flush(): Promise<void> {
    if (this._headerVersion === undefined) {
      log.debug('Writing PDF header');
      this._headerVersion = this._requiredVersion;
      await this._write(`%PDF-${this._headerVersion}\n%\xde\xad\xbe\xef\n`);
    }
    const objects = this._objects;
    this._objects = [];
    for (const obj of objects) {
      log.debug(`Serializing object #${obj.num}`);
      await this._serializeObject(obj);
    }
  }

  /** Serialize a PDF object to the output. */
  async _serializeObject(obj: PdfObject): Promise<void> {
    this._offsets.set(obj.num, this._offset);
    const { num, data, stream } = obj;
    await this._write(`${num} 0 obj\n`);
    if (data !== undefined) {
      await this._write(serialize(data));
    }
    if (stream) {
      await this._write('\nstream\n');
      await this._write(stream);
      await this._write('\nendstream');
    }
    await this._write('\nendobj\n');
  }

  /** Write data to the output. */
  async _write(data: Uint8Array | string): Promise<void> {
    if (this._writer === undefined) {
      throw new Error(
        'Cannot perform mutating operations on an already closed PdfGenerator.'
      );
    }
    if (typeof data === 'string') {
      data = textEncoder.encode(data);
    }
    this._offset += data.byteLength;
    await this._writer.write(data);
  }

  /** Finish writing the PDF and close the writer.
   *
   * Writes the page tree, catalog, XRef table, trailer and EOF marker to the
   * output.
   */
  async end(): Promise<void> {
    if (!this._writer) {
      return;
    }
    if (this._objRefs.Catalog === undefined) {
      await this.setup();
    }
    const catalog: PdfDictionary = {
      Type: '/Catalog',
      Pages: this._objRefs.Pages,
    };
    // Header was already written when a newer version became necessary
    if (
      this._headerVersion !== undefined &&
      this._headerVersion < this._requiredVersion
    ) {
      catalog.Version = `/${this._requiredVersion}`;
    }
    const pages: PdfDictionary = {
      Type: '/Pages',
      Kids: this._pageRefs,
      Count: this._pageRefs.length,
    };
    this._objects.push(
      { num: this._objRefs.Info.objNum, data: this._info },
      { num: this._objRefs.Catalog.objNum, data: catalog },
      { num: this._objRefs.Pages.objNum, data: pages }
    );
    await this._flush();

    log.debug('Writing xref table');
    type XrefEntry = [number, number, 'f' | 'n'];
    const xrefEntries: Array<XrefEntry> = [
      [0, 65535, 'f'],
      ...range(1, this._nextObjNo).map((num): XrefEntry => {
        const offset = this._offsets.get(num);
        return offset === undefined ? [0, 0, 'f'] : [offset, 0, 'n'];
      }),
    ];
    const xRefTable = xrefEntries
      .map(([off, gen, free]) =>
        [
          pad(off.toString(10), 10, '0'),
          pad(gen.toString(10), 5, '0'),
          free,
          '',
        ].join(' ')
      )
      .join('\n');
    const xrefOffset = this._offset;
    await this._write(`xref\n0 ${xrefEntries.length}\n${xRefTable}\n`);
    const trailerDict: PdfDictionary = {
      Size: xrefEntries.length,
      Root: this._objRefs.Catalog,
      Info: this._objRefs.Info,
      ID: [randomData(16), randomData(16)],
    };
    await this._write(`trailer\n${serialize(trailerDict)}\n`);
    log.debug('Writing trailer');
    await this._write(`startxref\n${xrefOffset}\n%%EOF`);
    log.debug('PDF finished, closing writer');
    await this._writer.close();
    this._writer = undefined;
  }

  /** Close the writer without finishing the document, e.g. after an error. */
  async abort(): Promise<void> {
    const writer = this._writer;
    if (!writer) {
      return;
    }
    this._writer = undefined;
    this._objects = [];
    await writer.close();
  }
}
