import { PDFDocument, PDFDict, PDFName, PDFNumber, PDFStream } from 'pdf-lib';
import { unzlibSync } from 'fflate';

import PdfGenerator from '../pdf/generator';
import { makeRef, serialize, toUTF16BE } from '../pdf/common';
import { deflateStream, textEncoder } from '../pdf/util';
import metrics from '../metrics';
import { decodePngBuffer } from '../pdf/png';
import { MemoryWriter } from '../io';
import { buildPng, chunk, scanlines } from './fixtures';

const rgbImage = decodePngBuffer(
  buildPng({
    width: 4,
    height: 3,
    colorType: 2,
    raw: scanlines([
      [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12],
      [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12],
      [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12],
    ]),
  }),
  'rgb.png'
);

const rgbaImage = decodePngBuffer(
  buildPng({
    width: 2,
    height: 1,
    colorType: 6,
    raw: scanlines([[1, 2, 3, 255, 4, 5, 6, 0]]),
  }),
  'rgba.png'
);

const indexedImage = decodePngBuffer(
  buildPng({
    width: 2,
    height: 2,
    colorType: 3,
    before: [chunk('PLTE', [0, 0, 0, 255, 255, 255])],
    raw: scanlines([
      [0, 1],
      [1, 0],
    ]),
  }),
  'indexed.png'
);

const load = (data: Uint8Array) =>
  PDFDocument.load(data, { updateMetadata: false });

const latin1 = (data: Uint8Array) => Buffer.from(data).toString('latin1');

async function generate(
  images: Parameters<PdfGenerator['renderPage']>[0][],
  params: Omit<ConstructorParameters<typeof PdfGenerator>[0], 'writer'> = {}
): Promise<{ data: Uint8Array; generator: PdfGenerator }> {
  const writer = new MemoryWriter();
  const generator = new PdfGenerator({ writer, ...params });
  await generator.setup();
  for (const image of images) {
    await generator.renderPage(image);
  }
  await generator.end();
  return { data: writer.data, generator };
}

describe('PDF serialization', () => {
  it('should serialize dictionaries with indentation', () => {
    expect(serialize({ Type: '/Page', Count: 2 })).toBe(
      '<<\n  /Type /Page\n  /Count 2\n>>'
    );
    expect(serialize({ A: { B: 1 } })).toBe('<<\n  /A <<\n    /B 1\n  >>\n>>');
  });

  it('should serialize arrays and references', () => {
    expect(serialize([1, 2.5, makeRef(3), '/Name'])).toBe('[1 2.5 3 0 R /Name]');
  });

  it('should serialize numbers with limited precision', () => {
    expect(serialize(1 / 3)).toBe('0.333333');
    expect(() => serialize(1e22)).toThrow('unsupported number: 1e+22');
  });

  it('should serialize binary data as hex strings', () => {
    expect(serialize(new Uint8Array([0, 15, 255]))).toBe('<000FFF>');
  });

  it('should serialize dates in UTC', () => {
    expect(serialize(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe(
      '(D:20240102030405Z)'
    );
  });

  it('should encode non-ASCII strings as UTF-16', () => {
    expect(serialize('(Grüße)')).toBe('<FEFF0047007200FC00DF0065>');
    expect(serialize('(plain)')).toBe('(plain)');
  });

  it('should encode strings as UTF-16BE with byte order mark', () => {
    expect(toUTF16BE('A€')).toEqual(
      new Uint8Array([0xfe, 0xff, 0, 0x41, 0x20, 0xac])
    );
  });

  it('should deflate stream contents', async () => {
    const { dict, stream } = await deflateStream('q 1 0 0 1 0 0 cm');
    expect(unzlibSync(stream)).toEqual(textEncoder.encode('q 1 0 0 1 0 0 cm'));
    expect(dict).toEqual({ Length: stream.length, Filter: '/FlateDecode' });
  });

  it('should serialize other primitives literally', () => {
    expect(serialize(null)).toBe('null');
    expect(serialize(true)).toBe('true');
  });
});

describe('PDF generation', () => {
  it('should initialize a PDF with the correct metadata', async () => {
    const { data } = await generate([rgbImage], {
      metadata: { Title: 'Test Title', Author: 'Jane (Doe)' },
    });
    const parsed = await load(data);
    expect(parsed.getPageCount()).toBe(1);
    expect(parsed.getPage(0).getSize()).toMatchObject({ width: 4, height: 3 });
    expect(parsed.getTitle()).toBe('Test Title');
    expect(parsed.getAuthor()).toBe('Jane (Doe)');
    expect(parsed.getProducer()).toBe('pdfpng');
  });

  it('should size pages according to the resolution', async () => {
    const writer = new MemoryWriter();
    const generator = new PdfGenerator({ writer, ppi: 144 });
    await generator.setup();
    await generator.renderPage(rgbImage);
    await generator.renderPage(rgbImage, { ppi: 36 });
    await generator.end();
    const parsed = await load(writer.data);
    expect(parsed.getPage(0).getSize()).toMatchObject({ width: 2, height: 1.5 });
    expect(parsed.getPage(1).getSize()).toMatchObject({ width: 8, height: 6 });
  });

  it('should draw the image over the whole page', async () => {
    const { data } = await generate([rgbImage]);
    const parsed = await load(data);
    const resources = parsed.getPage(0).node.Resources();
    const xobjects = resources?.lookup(PDFName.of('XObject'), PDFDict);
    const img = xobjects?.lookup(PDFName.of('Im1'), PDFStream);
    expect(img?.dict.lookup(PDFName.of('Width'), PDFNumber).asNumber()).toBe(4);
    expect(img?.dict.lookup(PDFName.of('Height'), PDFNumber).asNumber()).toBe(3);
    expect(img?.dict.get(PDFName.of('SMask'))).toBeUndefined();
  });

  it('should write a PDF 1.3 header for images without alpha channel', async () => {
    const { data, generator } = await generate([rgbImage, indexedImage]);
    expect(latin1(data.subarray(0, 9))).toBe('%PDF-1.3\n');
    expect(generator.version).toBe('1.3');
    expect(generator.alphaInUse).toBe(false);
    expect((await load(data)).getPageCount()).toBe(2);
  });

  it('should write a PDF 1.4 header for images with alpha channel', async () => {
    const { data, generator } = await generate([rgbaImage]);
    expect(latin1(data.subarray(0, 9))).toBe('%PDF-1.4\n');
    expect(generator.version).toBe('1.4');
    expect(generator.alphaInUse).toBe(true);
    const parsed = await load(data);
    expect(parsed.catalog.get(PDFName.of('Version'))).toBeUndefined();
    const xobjects = parsed
      .getPage(0)
      .node.Resources()
      ?.lookup(PDFName.of('XObject'), PDFDict);
    const img = xobjects?.lookup(PDFName.of('Im1'), PDFStream);
    const mask = img?.dict.lookup(PDFName.of('SMask'), PDFStream);
    expect(
      mask?.dict.lookup(PDFName.of('ColorSpace'), PDFName).toString()
    ).toBe('/DeviceGray');
  });

  it('should declare a later version requirement in the catalog', async () => {
    const { data, generator } = await generate([rgbImage, rgbaImage]);
    expect(latin1(data.subarray(0, 9))).toBe('%PDF-1.3\n');
    expect(generator.version).toBe('1.4');
    const parsed = await load(data);
    expect(parsed.catalog.get(PDFName.of('Version'))?.toString()).toBe('/1.4');
  });

  it('should honor a configured minimum version', async () => {
    const { data } = await generate([rgbImage], { pdfVersion: '1.4' });
    expect(latin1(data.subarray(0, 9))).toBe('%PDF-1.4\n');
  });

  it('should write a cross-reference table pointing to every object', async () => {
    const { data } = await generate([rgbImage]);
    const text = latin1(data);
    const startxref = /startxref\n(\d+)\n%%EOF$/.exec(text);
    expect(startxref).not.toBeNull();
    const lines = text.slice(Number(startxref?.[1])).split('\n');
    expect(lines[0]).toBe('xref');
    // Info, Catalog, Pages, page, content stream and three image objects
    expect(lines[1]).toBe('0 9');
    expect(lines[2]).toBe('0000000000 65535 f ');
    for (let num = 1; num < 9; num++) {
      const [offset, gen, type] = lines[2 + num].split(' ');
      expect(gen).toBe('00000');
      expect(type).toBe('n');
      expect(text.startsWith(`${num} 0 obj\n`, Number(offset))).toBe(true);
    }
    expect(lines[11]).toBe('trailer');
  });

  it('should record the page generation duration', async () => {
    metrics.pageGenerationDuration.reset();
    await generate([rgbImage, indexedImage]);
    const { values } = await metrics.pageGenerationDuration.get();
    const count = values.find(
      (v) => v.metricName === 'pdfpng_page_generation_duration_seconds_count'
    );
    expect(count).toMatchObject({ labels: { status: 'success' }, value: 2 });
  });

  it('should reject invalid resolutions', () => {
    expect(() => new PdfGenerator({ writer: new MemoryWriter(), ppi: 0 })).toThrow(
      'Invalid resolution: 0'
    );
  });

  it('should require setup before rendering', async () => {
    const generator = new PdfGenerator({ writer: new MemoryWriter() });
    await expect(generator.renderPage(rgbImage)).rejects.toThrow(
      'PdfGenerator.setup() must be called first.'
    );
  });

  it('should not render into a finished document', async () => {
    const { generator } = await generate([rgbImage]);
    await expect(generator.renderPage(rgbImage)).rejects.toThrow(
      'Cannot perform mutating operations on an already closed PdfGenerator.'
    );
  });

  it('should close the writer without finishing the document on abort', async () => {
    const writer = new MemoryWriter();
    const generator = new PdfGenerator({ writer });
    await generator.setup();
    await generator.renderPage(rgbImage);
    await generator.abort();
    expect(writer.closed).toBe(true);
    expect(latin1(writer.data)).not.toContain('%%EOF');
    await generator.abort();
    await generator.end();
  });
});
