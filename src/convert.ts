import fs from 'fs';

import PdfGenerator from './pdf/generator.js';
import { CountingWriter, NodeReader, NodeWriter, Writer } from './io.js';
import type { Metadata } from './pdf/common.js';
import {
  DecodeOptions,
  PdfVersion,
  PngImageDescriptor,
  loadPng,
} from './pdf/png.js';
import log from './log.js';
import { now } from './util.js';

/** Progress information for rendering a progress bar or similar UI elements. */
export interface ProgressStatus {
  /** Expected total number of pages in the PDF */
  totalPages: number;
  /** Number of pages that were written so far */
  pagesWritten: number;
  /** Number of bytes that were written to the output stream so far */
  bytesWritten: number;
}

export interface ConvertOptions {
  /** Metadata to include in the PDF */
  metadata?: Metadata;
  /** Resolution of the images, determines the page sizes */
  ppi?: number;
  /** Lowest PDF version to declare */
  pdfVersion?: PdfVersion;
  /** Options for decoding the PNG images */
  decodeOptions?: DecodeOptions;
  /** Callback that gets called after every page */
  onProgress?: (status: ProgressStatus) => void;
}

export interface ConversionResult {
  pages: number;
  bytesWritten: number;
  pdfVersion: PdfVersion;
  /** Whether any image needed a soft mask */
  alphaInUse: boolean;
}

/** Read and decode a PNG file, the file handle is closed on every exit path. */
export async function readPngFile(
  path: string,
  options?: DecodeOptions
): Promise<PngImageDescriptor> {
  const handle = await fs.promises.open(path, 'r');
  try {
    return await loadPng(new NodeReader(handle), path, options);
  } finally {
    await handle.close();
  }
}

/** Convert PNG files to a PDF with one page per image.
 *
 * Images are decoded and written one after the other, so only a single
 * image is held in memory at any time. Any decoding error aborts the
 * conversion: the output is closed and left incomplete, since a page can't
 * be left out without breaking the document.
 *
 * @param output Writer or path of the PDF file to write
 */
export async function convertPngsToPdf(
  inputs: ReadonlyArray<string>,
  output: Writer | string,
  {
    metadata = {},
    ppi,
    pdfVersion,
    decodeOptions,
    onProgress,
  }: ConvertOptions = {}
): Promise<ConversionResult> {
  const writer = new CountingWriter(
    typeof output === 'string'
      ? new NodeWriter(fs.createWriteStream(output))
      : output
  );
  const pdfGen = new PdfGenerator({ writer, metadata, ppi, pdfVersion });
  const startTime = now();
  try {
    await pdfGen.setup();
    for (const [idx, input] of inputs.entries()) {
      log.debug(`Decoding ${input}`);
      const image = await readPngFile(input, decodeOptions);
      log.debug(`Rendering ${input} into PDF page #${idx + 1}`);
      await pdfGen.renderPage(image);
      onProgress?.({
        totalPages: inputs.length,
        pagesWritten: idx + 1,
        bytesWritten: writer.bytesWritten,
      });
    }
    await pdfGen.end();
  } catch (err) {
    log.error(`Failed to convert PNGs to PDF: ${err}`);
    try {
      await pdfGen.abort();
    } catch (closeErr) {
      log.warn(`Failed to close output after error: ${closeErr}`);
    }
    throw err;
  }
  log.info(
    `Wrote ${inputs.length} pages (${writer.bytesWritten} bytes) in ${Math.round(
      now() - startTime
    )}ms`
  );
  return {
    pages: inputs.length,
    bytesWritten: writer.bytesWritten,
    pdfVersion: pdfGen.version,
    alphaInUse: pdfGen.alphaInUse,
  };
}
