#!/usr/bin/env node
import { convertPngsToPdf } from '../convert.js';
import { PngDecodeError, isDecodeError } from '../errors.js';
import log, { setLogger } from '../log.js';
import { getCodec } from '../pdf/codec.js';
import { DecodeOptions, PngImageDescriptor, decodePngFile } from '../pdf/png.js';
import { CliConfig, ConfigError, loadConfig } from './config.js';
import { WinstonLogger, createLogger } from './logger.js';

const USAGE = `Usage:
  pdfpng convert <output.pdf> <input.png>...
  pdfpng inspect <input.png>...`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Summary of a decoded image as printed by `pdfpng inspect` */
export function describeImage(file: string, image: PngImageDescriptor) {
  return {
    file,
    width: image.width,
    height: image.height,
    colorType: image.colorType,
    colorSpace: image.colorSpace,
    bitsPerComponent: image.bitsPerComponent,
    paletteEntries: Math.floor(image.palette.length / 3),
    transparency: image.transparency ?? null,
    dataBytes: image.data.length,
    softMaskBytes: image.softMask?.length ?? null,
    minimumPdfVersion: image.minimumPdfVersion,
  };
}

function decodeOptions(config: CliConfig): DecodeOptions {
  return {
    codec: getCodec(config.codec),
    verifyChecksums: config.verifyChecksums,
    stopOnEmptyChunk: config.stopOnEmptyChunk,
  };
}

/** Run the command line interface, resolves to the process exit code. */
export async function run(
  args: ReadonlyArray<string>,
  env: NodeJS.ProcessEnv = process.env,
  print: (line: string) => void = (line) => process.stdout.write(`${line}\n`)
): Promise<number> {
  let config: CliConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`${err.message}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }
  setLogger(new WinstonLogger(createLogger(config.logLevel)));

  const [command, ...rest] = args;
  try {
    if (command === 'convert' && rest.length >= 2) {
      const [output, ...inputs] = rest;
      const result = await convertPngsToPdf(inputs, output, {
        ppi: config.ppi,
        pdfVersion: config.pdfVersion,
        decodeOptions: decodeOptions(config),
        onProgress: ({ pagesWritten, totalPages }) =>
          log.info(`Wrote page ${pagesWritten}/${totalPages}`),
      });
      print(
        `Wrote ${result.pages} pages (${result.bytesWritten} bytes, PDF ${result.pdfVersion}) to ${output}`
      );
      return EXIT_OK;
    } else if (command === 'inspect' && rest.length >= 1) {
      for (const file of rest) {
        const image = decodePngFile(file, decodeOptions(config));
        print(JSON.stringify(describeImage(file, image)));
      }
      return EXIT_OK;
    }
  } catch (err) {
    if (isDecodeError(err)) {
      log.error(err.message, {
        kind: err instanceof PngDecodeError ? err.kind : 'TruncatedStream',
      });
    } else {
      log.error(`${err}`);
    }
    return EXIT_FAILURE;
  }
  process.stderr.write(`${USAGE}\n`);
  return EXIT_USAGE;
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      process.stderr.write(`${err}\n`);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
