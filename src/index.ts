export type { Logger, LogLevel } from './log.js';
export { setLogger, ConsoleLogger } from './log.js';
export * from './errors.js';
export {
  decodePng,
  decodePngBuffer,
  decodePngFile,
  loadPng,
  classifyChunk,
  PNG_SIGNATURE,
} from './pdf/png.js';
export type {
  PngImageDescriptor,
  DecodeOptions,
  Transparency,
  ColorSpace,
  BitDepth,
  PngColorType,
  PdfVersion,
  ChunkKind,
} from './pdf/png.js';
export { separateAlpha, splitAlphaChannel } from './pdf/alpha.js';
export type { AlphaGeometry, SeparatedChannels } from './pdf/alpha.js';
export { fflateCodec, nodeZlibCodec, getCodec } from './pdf/codec.js';
export type { FlateCodec, CodecName } from './pdf/codec.js';
export { reversePredictor, FilterType } from './pdf/predictor.js';
export type { DecodeParameters } from './pdf/predictor.js';
export { PngImage, colorKeyMask } from './pdf/image.js';
export { default as PdfGenerator } from './pdf/generator.js';
export type { GeneratorParams, PageOptions } from './pdf/generator.js';
export type { Metadata, PdfObject } from './pdf/common.js';
export * from './io.js';
export * from './convert.js';
