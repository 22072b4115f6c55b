/** Structural and support errors raised while decoding a PNG stream. */
export type DecodeErrorKind =
  | 'InvalidSignature'
  | 'InvalidHeader'
  | 'UnsupportedBitDepth'
  | 'UnsupportedColorType'
  | 'UnsupportedCompression'
  | 'UnsupportedFilter'
  | 'UnsupportedInterlacing'
  | 'MissingPalette'
  | 'CodecUnavailable'
  | 'CorruptImageData'
  | 'ChecksumMismatch';

export class PngDecodeError extends Error {
  readonly kind: DecodeErrorKind;
  /** Diagnostic name of the decoded source, usually a file name */
  readonly source: string;

  constructor(
    kind: DecodeErrorKind,
    source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${message}: ${source}`, options);
    this.name = 'PngDecodeError';
    this.kind = kind;
    this.source = source;
  }
}

/** The source ran out of bytes (or failed to deliver them) before a declared
 *  length was satisfied. */
export class TruncatedStreamError extends Error {
  readonly source: string;
  readonly expected: number;
  readonly received: number;

  constructor(
    source: string,
    expected: number,
    received: number,
    options?: { cause?: unknown }
  ) {
    const reason =
      options?.cause !== undefined
        ? 'Error while reading stream'
        : 'Unexpected end of stream';
    super(
      `${reason} (wanted ${expected} bytes, got ${received}): ${source}`,
      options
    );
    this.name = 'TruncatedStreamError';
    this.source = source;
    this.expected = expected;
    this.received = received;
  }
}

export function isDecodeError(
  err: unknown
): err is PngDecodeError | TruncatedStreamError {
  return err instanceof PngDecodeError || err instanceof TruncatedStreamError;
}
