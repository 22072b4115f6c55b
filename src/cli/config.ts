import { isLogLevel, LogLevel } from '../log.js';
import { CodecName, isCodecName } from '../pdf/codec.js';
import type { PdfVersion } from '../pdf/png.js';

export interface CliConfig {
  logLevel: LogLevel;
  ppi: number;
  pdfVersion: PdfVersion;
  codec: CodecName;
  verifyChecksums: boolean;
  stopOnEmptyChunk: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Read the configuration from `CFG_*` environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const logLevel = env.CFG_LOG_LEVEL ?? 'warn';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid log level: ${logLevel}`);
  }
  const ppi = Number.parseFloat(env.CFG_PPI ?? '72');
  if (!(ppi > 0)) {
    throw new ConfigError(`Invalid resolution: ${env.CFG_PPI}`);
  }
  const pdfVersion = env.CFG_PDF_VERSION ?? '1.3';
  if (pdfVersion !== '1.3' && pdfVersion !== '1.4') {
    throw new ConfigError(`Unsupported PDF version: ${pdfVersion}`);
  }
  const codec = env.CFG_CODEC ?? 'fflate';
  if (!isCodecName(codec)) {
    throw new ConfigError(`Unknown codec: ${codec}`);
  }
  return {
    logLevel,
    ppi,
    pdfVersion,
    codec,
    verifyChecksums: env.CFG_VERIFY_CHECKSUMS === 'true',
    stopOnEmptyChunk: env.CFG_STOP_ON_EMPTY_CHUNK === 'true',
  };
}
