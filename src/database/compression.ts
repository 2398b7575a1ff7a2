import { Logger } from '@nestjs/common';
import { CompressionType } from './types';

const logger = new Logger('Compression');

const COMPRESSION_NAMES: Readonly<Record<string, CompressionType>> = {
  none: CompressionType.None,
  false: CompressionType.None,
  '0': CompressionType.None,
  lz4: CompressionType.Lz4,
  zstd: CompressionType.Zstd,
};

/**
 * Map a configured compression name to a codec
 * Unknown names are not fatal: they log a warning and fall back to lz4
 */
export function parseCompression(name: string): CompressionType {
  const key = name.trim().toLowerCase();
  if (Object.prototype.hasOwnProperty.call(COMPRESSION_NAMES, key)) {
    return COMPRESSION_NAMES[key];
  }
  logger.warn(`Unknown compression type '${name}', using lz4`);
  return CompressionType.Lz4;
}
