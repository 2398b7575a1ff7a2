import { registerAs } from '@nestjs/config';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { validateConfig } from './config-validation';

export type IngestMode = 'bulk' | 'regular';

export const INGEST_MODES: readonly IngestMode[] = ['bulk', 'regular'];

/**
 * Ingestion run settings
 * Compression stays a free-form name: an unknown value degrades to the default
 * when the writer options are built instead of failing validation.
 */
export class IngestConfig {
  @IsString()
  @Matches(/^[^\s:]+(:\d+)?$/, { message: 'endpoint must be host or host:port' })
  endpoint!: string;

  @IsString()
  @IsNotEmpty()
  dbname!: string;

  @IsString()
  @IsNotEmpty()
  tableName!: string;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  tableRowCount!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  batchSize!: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  parallelism!: number;

  @IsString()
  compression!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  timeoutMs!: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  flushInterval!: number;

  @IsIn(INGEST_MODES)
  mode!: IngestMode;

  // Type-mismatch behaviour of generated rows; unset follows NODE_ENV
  @IsOptional()
  @IsIn(['strict', 'lenient'])
  accessPolicy?: string;
}

export function loadIngestConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const rawConfig = {
    endpoint: env.INGEST_ENDPOINT || 'localhost:4003',
    dbname: env.DATABASE_NAME || 'public',
    tableName: env.TABLE_NAME || 'benchmark_logs',
    tableRowCount: env.TABLE_ROW_COUNT || '2000000',
    batchSize: env.BATCH_SIZE || '100000',
    parallelism: env.PARALLELISM || '8',
    compression: env.COMPRESSION || 'lz4',
    timeoutMs: env.WRITE_TIMEOUT_MS || '60000',
    flushInterval: env.FLUSH_INTERVAL || '10',
    mode: (env.INGEST_MODE || 'bulk').toLowerCase(),
    accessPolicy: env.ACCESS_POLICY?.toLowerCase(),
  };

  return validateConfig(rawConfig, 'ingest', IngestConfig);
}

/**
 * Ingest configuration factory
 * Loads run settings from environment variables with defaults
 */
export default registerAs('ingest', (): IngestConfig => loadIngestConfig());
