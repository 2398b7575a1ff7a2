import { Logger } from '@nestjs/common';
import { Row } from '../table/row';
import { TableSchema } from '../table/schema';
import { ColumnDataType } from '../table/types';
import { Value } from '../table/value';
import type { TypeMismatchPolicy } from '../table/access-policy';
import {
  i64Value,
  stringValue,
  timestampMillisecondValue,
  toColumnSchema,
  type ColumnSchema,
  type WireRow,
} from '../database/wire';
import type { ApiDataProvider, TableDataProvider } from './data-provider';
import { LogTextHelper, nameSuffix, type LogEntry, type RandomSource } from './log-text';

const MAX_POOL_SIZE = 10000;
const LOG_MESSAGE_LENGTH = 1500;
const LOG_SOURCE = 'application';
const LOG_VERSION = 'v1.0.0';

export interface LogTableOptions {
  rowCount: number;
  baseTime?: number;      // Epoch millis; defaults to the time of init()
  random?: RandomSource;  // Defaults to Math.random
  accessPolicy?: TypeMismatchPolicy;
}

interface ValuePools {
  size: number;
  hostIds: string[];
  hostNames: string[];
  serviceIds: string[];
  serviceNames: string[];
  containerIds: string[];
  containerNames: string[];
  podIds: string[];
  podNames: string[];
  clusterIds: string[];
  clusterNames: string[];
  traceIds: string[];
  spanIds: string[];
  userIds: string[];
  sessionIds: string[];
  requestIds: string[];
  logUids: string[];
  logEntries: LogEntry[];
}

/**
 * One generated log line, before it is shaped as a Row or a WireRow
 */
interface LogRecord {
  timestamp: bigint;
  strings: string[];        // log_uid through request_id, in schema order
  responseTimeMs: bigint;
}

/**
 * Synthetic application log table: a millisecond time index and 21 fields
 * Values come from pools generated once in init(), so producing a row is a
 * handful of array lookups.
 *
 * rows() and apiRows() share one cursor. rows() advances it directly;
 * apiRows() keeps its own position and swaps it in around each pull, so
 * the two can be driven alternately but never concurrently.
 */
export class LogTableDataProvider implements TableDataProvider, ApiDataProvider {
  private readonly logger = new Logger(LogTableDataProvider.name);
  private readonly schema: TableSchema;
  private readonly count: number;
  private cursor = 0;
  private baseTime = 0;
  private pools?: ValuePools;

  constructor(private readonly name: string, private readonly options: LogTableOptions) {
    if (!Number.isInteger(options.rowCount) || options.rowCount < 0) {
      throw new Error(`Row count must be a non-negative integer, got ${options.rowCount}`);
    }
    this.count = options.rowCount;
    this.schema = LogTableDataProvider.buildSchema(name);
  }

  static buildSchema(name: string): TableSchema {
    return TableSchema.builder(name)
      .addTimestamp('ts', ColumnDataType.TimestampMillisecond)
      .addField('log_uid', ColumnDataType.String, false)
      .addField('log_message', ColumnDataType.String, false)
      .addField('log_level', ColumnDataType.String, false)
      .addField('host_id', ColumnDataType.String, false)
      .addField('host_name', ColumnDataType.String, false)
      .addField('service_id', ColumnDataType.String, false)
      .addField('service_name', ColumnDataType.String, false)
      .addField('container_id', ColumnDataType.String, false)
      .addField('container_name', ColumnDataType.String, false)
      .addField('pod_id', ColumnDataType.String, false)
      .addField('pod_name', ColumnDataType.String, false)
      .addField('cluster_id', ColumnDataType.String, false)
      .addField('cluster_name', ColumnDataType.String, false)
      .addField('trace_id', ColumnDataType.String, false)
      .addField('span_id', ColumnDataType.String, false)
      .addField('user_id', ColumnDataType.String, false)
      .addField('session_id', ColumnDataType.String, false)
      .addField('request_id', ColumnDataType.String, false)
      .addField('response_time_ms', ColumnDataType.Int64, false)
      .addField('log_source', ColumnDataType.String, false)
      .addField('version', ColumnDataType.String, false)
      .build();
  }

  async init(): Promise<void> {
    const poolSize = Math.min(MAX_POOL_SIZE, this.count * 2);
    this.baseTime = this.options.baseTime ?? Date.now();

    this.logger.log(`Pre-generating ${poolSize} values for ${this.name}`);
    const started = Date.now();
    this.pools = this.generatePools(poolSize);
    this.cursor = 0;
    this.logger.log(`Pre-generation completed in ${Date.now() - started}ms`);
  }

  rowCount(): number {
    return this.count;
  }

  async close(): Promise<void> {
    this.pools = undefined;
  }

  /**
   * Start a fresh pass of rows()
   */
  resetCursor(): void {
    this.cursor = 0;
  }

  tableSchema(): TableSchema {
    return this.schema;
  }

  tableName(): string {
    return this.name;
  }

  apiSchema(): ColumnSchema[] {
    return this.schema.columns.map(toColumnSchema);
  }

  *rows(): Generator<Row, void, undefined> {
    for (;;) {
      const record = this.nextRecord();
      if (!record) {
        return;
      }
      yield Row.fromValues(
        [
          Value.timestampMillisecond(record.timestamp),
          ...record.strings.map(Value.string),
          Value.int64(record.responseTimeMs),
          Value.string(LOG_SOURCE),
          Value.string(LOG_VERSION),
        ],
        this.options.accessPolicy,
      );
    }
  }

  *apiRows(): Generator<WireRow, void, undefined> {
    let position = 0;
    for (;;) {
      const saved = this.cursor;
      this.cursor = position;
      const record = this.nextRecord();
      position = this.cursor;
      this.cursor = saved;

      if (!record) {
        return;
      }
      yield {
        values: [
          timestampMillisecondValue(record.timestamp),
          ...record.strings.map(stringValue),
          i64Value(record.responseTimeMs),
          stringValue(LOG_SOURCE),
          stringValue(LOG_VERSION),
        ],
      };
    }
  }

  private nextRecord(): LogRecord | undefined {
    if (this.cursor >= this.count) {
      return undefined;
    }
    const pools = this.pools;
    if (!pools) {
      throw new Error(`${LogTableDataProvider.name} for ${this.name} is not initialized`);
    }

    const row = this.cursor;
    const base = row % pools.size;
    const offset = (row * 7 + 13) % pools.size;
    const timestamp = this.baseTime + row + (offset % 2000) - 1000;
    const [level, message] = pools.logEntries[row % pools.logEntries.length];

    const idx1 = base;
    const idx2 = (base + 1) % pools.size;
    const idx3 = (base + 2) % pools.size;
    const idx4 = (base + 3) % pools.size;
    const idx5 = (base + 4) % pools.size;

    this.cursor++;

    return {
      timestamp: BigInt(timestamp),
      strings: [
        pools.logUids[base],
        message,
        level,
        pools.hostIds[idx1],
        pools.hostNames[idx1],
        pools.serviceIds[idx2],
        pools.serviceNames[idx2],
        pools.containerIds[idx3],
        pools.containerNames[idx3],
        pools.podIds[idx4],
        pools.podNames[idx4],
        pools.clusterIds[idx5],
        pools.clusterNames[idx5],
        pools.traceIds[idx1],
        pools.spanIds[idx2],
        pools.userIds[idx3],
        pools.sessionIds[idx4],
        pools.requestIds[idx5],
      ],
      responseTimeMs: BigInt((base % 999) + 1),
    };
  }

  private generatePools(size: number): ValuePools {
    const text = new LogTextHelper(this.options.random);
    const fill = <T>(generate: (i: number) => T): T[] => Array.from({ length: size }, (_, i) => generate(i));
    const id = (prefix: string) => (i: number) => `${prefix}-${text.randomInt(100000) + i}`;
    const token = (prefix: string) => () => `${prefix}_${text.randomInt(Number.MAX_SAFE_INTEGER)}`;

    return {
      size,
      hostIds: fill(id('host')),
      hostNames: fill(i => nameSuffix(i)),
      serviceIds: fill(id('service')),
      serviceNames: fill(i => nameSuffix(i + 1000)),
      containerIds: fill(id('container')),
      containerNames: fill(i => nameSuffix(i + 2000)),
      podIds: fill(id('pod')),
      podNames: fill(i => nameSuffix(i + 3000)),
      clusterIds: fill(id('cluster')),
      clusterNames: fill(i => nameSuffix(i + 4000)),
      traceIds: fill(token('trace')),
      spanIds: fill(token('span')),
      userIds: fill(() => `user_${text.randomInt(9999) + 1}`),
      sessionIds: fill(token('session')),
      requestIds: fill(token('req')),
      logUids: fill(i => `log_${this.baseTime + i}_${i}`),
      logEntries: fill(() => text.generateTextWithLen(LOG_MESSAGE_LENGTH)),
    };
  }
}
