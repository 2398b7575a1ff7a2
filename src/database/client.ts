import { Logger } from '@nestjs/common';
import { Pool, type PoolConfig } from 'pg';
import { errorMessage } from '../common/errors';
import type { SqlExecutor } from './types';

// Component-specific connection settings
const CONNECTION_TIMEOUT_MS = 10000; // Allow sufficient time for network latency
const KEEP_ALIVE_DELAY_MS = 10000; // Prevent connection drops during long runs

export const DEFAULT_INGEST_PORT = 4003;

export interface Endpoint {
  host: string;
  port: number;
}

export interface Credentials {
  user: string;
  password: string;
}

export interface PoolOptions {
  max: number;
  queryTimeoutMs: number;
}

export type PoolFactory = (config: PoolConfig) => SqlExecutor;

/**
 * Parse a host:port endpoint; the port defaults to the ingest port
 */
export function parseEndpoint(endpoint: string): Endpoint {
  const trimmed = endpoint.trim();
  const separator = trimmed.lastIndexOf(':');
  const host = separator >= 0 ? trimmed.slice(0, separator) : trimmed;
  const portText = separator >= 0 ? trimmed.slice(separator + 1) : String(DEFAULT_INGEST_PORT);
  const port = Number(portText);

  if (!host) {
    throw new Error(`Invalid endpoint '${endpoint}': missing host`);
  }
  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw new Error(`Invalid endpoint '${endpoint}': bad port '${portText}'`);
  }
  return { host, port };
}

const createPgPool: PoolFactory = config => {
  const pool = new Pool(config);
  const logger = new Logger(IngestClient.name);
  // Idle clients report socket errors on the pool; unhandled they would crash the process
  pool.on('error', error => logger.error(`Idle connection error: ${error.message}`));
  return {
    query: (text, values) => pool.query(text, values),
    end: () => pool.end(),
  };
};

/**
 * Connection factory for one ingest endpoint
 * Pools are opened lazily, one per writer, and all of them are closed together
 */
export class IngestClient {
  private readonly logger = new Logger(IngestClient.name);
  private readonly pools = new Set<SqlExecutor>();

  constructor(
    readonly endpoint: Endpoint,
    private readonly credentials: Credentials,
    private readonly poolFactory: PoolFactory = createPgPool,
  ) {}

  createPool(database: string, options: PoolOptions): SqlExecutor {
    this.logger.debug(
      `Opening pool to ${this.endpoint.host}:${this.endpoint.port}/${database} (max ${options.max})`,
    );
    const pool = this.poolFactory({
      host: this.endpoint.host,
      port: this.endpoint.port,
      database,
      user: this.credentials.user,
      password: this.credentials.password,
      max: options.max,
      connectionTimeoutMillis: CONNECTION_TIMEOUT_MS,
      query_timeout: options.queryTimeoutMs,
      keepAlive: true,
      keepAliveInitialDelayMillis: KEEP_ALIVE_DELAY_MS,
    });
    this.pools.add(pool);
    return pool;
  }

  /**
   * Close one pool and stop tracking it
   */
  async release(pool: SqlExecutor): Promise<void> {
    if (!this.pools.delete(pool)) {
      return;
    }
    await pool.end();
  }

  /**
   * Close every pool; the first failure is rethrown after all have been attempted
   */
  async close(): Promise<void> {
    const pools = Array.from(this.pools);
    this.pools.clear();
    const results = await Promise.allSettled(pools.map(pool => pool.end()));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw new Error(`Failed to close connection pool: ${errorMessage(failure.reason)}`, { cause: failure.reason });
    }
  }
}
