import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../common/errors';
import type { IngestConfig } from '../config/ingest.config';
import type { IngestClient } from '../database/client';
import { IngestClientService } from '../database/connection.service';
import { Database } from '../database/database';
import type { WireRow } from '../database/wire';
import type { ApiDataProvider } from '../provider/data-provider';
import { IngestResult } from './ingest-result';

/**
 * Runs one provider through the row-at-a-time insert path
 * Each batch is awaited before the next one is pulled.
 */
@Injectable()
export class RegularIngestService {
  private readonly logger = new Logger(RegularIngestService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly clientService: IngestClientService,
  ) {}

  async run(provider: ApiDataProvider, providerName: string): Promise<IngestResult> {
    const tableName = provider.tableName();
    const result = new IngestResult(providerName, tableName, provider.rowCount());
    this.logger.log(`Starting regular ingest of ${providerName} into ${tableName}`);

    const config = this.configService.get<IngestConfig>('ingest');
    if (!config) {
      return result.error('Ingest configuration not found');
    }

    try {
      await provider.init();
    } catch (error) {
      return result.error(`Failed to initialize provider: ${errorMessage(error)}`);
    }

    let client: IngestClient;
    try {
      client = this.clientService.createClient(config.endpoint);
    } catch (error) {
      return result.error(`Failed to create client: ${errorMessage(error)}`);
    }

    const database = new Database(client, config.dbname, config.timeoutMs);
    try {
      const schema = provider.apiSchema();
      const rows = provider.apiRows();
      const started = Date.now();
      const latencies: number[] = [];
      let rowsWritten = 0;

      for (;;) {
        const { batch, exhausted } = takeBatch(rows, config.batchSize);
        if (batch.length === 0) {
          break;
        }

        const batchNumber = latencies.length + 1;
        const requestStarted = performance.now();
        try {
          await database.insert({ inserts: [{ tableName, rows: { schema, rows: batch } }] });
        } catch (error) {
          await provider.close().catch((closeError: unknown) =>
            this.logger.warn(`Failed to close provider after error: ${errorMessage(closeError)}`),
          );
          return result.error(`Failed to insert batch ${batchNumber}: ${errorMessage(error)}`);
        }
        const latency = performance.now() - requestStarted;
        latencies.push(latency);
        rowsWritten += batch.length;
        this.logger.debug(`Batch ${batchNumber}: ${batch.length} rows in ${latency.toFixed(1)}ms`);

        if (exhausted) {
          break;
        }
      }

      try {
        await provider.close();
      } catch (error) {
        return result.error(`Failed to close provider: ${errorMessage(error)}`);
      }

      const durationMs = Date.now() - started;
      if (latencies.length > 0) {
        const average = latencies.reduce((total, latency) => total + latency, 0) / latencies.length;
        this.logger.log(
          `${providerName}: ${rowsWritten} rows in ${latencies.length} batches, average latency ${average.toFixed(1)}ms`,
        );
      }
      return result.success(durationMs);
    } finally {
      await database.close().catch((error: unknown) =>
        this.logger.warn(`Failed to release database pool: ${errorMessage(error)}`),
      );
      await this.clientService.closeClient(client).catch((error: unknown) =>
        this.logger.warn(`Failed to close client: ${errorMessage(error)}`),
      );
    }
  }
}

function takeBatch(rows: Iterator<WireRow>, batchSize: number): { batch: WireRow[]; exhausted: boolean } {
  const batch: WireRow[] = [];
  while (batch.length < batchSize) {
    const next = rows.next();
    if (next.done) {
      return { batch, exhausted: true };
    }
    batch.push(next.value);
  }
  return { batch, exhausted: false };
}
