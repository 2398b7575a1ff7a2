import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../common/errors';
import type { IngestConfig } from '../config/ingest.config';
import { BulkInserter } from '../database/bulk-writer';
import type { IngestClient } from '../database/client';
import { parseCompression } from '../database/compression';
import { IngestClientService } from '../database/connection.service';
import type { BulkWriter, BulkWriteOptions } from '../database/types';
import type { TableDataProvider } from '../provider/data-provider';
import { IngestState } from './ingest-state';
import { IngestResult } from './ingest-result';
import { StreamingSubmitter } from './streaming-submitter';

/**
 * Runs one provider through the streaming bulk writer
 * Failures never escape run(); they come back as a failed IngestResult.
 */
@Injectable()
export class BulkIngestService {
  private readonly logger = new Logger(BulkIngestService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly clientService: IngestClientService,
  ) {}

  async run(provider: TableDataProvider, providerName: string): Promise<IngestResult> {
    const schema = provider.tableSchema();
    const result = new IngestResult(providerName, schema.name, provider.rowCount());
    this.logger.log(`Starting bulk ingest of ${providerName} into ${schema.name}`);

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

    try {
      let writer: BulkWriter;
      try {
        writer = await new BulkInserter(client, config.dbname).createBulkStreamWriter(schema, this.writeOptions(config));
      } catch (error) {
        return result.error(`Failed to create bulk writer: ${errorMessage(error)}`);
      }

      try {
        const report = await new StreamingSubmitter(writer, provider, {
          batchSize: config.batchSize,
          flushInterval: config.flushInterval,
        }).run();

        if (report.state !== IngestState.Finished) {
          await provider.close().catch((error: unknown) =>
            this.logger.warn(`Failed to close provider after error: ${errorMessage(error)}`),
          );
          return result.error(report.error?.message ?? `Ingest ended in state ${report.state}`);
        }

        this.logger.log(
          `${providerName}: ${report.rowsWritten} rows in ${report.batchCount} batches, ` +
            `${report.responses.length} responses, ${report.affectedRows} affected rows`,
        );
        return result.success(report.durationMs);
      } finally {
        await writer.close().catch((error: unknown) =>
          this.logger.warn(`Failed to close bulk writer: ${errorMessage(error)}`),
        );
      }
    } finally {
      await this.clientService.closeClient(client).catch((error: unknown) =>
        this.logger.warn(`Failed to close client: ${errorMessage(error)}`),
      );
    }
  }

  private writeOptions(config: IngestConfig): BulkWriteOptions {
    return {
      compression: parseCompression(config.compression),
      parallelism: config.parallelism,
      timeoutMs: config.timeoutMs,
    };
  }
}
