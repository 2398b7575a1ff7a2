#!/usr/bin/env node
/**
 * Bulk ingester entry point
 * Generates the synthetic log table and writes it with the configured mode
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { getLogLevels } from './common/logging.utils';
import type { IngestConfig } from './config/ingest.config';
import { BulkIngestService } from './ingest/bulk-ingest.service';
import { describeConfiguration, showIngestResults } from './ingest/ingest-result';
import { RegularIngestService } from './ingest/regular-ingest.service';
import { LogTableDataProvider } from './provider/log-table.provider';
import { accessPolicyFromName } from './table/access-policy';

async function bootstrap() {
  const logger = new Logger('BulkIngest');

  // Handle uncaught exceptions and unhandled rejections
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection, reason:', reason);
    process.exit(1);
  });

  try {
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: getLogLevels(process.env.LOG_LEVEL),
    });

    const config = app.get(ConfigService).get<IngestConfig>('ingest');
    if (!config) {
      throw new Error('Ingest configuration not found');
    }
    describeConfiguration(config).forEach(line => logger.log(line));

    const provider = new LogTableDataProvider(config.tableName, {
      rowCount: config.tableRowCount,
      accessPolicy: accessPolicyFromName(config.accessPolicy),
    });
    const providerName = LogTableDataProvider.name;
    const result =
      config.mode === 'bulk'
        ? await app.get(BulkIngestService).run(provider, providerName)
        : await app.get(RegularIngestService).run(provider, providerName);

    [...result.display(), ...showIngestResults([result])].forEach(line => logger.log(line));

    await app.close();
    process.exitCode = result.succeeded ? 0 : 1;
  } catch (error) {
    logger.error('Failed to run ingestion');
    console.error(error); // Log full error to console before exit
    process.exit(1);
  }
}

void bootstrap();
