import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import databaseConfig from './config/database.config';
import ingestConfig from './config/ingest.config';
import { DatabaseModule } from './database/database.module';
import { IngestModule } from './ingest/ingest.module';

/**
 * Root application module for the bulk ingester
 * Module order matters: Config → Database → Ingest
 */
@Module({
  imports: [
    // Configuration - loaded first, available globally
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [ingestConfig, databaseConfig],
    }),

    DatabaseModule,    // Ingest transport
    IngestModule,      // Bulk and regular runners
  ],
})
export class AppModule {}
