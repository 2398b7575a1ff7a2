import { Module } from '@nestjs/common';
import { IngestClientService } from './connection.service';

/**
 * Database module provides the ingest transport
 * Exports IngestClientService for use by the ingest runners
 */
@Module({
  providers: [
    IngestClientService
  ],
  exports: [
    IngestClientService
  ],
})
export class DatabaseModule {}
