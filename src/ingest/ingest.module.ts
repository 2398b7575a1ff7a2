import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { BulkIngestService } from './bulk-ingest.service';
import { RegularIngestService } from './regular-ingest.service';

/**
 * Ingest module wires the runners to the database transport
 */
@Module({
  imports: [DatabaseModule],
  providers: [BulkIngestService, RegularIngestService],
  exports: [BulkIngestService, RegularIngestService],
})
export class IngestModule {}
