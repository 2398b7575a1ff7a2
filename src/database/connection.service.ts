import { Inject, Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { DatabaseConfig } from '../config/database.config';
import { errorMessage } from '../common/errors';
import { IngestClient, parseEndpoint, type PoolFactory } from './client';

// Injection token for swapping the pg pool out, e.g. in tests
export const POOL_FACTORY = Symbol('POOL_FACTORY');

/**
 * Ingest client management service
 * Creates clients for an endpoint and closes their pools on shutdown
 */
@Injectable()
export class IngestClientService implements OnModuleDestroy {
  private readonly logger = new Logger(IngestClientService.name);
  private readonly clients = new Set<IngestClient>();

  constructor(
    private readonly configService: ConfigService,
    @Optional() @Inject(POOL_FACTORY) private readonly poolFactory?: PoolFactory,
  ) {}

  /**
   * Create a client for host:port; connections open lazily
   */
  createClient(endpoint: string): IngestClient {
    const config = this.configService.get<DatabaseConfig>('database');

    if (!config) {
      throw new Error('Database configuration not found');
    }

    const client = new IngestClient(
      parseEndpoint(endpoint),
      { user: config.user, password: config.password },
      this.poolFactory,
    );
    this.clients.add(client);
    this.logger.log(`Created ingest client for ${client.endpoint.host}:${client.endpoint.port}`);
    return client;
  }

  /**
   * Close a client's pools and stop tracking it
   */
  async closeClient(client: IngestClient): Promise<void> {
    this.clients.delete(client);
    await client.close();
  }

  /**
   * Cleanup all clients on module destroy
   */
  async onModuleDestroy() {
    this.logger.log(`Closing ${this.clients.size} ingest clients`);

    const closing = Array.from(this.clients).map(client =>
      this.closeClient(client).catch((error: unknown) =>
        this.logger.error(`Error closing client during shutdown: ${errorMessage(error)}`),
      ),
    );

    await Promise.all(closing);
  }
}
