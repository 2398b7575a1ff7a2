import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { IngestConfig } from '../config/ingest.config';
import { IngestClientService, POOL_FACTORY } from '../database/connection.service';
import type { TableDataProvider } from '../provider/data-provider';
import { LogTableDataProvider } from '../provider/log-table.provider';
import { BulkIngestService } from './bulk-ingest.service';

type FakePool = {
  query: jest.Mock<Promise<{ rowCount: number | null }>, [string, unknown[]]>;
  end: jest.Mock<Promise<void>, []>;
};

const COLUMN_COUNT = 22;

describe('BulkIngestService', () => {
  let service: BulkIngestService;
  let pools: FakePool[];
  let failInsert: number | undefined;
  let ingestConfig: IngestConfig | undefined;

  function provider(rowCount: number): LogTableDataProvider {
    return new LogTableDataProvider('logs', { rowCount, baseTime: 1_000_000, random: () => 0.5 });
  }

  beforeEach(async () => {
    pools = [];
    failInsert = undefined;
    ingestConfig = Object.assign(new IngestConfig(), {
      endpoint: 'localhost:4003',
      dbname: 'public',
      tableName: 'logs',
      tableRowCount: 250,
      batchSize: 100,
      parallelism: 2,
      compression: 'none',
      timeoutMs: 1000,
      flushInterval: 10,
      mode: 'bulk' as const,
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BulkIngestService,
        IngestClientService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) =>
              key === 'ingest' ? ingestConfig : { user: 'test', password: 'test-secret' },
            ),
          },
        },
        {
          provide: POOL_FACTORY,
          useValue: () => {
            let inserts = 0;
            const pool: FakePool = {
              query: jest.fn<Promise<{ rowCount: number | null }>, [string, unknown[]]>(async (text, values) => {
                if (text.startsWith('INSERT') && ++inserts === failInsert) {
                  throw new Error('disk full');
                }
                return { rowCount: values.length / COLUMN_COUNT };
              }),
              end: jest.fn<Promise<void>, []>(async () => undefined),
            };
            pools.push(pool);
            return pool;
          },
        },
      ],
    }).compile();

    service = module.get<BulkIngestService>(BulkIngestService);
  });

  it('should stream every row in batches and succeed', async () => {
    const result = await service.run(provider(250), 'LogTableDataProvider');

    expect(result.succeeded).toBe(true);
    expect(result.providerName).toBe('LogTableDataProvider');
    expect(result.tableName).toBe('logs');
    expect(result.totalRows).toBe(250);

    expect(pools).toHaveLength(1);
    const calls = pools[0].query.mock.calls;
    expect(calls[0]).toEqual(['SELECT 1', []]);
    expect(calls.slice(1).map(([, values]) => values.length)).toEqual([2200, 2200, 1100]);
    expect(calls[1][0].startsWith('INSERT INTO "logs" ("ts", "log_uid", ')).toBe(true);
    expect(pools[0].end).toHaveBeenCalledTimes(1);
  });

  it('should report a failed write and still release the pool', async () => {
    failInsert = 2;

    const result = await service.run(provider(250), 'LogTableDataProvider');

    expect(result.succeeded).toBe(false);
    expect(result.errorMessage).toContain('Write request 2 failed: disk full');
    expect(pools[0].end).toHaveBeenCalledTimes(1);
  });

  it('should report a failed handshake', async () => {
    const module = await Test.createTestingModule({
      providers: [
        BulkIngestService,
        IngestClientService,
        {
          provide: ConfigService,
          useValue: {
            get: (key: string) => (key === 'ingest' ? ingestConfig : { user: 'test', password: 'test-secret' }),
          },
        },
        {
          provide: POOL_FACTORY,
          useValue: () => ({
            query: jest.fn(async () => {
              throw new Error('ECONNREFUSED');
            }),
            end: jest.fn<Promise<void>, []>(async () => undefined),
          }),
        },
      ],
    }).compile();

    const result = await module.get(BulkIngestService).run(provider(10), 'LogTableDataProvider');

    expect(result.errorMessage).toBe('Failed to create bulk writer: Handshake with public failed: ECONNREFUSED');
  });

  it('should report a malformed endpoint as a client failure', async () => {
    ingestConfig = Object.assign(new IngestConfig(), ingestConfig, { endpoint: 'db:port' });

    const result = await service.run(provider(10), 'LogTableDataProvider');

    expect(result.errorMessage).toBe("Failed to create client: Invalid endpoint 'db:port': bad port 'port'");
    expect(pools).toHaveLength(0);
  });

  it('should report a provider that cannot initialize', async () => {
    const broken: TableDataProvider = {
      init: jest.fn(async () => {
        throw new Error('no data');
      }),
      rowCount: () => 1,
      close: jest.fn(async () => undefined),
      tableSchema: () => LogTableDataProvider.buildSchema('logs'),
      rows: jest.fn(),
    };

    const result = await service.run(broken, 'Broken');

    expect(result.errorMessage).toBe('Failed to initialize provider: no data');
    expect(broken.rows).not.toHaveBeenCalled();
  });

  it('should fail without ingest configuration', async () => {
    ingestConfig = undefined;

    const result = await service.run(provider(10), 'LogTableDataProvider');

    expect(result.errorMessage).toBe('Ingest configuration not found');
  });
});
