import { IngestConfig } from '../config/ingest.config';
import { describeConfiguration, IngestResult, showIngestResults } from './ingest-result';

describe('IngestResult', () => {
  it('should derive throughput on success', () => {
    const result = new IngestResult('LogTableDataProvider', 'logs', 250).success(2000);

    expect(result.succeeded).toBe(true);
    expect(result.rowsPerSecond).toBe(125);
    expect(result.display()).toEqual([
      '=== LogTableDataProvider Ingest Result ===',
      'Table: logs',
      'SUCCESS',
      'Total rows: 250',
      'Duration: 2000ms',
      'Throughput: 125 rows/sec',
    ]);
  });

  it('should report zero throughput for an instant run', () => {
    expect(new IngestResult('p', 't', 10).success(0).rowsPerSecond).toBe(0);
  });

  it('should carry the error message on failure', () => {
    const result = new IngestResult('p', 'logs', 250).error('Failed to create client: refused');

    expect(result.succeeded).toBe(false);
    expect(result.display()).toEqual([
      '=== p Ingest Result ===',
      'Table: logs',
      'FAILED',
      'Error: Failed to create client: refused',
    ]);
  });
});

describe('showIngestResults', () => {
  it('should print nothing without results', () => {
    expect(showIngestResults([])).toEqual([]);
  });

  it('should say when no run succeeded', () => {
    expect(showIngestResults([new IngestResult('p', 't', 1).error('x')])).toEqual([
      '=== Ingest Summary ===',
      'No successful runs to display',
    ]);
  });

  it('should tabulate runs and compare them to the fastest', () => {
    const fast = new IngestResult('bulk', 't', 1000).success(1000);
    const slow = new IngestResult('regular', 't', 1000).success(4000);
    const failed = new IngestResult('broken', 't', 1000).error('boom');

    const lines = showIngestResults([fast, slow, failed]);

    expect(lines[1]).toBe('Fastest provider: bulk (1000 rows/sec)');
    expect(lines[3]).toBe(
      'Provider                          Rows Duration(ms)      Throughput     Status',
    );
    expect(lines[4]).toBe('-'.repeat(74));
    expect(lines[5]).toBe('bulk                              1000         1000        1000 r/s    SUCCESS');
    expect(lines[7]).toBe('broken                            1000          N/A             N/A     FAILED');
    expect(lines.slice(-3)).toEqual(['Relative Performance:', '[FASTEST] bulk: Baseline', 'regular: 25.0% of fastest']);
  });
});

describe('describeConfiguration', () => {
  it('should list the effective settings and host', () => {
    const config = Object.assign(new IngestConfig(), {
      endpoint: 'localhost:4003',
      dbname: 'public',
      tableName: 'benchmark_logs',
      tableRowCount: 2000000,
      batchSize: 100000,
      parallelism: 8,
      compression: 'lz4',
      timeoutMs: 60000,
      flushInterval: 10,
      mode: 'bulk' as const,
    });

    expect(describeConfiguration(config, { hostname: 'bench-1', cpuCount: 16 })).toEqual([
      '=== Bulk Ingest Configuration ===',
      'Endpoint: localhost:4003',
      'Database: public',
      'Table: benchmark_logs',
      'Max rows per provider: 2000000',
      'Batch size: 100000',
      'Parallelism: 8',
      'Compression: lz4',
      'Write timeout: 60000ms',
      'Hostname: bench-1',
      'CPU cores: 16',
    ]);
  });
});
