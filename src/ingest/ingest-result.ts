import * as os from 'node:os';
import type { IngestConfig } from '../config/ingest.config';

/**
 * Result of one ingestion run, as reported to the operator
 */
export class IngestResult {
  succeeded = false;
  durationMs = 0;
  rowsPerSecond = 0;
  errorMessage?: string;

  constructor(
    readonly providerName: string,
    readonly tableName: string,
    readonly totalRows: number,
  ) {}

  success(durationMs: number): this {
    this.durationMs = durationMs;
    this.rowsPerSecond = durationMs > 0 ? this.totalRows / (durationMs / 1000) : 0;
    this.succeeded = true;
    this.errorMessage = undefined;
    return this;
  }

  error(message: string): this {
    this.errorMessage = message;
    this.succeeded = false;
    return this;
  }

  display(): string[] {
    const lines = [`=== ${this.providerName} Ingest Result ===`, `Table: ${this.tableName}`];
    if (this.succeeded) {
      lines.push(
        'SUCCESS',
        `Total rows: ${this.totalRows}`,
        `Duration: ${this.durationMs}ms`,
        `Throughput: ${Math.round(this.rowsPerSecond)} rows/sec`,
      );
    } else {
      lines.push('FAILED');
      if (this.errorMessage) {
        lines.push(`Error: ${this.errorMessage}`);
      }
    }
    return lines;
  }
}

/**
 * Summary table across runs, fastest first in the header
 */
export function showIngestResults(results: readonly IngestResult[]): string[] {
  if (results.length === 0) {
    return [];
  }

  const lines = ['=== Ingest Summary ==='];
  const successful = results.filter(result => result.succeeded);
  if (successful.length === 0) {
    lines.push('No successful runs to display');
    return lines;
  }

  const fastest = successful.reduce((best, result) => (result.rowsPerSecond > best.rowsPerSecond ? result : best));
  lines.push(`Fastest provider: ${fastest.providerName} (${Math.round(fastest.rowsPerSecond)} rows/sec)`, '');
  lines.push(
    `${'Provider'.padEnd(25)} ${'Rows'.padStart(12)} ${'Duration(ms)'.padStart(12)} ${'Throughput'.padStart(15)} ${'Status'.padStart(10)}`,
    '-'.repeat(74),
  );

  for (const result of results) {
    const duration = result.succeeded ? String(result.durationMs) : 'N/A';
    const throughput = result.succeeded ? `${Math.round(result.rowsPerSecond)} r/s` : 'N/A';
    lines.push(
      `${result.providerName.padEnd(25)} ${String(result.totalRows).padStart(12)} ${duration.padStart(12)} ${throughput.padStart(15)} ${(result.succeeded ? 'SUCCESS' : 'FAILED').padStart(10)}`,
    );
  }

  if (successful.length > 1) {
    lines.push('', 'Relative Performance:');
    for (const result of successful) {
      if (result === fastest) {
        lines.push(`[FASTEST] ${result.providerName}: Baseline`);
      } else {
        const relative = (result.rowsPerSecond / fastest.rowsPerSecond) * 100;
        lines.push(`${result.providerName}: ${relative.toFixed(1)}% of fastest`);
      }
    }
  }

  return lines;
}

export interface HostInfo {
  hostname: string;
  cpuCount: number;
}

export function currentHost(): HostInfo {
  return { hostname: os.hostname(), cpuCount: os.cpus().length };
}

/**
 * Effective configuration of a run, with the machine it runs on
 */
export function describeConfiguration(config: IngestConfig, host: HostInfo = currentHost()): string[] {
  return [
    `=== ${config.mode === 'bulk' ? 'Bulk' : 'Regular'} Ingest Configuration ===`,
    `Endpoint: ${config.endpoint}`,
    `Database: ${config.dbname}`,
    `Table: ${config.tableName}`,
    `Max rows per provider: ${config.tableRowCount}`,
    `Batch size: ${config.batchSize}`,
    `Parallelism: ${config.parallelism}`,
    `Compression: ${config.compression}`,
    `Write timeout: ${config.timeoutMs}ms`,
    `Hostname: ${host.hostname}`,
    `CPU cores: ${host.cpuCount}`,
  ];
}
