import { Logger } from '@nestjs/common';
import { validateSchema, type TableSchema } from '../table/schema';
import { errorMessage } from '../common/errors';
import type { IngestClient } from './client';
import { RowsBuffer } from './rows-buffer';
import { buildInsertStatements, type SqlStatement } from './sql';
import {
  CompressionType,
  DEFAULT_BULK_WRITE_OPTIONS,
  type BulkWriteOptions,
  type BulkWriter,
  type SqlExecutor,
  type WriteResponse,
  WriteRequestError,
} from './types';

/**
 * Streams row batches to one table with a bounded number of writes in flight
 * Acknowledgements may arrive in any order; each carries the request id
 * returned by writeRowsAsync. The first failed write poisons the writer.
 */
export class BulkStreamWriter implements BulkWriter {
  private readonly logger = new Logger(BulkStreamWriter.name);
  private readonly columnNames: string[];
  private readonly inflight = new Map<number, Promise<void>>();
  private completed: WriteResponse[] = [];
  private failure?: Error;
  private nextRequestId = 1;
  private finished = false;
  private closed = false;

  constructor(
    private readonly executor: SqlExecutor,
    readonly schema: TableSchema,
    private readonly options: BulkWriteOptions,
    private readonly release: () => Promise<void> = () => executor.end(),
  ) {
    this.columnNames = schema.columns.map(column => column.name);
  }

  get pendingCount(): number {
    return this.inflight.size;
  }

  allocRowsBuffer(rowCapacity: number, avgValueSizeHint: number): RowsBuffer {
    this.assertWritable();
    return new RowsBuffer(this.schema, rowCapacity, avgValueSizeHint);
  }

  async writeRowsAsync(buffer: RowsBuffer): Promise<number> {
    this.assertWritable();
    if (buffer.schema !== this.schema) {
      throw new Error(`Rows buffer belongs to table ${buffer.schema.name}, not ${this.schema.name}`);
    }

    await this.waitForSlot();

    const requestId = this.nextRequestId++;
    const statements = buildInsertStatements(this.schema.name, this.columnNames, buffer.rows());
    this.logger.debug(
      `Request ${requestId}: ${buffer.length} rows, ${statements.length} statements, ~${buffer.estimatedBytes} bytes`,
    );

    const settled = this.execute(statements).then(
      affectedRows => {
        this.inflight.delete(requestId);
        this.completed.push({ requestId, affectedRows });
      },
      (error: unknown) => {
        this.inflight.delete(requestId);
        this.failure ??= new WriteRequestError(requestId, error, errorMessage(error));
      },
    );
    this.inflight.set(requestId, settled);
    return requestId;
  }

  async waitForSlot(): Promise<void> {
    this.assertWritable();
    while (this.inflight.size >= this.options.parallelism) {
      await Promise.race(this.inflight.values());
    }
    this.throwIfFailed();
  }

  flushCompletedResponses(): WriteResponse[] {
    this.throwIfFailed();
    return this.takeCompleted();
  }

  async finishWithResponses(): Promise<WriteResponse[]> {
    this.assertWritable();
    this.finished = true;
    this.logger.debug(`Waiting for ${this.inflight.size} outstanding writes`);
    await Promise.all(this.inflight.values());
    this.throwIfFailed();
    return this.takeCompleted();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.release();
  }

  private async execute(statements: SqlStatement[]): Promise<number> {
    let affectedRows = 0;
    for (const statement of statements) {
      const result = await this.executor.query(statement.text, statement.values);
      affectedRows += result.rowCount ?? 0;
    }
    return affectedRows;
  }

  private takeCompleted(): WriteResponse[] {
    const responses = this.completed;
    this.completed = [];
    return responses;
  }

  private assertWritable(): void {
    if (this.closed || this.finished) {
      throw new Error(`Bulk writer for ${this.schema.name} is ${this.closed ? 'closed' : 'finished'}`);
    }
    this.throwIfFailed();
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

/**
 * Opens bulk stream writers against one database
 */
export class BulkInserter {
  private readonly logger = new Logger(BulkInserter.name);

  constructor(private readonly client: IngestClient, private readonly database: string) {}

  /**
   * Open a dedicated pool sized to the writer's parallelism and verify it
   */
  async createBulkStreamWriter(
    schema: TableSchema,
    options: BulkWriteOptions = DEFAULT_BULK_WRITE_OPTIONS,
  ): Promise<BulkStreamWriter> {
    if (!Number.isInteger(options.parallelism) || options.parallelism < 1) {
      throw new Error(`Parallelism must be a positive integer, got ${options.parallelism}`);
    }
    if (!(options.timeoutMs > 0)) {
      throw new Error(`Timeout must be positive, got ${options.timeoutMs}`);
    }
    if (options.compression !== CompressionType.None) {
      this.logger.warn(`${options.compression} compression is not available on the SQL transport; batches are sent uncompressed`);
    }

    for (const problem of validateSchema(schema)) {
      this.logger.warn(`Schema ${schema.name}: ${problem}`);
    }

    const pool = this.client.createPool(this.database, {
      max: options.parallelism,
      queryTimeoutMs: options.timeoutMs,
    });

    try {
      await pool.query('SELECT 1', []);
    } catch (error) {
      await this.client.release(pool).catch((closeError: unknown) =>
        this.logger.warn(`Failed to close pool after handshake error: ${errorMessage(closeError)}`),
      );
      throw new Error(`Handshake with ${this.database} failed: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.log(
      `Bulk writer ready for ${this.database}.${schema.name} (parallelism ${options.parallelism}, timeout ${options.timeoutMs}ms)`,
    );
    return new BulkStreamWriter(pool, schema, options, () => this.client.release(pool));
  }
}
