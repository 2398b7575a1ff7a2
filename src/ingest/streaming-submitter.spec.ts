import { BulkStreamWriter } from '../database/bulk-writer';
import { RowsBuffer } from '../database/rows-buffer';
import { CompressionType, type BulkWriter, type SqlExecutor, type WriteResponse } from '../database/types';
import type { TableDataProvider } from '../provider/data-provider';
import { Row } from '../table/row';
import { TableSchema } from '../table/schema';
import { ColumnDataType } from '../table/types';
import { Value } from '../table/value';
import { IngestState } from './ingest-state';
import { StreamingSubmitter } from './streaming-submitter';

const schema = TableSchema.builder('t')
  .addTimestamp('ts', ColumnDataType.TimestampMillisecond)
  .addField('value', ColumnDataType.Int64, false)
  .build();

class CountingProvider implements TableDataProvider {
  pulled = 0;
  closed = false;
  closeError?: Error;

  constructor(private readonly count: number, private readonly arity = 2) {}

  async init(): Promise<void> {}

  rowCount(): number {
    return this.count;
  }

  async close(): Promise<void> {
    if (this.closeError) {
      throw this.closeError;
    }
    this.closed = true;
  }

  tableSchema(): TableSchema {
    return schema;
  }

  *rows(): Generator<Row, void, undefined> {
    while (this.pulled < this.count) {
      this.pulled++;
      const values = [Value.timestampMillisecond(BigInt(this.pulled)), Value.int64(1n)];
      yield Row.fromValues(values.slice(0, this.arity));
    }
  }
}

/**
 * Acknowledges every batch with its row count; flush hands acks back newest first
 */
class FakeWriter implements BulkWriter {
  readonly submitted: number[] = [];
  failOnBatch?: number;
  flushError?: Error;
  finishError?: Error;
  private pending: WriteResponse[] = [];

  allocRowsBuffer = jest.fn((rowCapacity: number, avgValueSizeHint: number) =>
    new RowsBuffer(schema, rowCapacity, avgValueSizeHint),
  );

  writeRowsAsync = jest.fn(async (buffer: RowsBuffer) => {
    const requestId = this.submitted.length + 1;
    if (requestId === this.failOnBatch) {
      throw new Error('server unavailable');
    }
    this.submitted.push(buffer.length);
    this.pending.push({ requestId, affectedRows: buffer.length });
    return requestId;
  });

  flushCompletedResponses = jest.fn(() => {
    if (this.flushError) {
      throw this.flushError;
    }
    return this.takePending().reverse();
  });

  finishWithResponses = jest.fn(async () => {
    if (this.finishError) {
      throw this.finishError;
    }
    return this.takePending();
  });

  waitForSlot = jest.fn(async () => undefined);

  close = jest.fn(async () => undefined);

  private takePending(): WriteResponse[] {
    const pending = this.pending;
    this.pending = [];
    return pending;
  }
}

describe('StreamingSubmitter', () => {
  let writer: FakeWriter;

  beforeEach(() => {
    writer = new FakeWriter();
  });

  it('should submit 250 rows as batches of 100, 100 and 50 and collect every ack', async () => {
    const provider = new CountingProvider(250);
    const submitter = new StreamingSubmitter(writer, provider, { batchSize: 100, flushInterval: 10 });

    const report = await submitter.run();

    expect(report.state).toBe(IngestState.Finished);
    expect(writer.writeRowsAsync).toHaveBeenCalledTimes(3);
    expect(writer.submitted).toEqual([100, 100, 50]);
    expect(report.responses).toHaveLength(3);
    expect(report.affectedRows).toBe(250);
    expect(report.rowsWritten).toBe(250);
    expect(report.batchCount).toBe(3);
    expect(report.error).toBeUndefined();
    expect(provider.closed).toBe(true);
    expect(report.history).toEqual([
      IngestState.Filling,
      IngestState.Submitting,
      IngestState.Filling,
      IngestState.Submitting,
      IngestState.Filling,
      IngestState.Submitting,
      IngestState.Filling,
      IngestState.Draining,
      IngestState.Finished,
    ]);
  });

  it('should allocate buffers sized to the batch with the value size hint', async () => {
    const submitter = new StreamingSubmitter(writer, new CountingProvider(5), {
      batchSize: 10,
      flushInterval: 1,
      avgValueSizeHint: 64,
    });

    await submitter.run();

    expect(writer.allocRowsBuffer).toHaveBeenCalledWith(10, 64);
  });

  it('should stop after a full final batch without another submit', async () => {
    const provider = new CountingProvider(200);
    const submitter = new StreamingSubmitter(writer, provider, { batchSize: 100, flushInterval: 10 });

    const report = await submitter.run();

    expect(report.state).toBe(IngestState.Finished);
    expect(writer.submitted).toEqual([100, 100]);
    expect(writer.allocRowsBuffer).toHaveBeenCalledTimes(3);
    expect(report.affectedRows).toBe(200);
  });

  it.each([
    ['a zero batch size', 250, 0],
    ['a zero row count', 0, 100],
  ])('should make no submissions for %s', async (_label, rowCount, batchSize) => {
    const provider = new CountingProvider(rowCount);
    const submitter = new StreamingSubmitter(writer, provider, { batchSize, flushInterval: 10 });

    const report = await submitter.run();

    expect(writer.writeRowsAsync).not.toHaveBeenCalled();
    expect(provider.pulled).toBe(0);
    expect(report.history).toEqual([IngestState.Filling, IngestState.Draining, IngestState.Finished]);
    expect(report.responses).toEqual([]);
    expect(report.batchCount).toBe(0);
  });

  it('should halt on a failed batch 2 without filling batch 3', async () => {
    writer.failOnBatch = 2;
    const provider = new CountingProvider(250);
    const submitter = new StreamingSubmitter(writer, provider, { batchSize: 100, flushInterval: 10 });

    const report = await submitter.run();

    expect(report.state).toBe(IngestState.Errored);
    expect(report.error?.message).toBe('Failed to write batch 2: server unavailable');
    expect(report.error?.cause).toEqual(new Error('server unavailable'));
    expect(writer.writeRowsAsync).toHaveBeenCalledTimes(2);
    expect(writer.allocRowsBuffer).toHaveBeenCalledTimes(2);
    expect(provider.pulled).toBe(200);
    expect(writer.finishWithResponses).not.toHaveBeenCalled();
    expect(provider.closed).toBe(false);
    expect(report.history.slice(-2)).toEqual([IngestState.Submitting, IngestState.Errored]);
  });

  it('should stop before filling the next batch once an earlier write is rejected', async () => {
    let queries = 0;
    const executor: SqlExecutor = {
      query: jest.fn(async (_text: string, values: unknown[]) => {
        queries++;
        if (queries === 2) {
          await new Promise(resolve => setImmediate(resolve));
          throw new Error('server unavailable');
        }
        return { rowCount: values.length / 2 };
      }),
      end: jest.fn(async () => undefined),
    };
    const realWriter = new BulkStreamWriter(executor, schema, {
      compression: CompressionType.None,
      parallelism: 1,
      timeoutMs: 1000,
    });
    const provider = new CountingProvider(250);
    const submitter = new StreamingSubmitter(realWriter, provider, { batchSize: 100, flushInterval: 10 });

    const report = await submitter.run();

    expect(report.state).toBe(IngestState.Errored);
    expect(report.error?.message).toBe('Failed to write batch 2: Write request 2 failed: server unavailable');
    expect(provider.pulled).toBe(200);
    expect(report.batchCount).toBe(2);
    expect(report.rowsWritten).toBe(200);
    expect(queries).toBe(2);
    expect(report.history.slice(-2)).toEqual([IngestState.Filling, IngestState.Errored]);
  });

  it('should attribute a rejected write found while draining to its batch', async () => {
    const executor: SqlExecutor = {
      query: jest.fn(async () => {
        await new Promise(resolve => setImmediate(resolve));
        throw new Error('disk full');
      }),
      end: jest.fn(async () => undefined),
    };
    const realWriter = new BulkStreamWriter(executor, schema, {
      compression: CompressionType.None,
      parallelism: 4,
      timeoutMs: 1000,
    });
    const submitter = new StreamingSubmitter(realWriter, new CountingProvider(10), { batchSize: 10, flushInterval: 10 });

    const report = await submitter.run();

    expect(report.error?.message).toBe('Failed to write batch 1: Write request 1 failed: disk full');
    expect(report.history.slice(-2)).toEqual([IngestState.Draining, IngestState.Errored]);
  });

  it('should reconcile completed acks every N batches in any order', async () => {
    const provider = new CountingProvider(50);
    const submitter = new StreamingSubmitter(writer, provider, { batchSize: 10, flushInterval: 2 });

    const report = await submitter.run();

    expect(writer.flushCompletedResponses).toHaveBeenCalledTimes(2);
    expect(report.responses.map(r => r.requestId)).toEqual([2, 1, 4, 3, 5]);
    expect(report.affectedRows).toBe(50);
    expect(report.state).toBe(IngestState.Finished);
  });

  it('should fail the run when reconciliation reports a failed write', async () => {
    writer.flushError = new Error('Write request 1 failed: timeout');
    const submitter = new StreamingSubmitter(writer, new CountingProvider(50), { batchSize: 10, flushInterval: 2 });

    const report = await submitter.run();

    expect(report.state).toBe(IngestState.Errored);
    expect(report.error?.message).toBe('Failed to collect responses after batch 2: Write request 1 failed: timeout');
    expect(writer.writeRowsAsync).toHaveBeenCalledTimes(2);
  });

  it('should fail the run when draining fails', async () => {
    writer.finishError = new Error('connection closed');
    const provider = new CountingProvider(10);
    const submitter = new StreamingSubmitter(writer, provider, { batchSize: 10, flushInterval: 10 });

    const report = await submitter.run();

    expect(report.state).toBe(IngestState.Errored);
    expect(report.error?.message).toBe('Failed to finish bulk writer: connection closed');
    expect(report.history.slice(-2)).toEqual([IngestState.Draining, IngestState.Errored]);
    expect(provider.closed).toBe(false);
  });

  it('should fail the run when the provider cannot close', async () => {
    const provider = new CountingProvider(10);
    provider.closeError = new Error('file busy');
    const submitter = new StreamingSubmitter(writer, provider, { batchSize: 10, flushInterval: 10 });

    const report = await submitter.run();

    expect(report.state).toBe(IngestState.Errored);
    expect(report.error?.message).toBe('Failed to close provider: file busy');
    expect(report.affectedRows).toBe(10);
  });

  it('should fail the run when a row does not fit the schema', async () => {
    const submitter = new StreamingSubmitter(writer, new CountingProvider(3, 1), { batchSize: 10, flushInterval: 10 });

    const report = await submitter.run();

    expect(report.state).toBe(IngestState.Errored);
    expect(report.error?.message).toBe('Failed to fill batch 1: Row has 1 values but table t has 2 columns');
    expect(writer.writeRowsAsync).not.toHaveBeenCalled();
  });

  it('should reject invalid options', () => {
    const provider = new CountingProvider(1);

    expect(() => new StreamingSubmitter(writer, provider, { batchSize: -1, flushInterval: 1 })).toThrow(
      'Batch size must be a non-negative integer, got -1',
    );
    expect(() => new StreamingSubmitter(writer, provider, { batchSize: 1, flushInterval: 0 })).toThrow(
      'Flush interval must be a positive integer, got 0',
    );
  });
});
