import { Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { truncateForLog } from '../common/logging.utils';
import type { RowsBuffer } from '../database/rows-buffer';
import { WriteRequestError, type BulkWriter, type WriteResponse } from '../database/types';
import type { TableDataProvider } from '../provider/data-provider';
import type { Row } from '../table/row';
import { IngestState, IngestStateTracker } from './ingest-state';

const DEFAULT_VALUE_SIZE_HINT = 1024;

export interface SubmitterOptions {
  batchSize: number;
  flushInterval: number;      // Reconcile completed acks every N batches
  avgValueSizeHint?: number;
}

/**
 * Outcome of one run
 * Counters are for reporting only; the state says whether the run succeeded
 */
export interface SubmissionReport {
  state: IngestState;
  history: readonly IngestState[];
  responses: WriteResponse[];
  rowsWritten: number;
  batchCount: number;
  affectedRows: number;
  durationMs: number;
  error?: Error;
}

/**
 * Drives rows from a provider into a bulk writer in bounded batches
 *
 * Filling first waits for a free write slot, then pulls rows synchronously
 * until the batch is full or the source is exhausted. Submitting hands the
 * batch over without waiting for its acknowledgement. Every flushInterval batches the already
 * completed acks are collected. Once the source is exhausted, Draining waits
 * for every outstanding write and the provider is closed.
 * The first failure ends the run in Errored; nothing is retried.
 */
export class StreamingSubmitter {
  private readonly logger = new Logger(StreamingSubmitter.name);

  constructor(
    private readonly writer: BulkWriter,
    private readonly provider: TableDataProvider,
    private readonly options: SubmitterOptions,
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 0) {
      throw new Error(`Batch size must be a non-negative integer, got ${options.batchSize}`);
    }
    if (!Number.isInteger(options.flushInterval) || options.flushInterval < 1) {
      throw new Error(`Flush interval must be a positive integer, got ${options.flushInterval}`);
    }
  }

  async run(): Promise<SubmissionReport> {
    const tracker = new IngestStateTracker();
    const responses: WriteResponse[] = [];
    const requestBatches = new Map<number, number>();  // request id -> batch number
    const step = <T>(context: string, action: () => Promise<T>) => this.step(context, action, requestBatches);
    const started = Date.now();
    const rows = this.provider.rows();
    let rowsWritten = 0;
    let batchCount = 0;

    try {
      for (;;) {
        const batchNumber = batchCount + 1;
        // Rows are pulled only once the batch can be sent
        await step(`Failed to wait for a write slot before batch ${batchNumber}`, () => this.writer.waitForSlot());

        const { buffer, exhausted } = this.fill(rows, batchNumber);
        if (buffer.isEmpty()) {
          break;
        }

        tracker.transition(IngestState.Submitting);
        const batchRows = buffer.length;
        const requestId = await step(`Failed to write batch ${batchNumber}`, () => this.writer.writeRowsAsync(buffer));
        requestBatches.set(requestId, batchNumber);
        batchCount = batchNumber;
        rowsWritten += batchRows;
        this.logger.debug(
          `Batch ${batchCount}: ${rowsWritten} rows processed (${rate(rowsWritten, Date.now() - started)} rows/sec)`,
        );

        if (batchCount % this.options.flushInterval === 0) {
          const flushed = await step(`Failed to collect responses after batch ${batchCount}`, async () =>
            this.writer.flushCompletedResponses(),
          );
          if (flushed.length > 0) {
            responses.push(...flushed);
            this.logger.log(`Flushed ${flushed.length} responses (total ${sumAffected(flushed)} affected rows)`);
          }
        }

        tracker.transition(IngestState.Filling);
        if (exhausted) {
          break;
        }
      }

      tracker.transition(IngestState.Draining);
      this.logger.log('Finishing bulk writer and waiting for all responses...');
      responses.push(...(await step('Failed to finish bulk writer', () => this.writer.finishWithResponses())));

      await step('Failed to close provider', () => this.provider.close());
      tracker.transition(IngestState.Finished);
    } catch (error) {
      const failure = tracker.fail(error);
      this.logger.error(truncateForLog(failure.message));
    }

    const durationMs = Date.now() - started;
    return {
      state: tracker.state,
      history: tracker.history,
      responses,
      rowsWritten,
      batchCount,
      affectedRows: sumAffected(responses),
      durationMs,
      error: tracker.error,
    };
  }

  /**
   * Pull rows until the batch is full or the source signals the end
   */
  private fill(rows: Iterator<Row>, batchNumber: number): { buffer: RowsBuffer; exhausted: boolean } {
    const { batchSize, avgValueSizeHint = DEFAULT_VALUE_SIZE_HINT } = this.options;
    try {
      const buffer = this.writer.allocRowsBuffer(batchSize, avgValueSizeHint);
      while (buffer.length < batchSize) {
        const next = rows.next();
        if (next.done) {
          return { buffer, exhausted: true };
        }
        buffer.addRow(next.value);
      }
      return { buffer, exhausted: false };
    } catch (error) {
      throw new Error(`Failed to fill batch ${batchNumber}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Run one engine step, wrapping its failure with context
   * A rejected write is attributed to the batch it carried, whichever step noticed it
   */
  private async step<T>(context: string, action: () => Promise<T>, requestBatches: ReadonlyMap<number, number>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      const failedBatch = error instanceof WriteRequestError ? requestBatches.get(error.requestId) : undefined;
      const prefix = failedBatch === undefined ? context : `Failed to write batch ${failedBatch}`;
      throw new Error(`${prefix}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

function sumAffected(responses: readonly WriteResponse[]): number {
  return responses.reduce((total, response) => total + response.affectedRows, 0);
}

function rate(rows: number, elapsedMs: number): number {
  return elapsedMs > 0 ? Math.round(rows / (elapsedMs / 1000)) : 0;
}
