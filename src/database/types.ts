import type { RowsBuffer } from './rows-buffer';

/**
 * Batch compression requested from the transport
 */
export enum CompressionType {
  None = 'none',
  Lz4 = 'lz4',
  Zstd = 'zstd',
}

/**
 * Options for a bulk stream writer
 * parallelism bounds the number of writes in flight at once
 */
export interface BulkWriteOptions {
  compression: CompressionType;
  parallelism: number;
  timeoutMs: number;
}

export const DEFAULT_BULK_WRITE_OPTIONS: BulkWriteOptions = {
  compression: CompressionType.Lz4,
  parallelism: 8,
  timeoutMs: 60000,
};

/**
 * Acknowledgement of one submitted batch
 */
export interface WriteResponse {
  requestId: number;
  affectedRows: number;
}

/**
 * A submitted write that the store rejected
 * requestId is the id writeRowsAsync returned for it
 */
export class WriteRequestError extends Error {
  constructor(readonly requestId: number, cause: unknown, message: string) {
    super(`Write request ${requestId} failed: ${message}`, { cause });
    this.name = 'WriteRequestError';
  }
}

/**
 * The subset of a node-postgres pool the writers need
 */
export interface SqlExecutor {
  query(text: string, values: unknown[]): Promise<{ rowCount: number | null }>;
  end(): Promise<void>;
}

/**
 * Streaming writer: buffers are submitted without waiting for their
 * acknowledgement, which is collected later by flush or finish
 */
export interface BulkWriter {
  allocRowsBuffer(rowCapacity: number, avgValueSizeHint: number): RowsBuffer;

  /**
   * Submit a filled buffer; resolves with its request id once a slot is free
   * and the write is dispatched, not when it is acknowledged
   */
  writeRowsAsync(buffer: RowsBuffer): Promise<number>;

  /**
   * Resolve once a write slot is free; rejects if an earlier write has failed
   */
  waitForSlot(): Promise<void>;

  /**
   * Collect acknowledgements that have already arrived, without waiting
   */
  flushCompletedResponses(): WriteResponse[];

  /**
   * Wait for every outstanding write and return the remaining acknowledgements
   */
  finishWithResponses(): Promise<WriteResponse[]>;

  close(): Promise<void>;
}
