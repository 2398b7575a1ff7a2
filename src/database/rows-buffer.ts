import type { Row } from '../table/row';
import type { TableSchema } from '../table/schema';
import { encodeColumn, type SqlParam } from './sql';

/**
 * Accumulates one batch of rows for a bulk write
 * Rows are drained into statement parameters as they are added, so the
 * buffer owns no Row after addRow returns. Capacity is a sizing hint only.
 */
export class RowsBuffer {
  private readonly encoded: SqlParam[][] = [];
  private bytes = 0;

  constructor(
    readonly schema: TableSchema,
    readonly capacity: number,
    private readonly avgValueSizeHint: number,
  ) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`Invalid rows buffer capacity: ${capacity}`);
    }
  }

  get length(): number {
    return this.encoded.length;
  }

  isEmpty(): boolean {
    return this.encoded.length === 0;
  }

  /**
   * Approximate payload size: measured for text and binary, hinted otherwise
   */
  get estimatedBytes(): number {
    return this.bytes;
  }

  addRow(row: Row): void {
    const columns = this.schema.columns;
    if (row.length !== columns.length) {
      throw new Error(
        `Row has ${row.length} values but table ${this.schema.name} has ${columns.length} columns`,
      );
    }

    const params: SqlParam[] = [];
    for (let i = 0; i < columns.length; i++) {
      const param = encodeColumn(row, i, columns[i]);
      params.push(param);
      this.bytes += sizeOf(param, this.avgValueSizeHint);
    }
    this.encoded.push(params);
  }

  /**
   * Encoded rows in insertion order, one parameter per column
   */
  rows(): readonly SqlParam[][] {
    return this.encoded;
  }
}

function sizeOf(param: SqlParam, hint: number): number {
  if (param === null) {
    return 0;
  }
  if (typeof param === 'string') {
    return Buffer.byteLength(param, 'utf8');
  }
  if (Buffer.isBuffer(param)) {
    return param.byteLength;
  }
  return hint;
}
