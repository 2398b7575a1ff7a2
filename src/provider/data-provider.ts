import type { Row } from '../table/row';
import type { TableSchema } from '../table/schema';
import type { ColumnSchema, WireRow } from '../database/wire';

/**
 * Lifecycle shared by every row source
 */
export interface DataProvider {
  /**
   * Prepare generator state; pulling rows before init is an error
   */
  init(): Promise<void>;
  rowCount(): number;
  close(): Promise<void>;
}

/**
 * Source of structured rows for the bulk path
 * rows() is single pass: a fresh pass needs a new provider or a cursor reset
 */
export interface TableDataProvider extends DataProvider {
  tableSchema(): TableSchema;
  rows(): Iterator<Row>;
}

/**
 * Source of wire rows for the row-at-a-time insert path
 */
export interface ApiDataProvider extends DataProvider {
  tableName(): string;
  apiSchema(): ColumnSchema[];
  apiRows(): Iterator<WireRow>;
}
