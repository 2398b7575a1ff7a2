import { Logger } from '@nestjs/common';
import type { IngestClient } from './client';
import { buildInsertStatements } from './sql';
import type { SqlExecutor } from './types';
import { encodeWireValue, type RowInsertRequests } from './wire';

/**
 * Row-at-a-time insert path: one awaited request per batch
 */
export class Database {
  private readonly logger = new Logger(Database.name);
  private pool?: SqlExecutor;

  constructor(
    private readonly client: IngestClient,
    readonly name: string,
    private readonly timeoutMs: number,
  ) {}

  /**
   * Insert every request's rows and return the number of affected rows
   */
  async insert(requests: RowInsertRequests): Promise<number> {
    const pool = (this.pool ??= this.client.createPool(this.name, { max: 1, queryTimeoutMs: this.timeoutMs }));
    let affectedRows = 0;

    for (const insert of requests.inserts) {
      const { schema, rows } = insert.rows;
      const encoded = rows.map(row => {
        if (row.values.length !== schema.length) {
          throw new Error(
            `Row has ${row.values.length} values but ${insert.tableName} declares ${schema.length} columns`,
          );
        }
        return row.values.map((value, i) => encodeWireValue(value, schema[i]));
      });
      const columnNames = schema.map(column => column.columnName);

      for (const statement of buildInsertStatements(insert.tableName, columnNames, encoded)) {
        const result = await pool.query(statement.text, statement.values);
        affectedRows += result.rowCount ?? 0;
      }
      this.logger.debug(`Inserted ${rows.length} rows into ${insert.tableName}`);
    }

    return affectedRows;
  }

  async close(): Promise<void> {
    const pool = this.pool;
    this.pool = undefined;
    if (pool) {
      await this.client.release(pool);
    }
  }
}
