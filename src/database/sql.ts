import type { Row } from '../table/row';
import type { Column } from '../table/schema';
import { ColumnDataType } from '../table/types';

/**
 * A value in the shape node-postgres binds as a statement parameter
 */
export type SqlParam = boolean | number | string | Buffer | null;

export interface SqlStatement {
  text: string;
  values: SqlParam[];
}

// Bind parameters are counted in an unsigned 16-bit field of the Bind message
export const MAX_BIND_PARAMETERS = 65535;

const SECOND = 1n;
const MILLISECOND = 1000n;
const MICROSECOND = 1000000n;
const NANOSECOND = 1000000000n;
const MILLIS_PER_DAY = 86400000;

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Format an epoch offset as an ISO-8601 UTC timestamp without losing sub-millisecond digits
 */
export function formatEpoch(value: bigint, unitsPerSecond: bigint): string {
  let seconds = value / unitsPerSecond;
  let fraction = value % unitsPerSecond;
  if (fraction < 0n) {
    fraction += unitsPerSecond;
    seconds -= 1n;
  }
  const base = new Date(Number(seconds) * 1000).toISOString().slice(0, 19);
  const digits = unitsPerSecond.toString().length - 1;
  return digits === 0 ? `${base}Z` : `${base}.${fraction.toString().padStart(digits, '0')}Z`;
}

/**
 * Format a time-of-day offset as HH:MM:SS[.fraction]
 */
export function formatTimeOfDay(value: bigint, unitsPerSecond: bigint): string {
  return formatEpoch(value, unitsPerSecond).slice(11, -1);
}

/**
 * Render an unscaled decimal with its column scale, e.g. (12345, 2) -> "123.45"
 */
export function formatDecimal(unscaled: bigint, scale: number): string {
  if (scale <= 0) {
    return (unscaled * 10n ** BigInt(-scale)).toString();
  }
  const negative = unscaled < 0n;
  const digits = (negative ? -unscaled : unscaled).toString().padStart(scale + 1, '0');
  const point = digits.length - scale;
  return `${negative ? '-' : ''}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function formatDate(days: number): string {
  return new Date(days * MILLIS_PER_DAY).toISOString().slice(0, 10);
}

const toBuffer = (bytes: Uint8Array): Buffer =>
  Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

const optional = <T>(value: T | undefined, encode: (value: T) => SqlParam): SqlParam =>
  value === undefined ? null : encode(value);

/**
 * Drain one column of a row into a statement parameter
 * The caller has checked the row length against the schema, so the unchecked
 * accessors are safe; text and binary payloads are moved out, not copied.
 */
export function encodeColumn(row: Row, index: number, column: Column): SqlParam {
  switch (column.dataType) {
    case ColumnDataType.Boolean:
      return optional(row.getBoolUnchecked(index), v => v);
    case ColumnDataType.Int8:
      return optional(row.getI8Unchecked(index), v => v);
    case ColumnDataType.Int16:
      return optional(row.getI16Unchecked(index), v => v);
    case ColumnDataType.Int32:
      return optional(row.getI32Unchecked(index), v => v);
    case ColumnDataType.Int64:
      return optional(row.getI64Unchecked(index), v => v.toString());
    case ColumnDataType.Uint8:
      return optional(row.getU8Unchecked(index), v => v);
    case ColumnDataType.Uint16:
      return optional(row.getU16Unchecked(index), v => v);
    case ColumnDataType.Uint32:
      return optional(row.getU32Unchecked(index), v => v);
    case ColumnDataType.Uint64:
      return optional(row.getU64Unchecked(index), v => v.toString());
    case ColumnDataType.Float32:
      return optional(row.getF32Unchecked(index), v => v);
    case ColumnDataType.Float64:
      return optional(row.getF64Unchecked(index), v => v);
    case ColumnDataType.Binary:
      return optional(row.takeBinaryUnchecked(index), toBuffer);
    case ColumnDataType.String:
      return optional(row.takeStringUnchecked(index), v => v);
    case ColumnDataType.Json:
      return optional(row.takeBinaryUnchecked(index), v => toBuffer(v).toString('utf8'));
    case ColumnDataType.Date:
      return optional(row.getDateUnchecked(index), formatDate);
    case ColumnDataType.Datetime:
      return optional(row.getDatetimeUnchecked(index), v => formatEpoch(v, MILLISECOND));
    case ColumnDataType.TimestampSecond:
      return optional(row.getTimestampUnchecked(index), v => formatEpoch(v, SECOND));
    case ColumnDataType.TimestampMillisecond:
      return optional(row.getTimestampUnchecked(index), v => formatEpoch(v, MILLISECOND));
    case ColumnDataType.TimestampMicrosecond:
      return optional(row.getTimestampUnchecked(index), v => formatEpoch(v, MICROSECOND));
    case ColumnDataType.TimestampNanosecond:
      return optional(row.getTimestampUnchecked(index), v => formatEpoch(v, NANOSECOND));
    case ColumnDataType.TimeSecond:
      return optional(row.getTime32Unchecked(index), v => formatTimeOfDay(BigInt(v), SECOND));
    case ColumnDataType.TimeMillisecond:
      return optional(row.getTime32Unchecked(index), v => formatTimeOfDay(BigInt(v), MILLISECOND));
    case ColumnDataType.TimeMicrosecond:
      return optional(row.getTime64Unchecked(index), v => formatTimeOfDay(v, MICROSECOND));
    case ColumnDataType.TimeNanosecond:
      return optional(row.getTime64Unchecked(index), v => formatTimeOfDay(v, NANOSECOND));
    case ColumnDataType.Decimal128:
      return optional(row.getDecimal128Unchecked(index), v => formatDecimal(v, column.dataTypeExtension?.scale ?? 0));
  }
}

/**
 * Split encoded rows into multi-row INSERT statements
 * Each statement stays under the protocol's bind parameter limit
 */
export function buildInsertStatements(
  tableName: string,
  columnNames: readonly string[],
  rows: readonly SqlParam[][],
  maxParameters: number = MAX_BIND_PARAMETERS,
): SqlStatement[] {
  if (rows.length === 0) {
    return [];
  }
  if (columnNames.length === 0) {
    throw new Error(`Cannot insert into ${tableName}: no columns`);
  }

  const rowsPerStatement = Math.max(1, Math.floor(maxParameters / columnNames.length));
  const prefix = `INSERT INTO ${quoteIdentifier(tableName)} (${columnNames.map(quoteIdentifier).join(', ')}) VALUES `;
  const statements: SqlStatement[] = [];

  for (let start = 0; start < rows.length; start += rowsPerStatement) {
    const chunk = rows.slice(start, start + rowsPerStatement);
    const values: SqlParam[] = [];
    const tuples = chunk.map(row => {
      const placeholders = row.map(value => {
        values.push(value);
        return `$${values.length}`;
      });
      return `(${placeholders.join(', ')})`;
    });
    statements.push({ text: prefix + tuples.join(', '), values });
  }

  return statements;
}
