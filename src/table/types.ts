/**
 * Column type system shared by the row model, the table schema and the wire layer
 * One ColumnDataType per value case, excluding Null
 */
export enum ColumnDataType {
  Boolean = 'BOOLEAN',
  Int8 = 'INT8',
  Int16 = 'INT16',
  Int32 = 'INT32',
  Int64 = 'INT64',
  Uint8 = 'UINT8',
  Uint16 = 'UINT16',
  Uint32 = 'UINT32',
  Uint64 = 'UINT64',
  Float32 = 'FLOAT32',
  Float64 = 'FLOAT64',
  Binary = 'BINARY',
  String = 'STRING',
  Date = 'DATE',
  Datetime = 'DATETIME',
  TimestampSecond = 'TIMESTAMP_SECOND',
  TimestampMillisecond = 'TIMESTAMP_MILLISECOND',
  TimestampMicrosecond = 'TIMESTAMP_MICROSECOND',
  TimestampNanosecond = 'TIMESTAMP_NANOSECOND',
  TimeSecond = 'TIME_SECOND',
  TimeMillisecond = 'TIME_MILLISECOND',
  TimeMicrosecond = 'TIME_MICROSECOND',
  TimeNanosecond = 'TIME_NANOSECOND',
  Decimal128 = 'DECIMAL128',
  Json = 'JSON',
}

/**
 * Role a column plays in a time-series table
 */
export enum SemanticType {
  Tag = 'TAG',             // Series identity, used for grouping and indexing
  Timestamp = 'TIMESTAMP', // The table's time index
  Field = 'FIELD',         // Measurement value
}

/**
 * Extra type parameters for data types that need them
 * Decimal precision and scale live here, never on the value
 */
export type DataTypeExtension = {
  kind: 'decimal128';
  precision: number;
  scale: number;
};

const TIMESTAMP_TYPES: ReadonlySet<ColumnDataType> = new Set([
  ColumnDataType.TimestampSecond,
  ColumnDataType.TimestampMillisecond,
  ColumnDataType.TimestampMicrosecond,
  ColumnDataType.TimestampNanosecond,
]);

export function isTimestampType(dataType: ColumnDataType): boolean {
  return TIMESTAMP_TYPES.has(dataType);
}
