import { ColumnDataType, SemanticType, type DataTypeExtension } from '../table/types';
import type { Column } from '../table/schema';
import { formatDate, formatDecimal, formatEpoch, formatTimeOfDay, type SqlParam } from './sql';

/**
 * Wire-level value record used by the row-at-a-time insert path
 * Mirrors a protobuf oneof: exactly one typed payload, or none for null
 */
export type WireValue =
  | { case: 'boolValue'; value: boolean }
  | { case: 'i8Value' | 'i16Value' | 'i32Value'; value: number }
  | { case: 'u8Value' | 'u16Value' | 'u32Value'; value: number }
  | { case: 'i64Value' | 'u64Value'; value: bigint }
  | { case: 'f32Value' | 'f64Value'; value: number }
  | { case: 'binaryValue'; value: Uint8Array }
  | { case: 'stringValue'; value: string }
  | { case: 'dateValue'; value: number }
  | { case: 'datetimeValue'; value: bigint }
  | {
      case:
        | 'timestampSecondValue'
        | 'timestampMillisecondValue'
        | 'timestampMicrosecondValue'
        | 'timestampNanosecondValue';
      value: bigint;
    }
  | { case: 'timeSecondValue' | 'timeMillisecondValue'; value: number }
  | { case: 'timeMicrosecondValue' | 'timeNanosecondValue'; value: bigint }
  | { case: 'decimal128Value'; value: bigint }
  | { case: 'jsonValue'; value: string }
  | { case: 'null' };

export interface WireRow {
  values: WireValue[];
}

/**
 * Column description sent alongside wire rows
 */
export interface ColumnSchema {
  columnName: string;
  datatype: ColumnDataType;
  semanticType: SemanticType;
  datatypeExtension?: DataTypeExtension;
}

export interface WireRows {
  schema: ColumnSchema[];
  rows: WireRow[];
}

export interface RowInsertRequest {
  tableName: string;
  rows: WireRows;
}

export interface RowInsertRequests {
  inserts: RowInsertRequest[];
}

export const stringValue = (value: string): WireValue => ({ case: 'stringValue', value });
export const boolValue = (value: boolean): WireValue => ({ case: 'boolValue', value });
export const i32Value = (value: number): WireValue => ({ case: 'i32Value', value });
export const i64Value = (value: bigint): WireValue => ({ case: 'i64Value', value });
export const f64Value = (value: number): WireValue => ({ case: 'f64Value', value });
export const binaryValue = (value: Uint8Array): WireValue => ({ case: 'binaryValue', value });
export const jsonValue = (value: string): WireValue => ({ case: 'jsonValue', value });
export const timestampMillisecondValue = (value: bigint): WireValue => ({ case: 'timestampMillisecondValue', value });
export const nullValue = (): WireValue => ({ case: 'null' });

export function toColumnSchema(column: Column): ColumnSchema {
  const schema: ColumnSchema = {
    columnName: column.name,
    datatype: column.dataType,
    semanticType: column.semanticType,
  };
  if (column.dataTypeExtension) {
    schema.datatypeExtension = column.dataTypeExtension;
  }
  return schema;
}

/**
 * Convert a wire value into the parameter shape the SQL layer binds
 * Decimal scale comes from the column's type extension
 */
export function encodeWireValue(value: WireValue, column?: ColumnSchema): SqlParam {
  switch (value.case) {
    case 'null':
      return null;
    case 'i64Value':
    case 'u64Value':
      return value.value.toString();
    case 'binaryValue':
      return Buffer.from(value.value.buffer, value.value.byteOffset, value.value.byteLength);
    case 'dateValue':
      return formatDate(value.value);
    case 'datetimeValue':
    case 'timestampMillisecondValue':
      return formatEpoch(value.value, 1000n);
    case 'timestampSecondValue':
      return formatEpoch(value.value, 1n);
    case 'timestampMicrosecondValue':
      return formatEpoch(value.value, 1000000n);
    case 'timestampNanosecondValue':
      return formatEpoch(value.value, 1000000000n);
    case 'timeSecondValue':
      return formatTimeOfDay(BigInt(value.value), 1n);
    case 'timeMillisecondValue':
      return formatTimeOfDay(BigInt(value.value), 1000n);
    case 'timeMicrosecondValue':
      return formatTimeOfDay(value.value, 1000000n);
    case 'timeNanosecondValue':
      return formatTimeOfDay(value.value, 1000000000n);
    case 'decimal128Value':
      return formatDecimal(value.value, column?.datatypeExtension?.scale ?? 0);
    default:
      return value.value;
  }
}
