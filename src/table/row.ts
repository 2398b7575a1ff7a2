import { Value } from './value';
import { defaultAccessPolicy, type TypeMismatchPolicy } from './access-policy';

const MISMATCH: unique symbol = Symbol('mismatch');
type Read<T> = T | typeof MISMATCH;

/**
 * One accessor family: the name used in mismatch reports and the cases it accepts
 * Null is handled before read() is called
 */
interface ValueFamily<T> {
  readonly name: string;
  read(value: Value): Read<T>;
  take?(value: Value): Read<T>;
}

const utf8 = (text: string): Uint8Array => Buffer.from(text, 'utf8');

const BOOL: ValueFamily<boolean> = {
  name: 'boolean',
  read: v => (v.kind === 'Boolean' ? v.value : MISMATCH),
};
const I8: ValueFamily<number> = { name: 'i8', read: v => (v.kind === 'Int8' ? v.value : MISMATCH) };
const I16: ValueFamily<number> = { name: 'i16', read: v => (v.kind === 'Int16' ? v.value : MISMATCH) };
const I32: ValueFamily<number> = { name: 'i32', read: v => (v.kind === 'Int32' ? v.value : MISMATCH) };
const I64: ValueFamily<bigint> = { name: 'i64', read: v => (v.kind === 'Int64' ? v.value : MISMATCH) };
const U8: ValueFamily<number> = { name: 'u8', read: v => (v.kind === 'Uint8' ? v.value : MISMATCH) };
const U16: ValueFamily<number> = { name: 'u16', read: v => (v.kind === 'Uint16' ? v.value : MISMATCH) };
const U32: ValueFamily<number> = { name: 'u32', read: v => (v.kind === 'Uint32' ? v.value : MISMATCH) };
const U64: ValueFamily<bigint> = { name: 'u64', read: v => (v.kind === 'Uint64' ? v.value : MISMATCH) };
const F32: ValueFamily<number> = { name: 'f32', read: v => (v.kind === 'Float32' ? v.value : MISMATCH) };
const F64: ValueFamily<number> = { name: 'f64', read: v => (v.kind === 'Float64' ? v.value : MISMATCH) };

// Text is readable as bytes: JSON columns are fed either String or Json values
const BINARY: ValueFamily<Uint8Array> = {
  name: 'binary',
  read(v) {
    switch (v.kind) {
      case 'Binary':
        return new Uint8Array(v.value);
      case 'String':
      case 'Json':
        return utf8(v.value);
      default:
        return MISMATCH;
    }
  },
  take(v) {
    switch (v.kind) {
      case 'Binary':
        return v.value;
      case 'String':
      case 'Json':
        return utf8(v.value);
      default:
        return MISMATCH;
    }
  },
};

const STRING: ValueFamily<string> = { name: 'string', read: v => (v.kind === 'String' ? v.value : MISMATCH) };
const JSON_TEXT: ValueFamily<string> = { name: 'json', read: v => (v.kind === 'Json' ? v.value : MISMATCH) };
const DATE: ValueFamily<number> = { name: 'date', read: v => (v.kind === 'Date' ? v.value : MISMATCH) };
const DATETIME: ValueFamily<bigint> = { name: 'datetime', read: v => (v.kind === 'Datetime' ? v.value : MISMATCH) };

// Resolution comes from the schema; the raw integer is returned as stored
const TIMESTAMP: ValueFamily<bigint> = {
  name: 'timestamp',
  read(v) {
    switch (v.kind) {
      case 'TimestampSecond':
      case 'TimestampMillisecond':
      case 'TimestampMicrosecond':
      case 'TimestampNanosecond':
        return v.value;
      default:
        return MISMATCH;
    }
  },
};

const TIME32: ValueFamily<number> = {
  name: 'time32',
  read: v => (v.kind === 'TimeSecond' || v.kind === 'TimeMillisecond' ? v.value : MISMATCH),
};
const TIME64: ValueFamily<bigint> = {
  name: 'time64',
  read: v => (v.kind === 'TimeMicrosecond' || v.kind === 'TimeNanosecond' ? v.value : MISMATCH),
};
const DECIMAL128: ValueFamily<bigint> = {
  name: 'decimal128',
  read: v => (v.kind === 'Decimal128' ? v.value : MISMATCH),
};

/**
 * A data row with type-safe value access
 * Values are positionally aligned with the table schema's columns; the producer
 * is responsible for emitting them in schema order.
 *
 * Checked accessors return undefined for an out-of-range index or a Null value.
 * Unchecked accessors skip the bounds check: the caller guarantees index < length.
 * A value of another case goes to the row's TypeMismatchPolicy.
 */
export class Row {
  private readonly values: Value[];

  constructor(values: Value[] = [], private readonly policy?: TypeMismatchPolicy) {
    this.values = values;
  }

  /**
   * Create a row directly from values, taking ownership of the array
   */
  static fromValues(values: Value[], policy?: TypeMismatchPolicy): Row {
    return new Row(values, policy);
  }

  get length(): number {
    return this.values.length;
  }

  isEmpty(): boolean {
    return this.values.length === 0;
  }

  addValue(value: Value): this {
    this.values.push(value);
    return this;
  }

  addValues(values: Value[]): this {
    this.values.push(...values);
    return this;
  }

  addValuesIter(values: Iterable<Value>): this {
    for (const value of values) {
      this.values.push(value);
    }
    return this;
  }

  /**
   * Raw value at index, without any type interpretation
   */
  get(index: number): Value | undefined {
    return this.inBounds(index) ? this.values[index] : undefined;
  }

  getBool(index: number): boolean | undefined { return this.checked(index, BOOL); }
  getBoolUnchecked(index: number): boolean | undefined { return this.readAt(index, BOOL); }

  getI8(index: number): number | undefined { return this.checked(index, I8); }
  getI8Unchecked(index: number): number | undefined { return this.readAt(index, I8); }

  getI16(index: number): number | undefined { return this.checked(index, I16); }
  getI16Unchecked(index: number): number | undefined { return this.readAt(index, I16); }

  getI32(index: number): number | undefined { return this.checked(index, I32); }
  getI32Unchecked(index: number): number | undefined { return this.readAt(index, I32); }

  getI64(index: number): bigint | undefined { return this.checked(index, I64); }
  getI64Unchecked(index: number): bigint | undefined { return this.readAt(index, I64); }

  getU8(index: number): number | undefined { return this.checked(index, U8); }
  getU8Unchecked(index: number): number | undefined { return this.readAt(index, U8); }

  getU16(index: number): number | undefined { return this.checked(index, U16); }
  getU16Unchecked(index: number): number | undefined { return this.readAt(index, U16); }

  getU32(index: number): number | undefined { return this.checked(index, U32); }
  getU32Unchecked(index: number): number | undefined { return this.readAt(index, U32); }

  getU64(index: number): bigint | undefined { return this.checked(index, U64); }
  getU64Unchecked(index: number): bigint | undefined { return this.readAt(index, U64); }

  getF32(index: number): number | undefined { return this.checked(index, F32); }
  getF32Unchecked(index: number): number | undefined { return this.readAt(index, F32); }

  getF64(index: number): number | undefined { return this.checked(index, F64); }
  getF64Unchecked(index: number): number | undefined { return this.readAt(index, F64); }

  /**
   * Copy of the bytes at index; String and Json values read as their UTF-8 bytes
   */
  getBinary(index: number): Uint8Array | undefined { return this.checked(index, BINARY); }
  getBinaryUnchecked(index: number): Uint8Array | undefined { return this.readAt(index, BINARY); }

  /**
   * Move the bytes out without copying and leave Null in the slot
   */
  takeBinary(index: number): Uint8Array | undefined {
    return this.inBounds(index) ? this.takeAt(index, BINARY) : undefined;
  }
  takeBinaryUnchecked(index: number): Uint8Array | undefined { return this.takeAt(index, BINARY); }

  getString(index: number): string | undefined { return this.checked(index, STRING); }
  getStringUnchecked(index: number): string | undefined { return this.readAt(index, STRING); }

  takeString(index: number): string | undefined {
    return this.inBounds(index) ? this.takeAt(index, STRING) : undefined;
  }
  takeStringUnchecked(index: number): string | undefined { return this.takeAt(index, STRING); }

  getJson(index: number): string | undefined { return this.checked(index, JSON_TEXT); }
  getJsonUnchecked(index: number): string | undefined { return this.readAt(index, JSON_TEXT); }

  takeJson(index: number): string | undefined {
    return this.inBounds(index) ? this.takeAt(index, JSON_TEXT) : undefined;
  }
  takeJsonUnchecked(index: number): string | undefined { return this.takeAt(index, JSON_TEXT); }

  getDate(index: number): number | undefined { return this.checked(index, DATE); }
  getDateUnchecked(index: number): number | undefined { return this.readAt(index, DATE); }

  getDatetime(index: number): bigint | undefined { return this.checked(index, DATETIME); }
  getDatetimeUnchecked(index: number): bigint | undefined { return this.readAt(index, DATETIME); }

  /**
   * Raw timestamp at any of the four resolutions
   */
  getTimestamp(index: number): bigint | undefined { return this.checked(index, TIMESTAMP); }
  getTimestampUnchecked(index: number): bigint | undefined { return this.readAt(index, TIMESTAMP); }

  getTime32(index: number): number | undefined { return this.checked(index, TIME32); }
  getTime32Unchecked(index: number): number | undefined { return this.readAt(index, TIME32); }

  getTime64(index: number): bigint | undefined { return this.checked(index, TIME64); }
  getTime64Unchecked(index: number): bigint | undefined { return this.readAt(index, TIME64); }

  getDecimal128(index: number): bigint | undefined { return this.checked(index, DECIMAL128); }
  getDecimal128Unchecked(index: number): bigint | undefined { return this.readAt(index, DECIMAL128); }

  private inBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.values.length;
  }

  private checked<T>(index: number, family: ValueFamily<T>): T | undefined {
    return this.inBounds(index) ? this.readAt(index, family) : undefined;
  }

  private readAt<T>(index: number, family: ValueFamily<T>): T | undefined {
    const value = this.values[index];
    if (value.kind === 'Null') {
      return undefined;
    }
    return this.resolve(index, family, value, family.read(value));
  }

  private takeAt<T>(index: number, family: ValueFamily<T>): T | undefined {
    const value = this.values[index];
    this.values[index] = Value.null();
    if (value.kind === 'Null') {
      return undefined;
    }
    const read = family.take ?? family.read;
    return this.resolve(index, family, value, read(value));
  }

  private resolve<T>(index: number, family: ValueFamily<T>, value: Value, result: Read<T>): T | undefined {
    if (result === MISMATCH) {
      (this.policy ?? defaultAccessPolicy()).onMismatch(index, family.name, value);
      return undefined;
    }
    return result;
  }
}
