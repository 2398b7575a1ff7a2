/**
 * Type-safe value wrapper for every primitive the store accepts
 * The case (kind) fixes the semantic type; nothing is coerced between cases.
 * 64-bit and wider integers are bigint, narrower ones are number.
 */
export type Value =
  | { readonly kind: 'Boolean'; readonly value: boolean }
  | { readonly kind: 'Int8'; readonly value: number }
  | { readonly kind: 'Int16'; readonly value: number }
  | { readonly kind: 'Int32'; readonly value: number }
  | { readonly kind: 'Int64'; readonly value: bigint }
  | { readonly kind: 'Uint8'; readonly value: number }
  | { readonly kind: 'Uint16'; readonly value: number }
  | { readonly kind: 'Uint32'; readonly value: number }
  | { readonly kind: 'Uint64'; readonly value: bigint }
  | { readonly kind: 'Float32'; readonly value: number }
  | { readonly kind: 'Float64'; readonly value: number }
  | { readonly kind: 'Binary'; readonly value: Uint8Array }
  | { readonly kind: 'String'; readonly value: string }
  | { readonly kind: 'Date'; readonly value: number }          // Days since Unix epoch
  | { readonly kind: 'Datetime'; readonly value: bigint }      // Milliseconds since Unix epoch
  | { readonly kind: 'TimestampSecond'; readonly value: bigint }
  | { readonly kind: 'TimestampMillisecond'; readonly value: bigint }
  | { readonly kind: 'TimestampMicrosecond'; readonly value: bigint }
  | { readonly kind: 'TimestampNanosecond'; readonly value: bigint }
  | { readonly kind: 'TimeSecond'; readonly value: number }    // Time of day, no date
  | { readonly kind: 'TimeMillisecond'; readonly value: number }
  | { readonly kind: 'TimeMicrosecond'; readonly value: bigint }
  | { readonly kind: 'TimeNanosecond'; readonly value: bigint }
  | { readonly kind: 'Decimal128'; readonly value: bigint }    // Unscaled; precision and scale are on the column
  | { readonly kind: 'Json'; readonly value: string }
  | { readonly kind: 'Null' };

export type ValueKind = Value['kind'];

const NULL_VALUE: Value = { kind: 'Null' };

/**
 * Value constructors, one per case
 */
export const Value = {
  boolean: (value: boolean): Value => ({ kind: 'Boolean', value }),
  int8: (value: number): Value => ({ kind: 'Int8', value }),
  int16: (value: number): Value => ({ kind: 'Int16', value }),
  int32: (value: number): Value => ({ kind: 'Int32', value }),
  int64: (value: bigint): Value => ({ kind: 'Int64', value }),
  uint8: (value: number): Value => ({ kind: 'Uint8', value }),
  uint16: (value: number): Value => ({ kind: 'Uint16', value }),
  uint32: (value: number): Value => ({ kind: 'Uint32', value }),
  uint64: (value: bigint): Value => ({ kind: 'Uint64', value }),
  float32: (value: number): Value => ({ kind: 'Float32', value }),
  float64: (value: number): Value => ({ kind: 'Float64', value }),
  binary: (value: Uint8Array): Value => ({ kind: 'Binary', value }),
  string: (value: string): Value => ({ kind: 'String', value }),
  date: (days: number): Value => ({ kind: 'Date', value: days }),
  datetime: (millis: bigint): Value => ({ kind: 'Datetime', value: millis }),
  timestampSecond: (value: bigint): Value => ({ kind: 'TimestampSecond', value }),
  timestampMillisecond: (value: bigint): Value => ({ kind: 'TimestampMillisecond', value }),
  timestampMicrosecond: (value: bigint): Value => ({ kind: 'TimestampMicrosecond', value }),
  timestampNanosecond: (value: bigint): Value => ({ kind: 'TimestampNanosecond', value }),
  timeSecond: (value: number): Value => ({ kind: 'TimeSecond', value }),
  timeMillisecond: (value: number): Value => ({ kind: 'TimeMillisecond', value }),
  timeMicrosecond: (value: bigint): Value => ({ kind: 'TimeMicrosecond', value }),
  timeNanosecond: (value: bigint): Value => ({ kind: 'TimeNanosecond', value }),
  decimal128: (unscaled: bigint): Value => ({ kind: 'Decimal128', value: unscaled }),
  json: (text: string): Value => ({ kind: 'Json', value: text }),
  null: (): Value => NULL_VALUE,
};

export function isNull(value: Value): boolean {
  return value.kind === 'Null';
}

/**
 * Render a value as Kind(payload) for diagnostics
 * e.g. Int32(42), String("test"), Binary([1, 2]), Null
 */
export function describeValue(value: Value): string {
  switch (value.kind) {
    case 'Null':
      return 'Null';
    case 'String':
    case 'Json':
      return `${value.kind}(${JSON.stringify(value.value)})`;
    case 'Binary':
      return `Binary([${Array.from(value.value).join(', ')}])`;
    default:
      return `${value.kind}(${String(value.value)})`;
  }
}
