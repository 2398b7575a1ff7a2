import { ColumnDataType, isTimestampType, SemanticType, type DataTypeExtension } from './types';

/**
 * Table column definition
 * Immutable once added to a schema
 */
export interface Column {
  readonly name: string;
  readonly dataType: ColumnDataType;
  readonly semanticType: SemanticType;
  readonly nullable: boolean;
  readonly dataTypeExtension?: DataTypeExtension;  // Present for types that need extra parameters
}

/**
 * Represents a time-series table: a name and its ordered columns
 * Built once through TableSchema.builder() and shared read-only by every row
 * produced against it
 */
export class TableSchema {
  readonly columns: readonly Column[];

  constructor(readonly name: string, columns: Column[]) {
    this.columns = Object.freeze(columns.map(column => Object.freeze({ ...column })));
  }

  static builder(name?: string): TableSchemaBuilder {
    const builder = new TableSchemaBuilder();
    return name === undefined ? builder : builder.name(name);
  }

  /**
   * Position of a column by name, or -1
   */
  columnIndex(name: string): number {
    return this.columns.findIndex(column => column.name === name);
  }
}

/**
 * Fluent accumulator for TableSchema
 * Does not reject duplicate column names or a missing/repeated time index;
 * use validateSchema() where that matters.
 */
export class TableSchemaBuilder {
  private tableName?: string;
  private readonly columns: Column[] = [];

  name(name: string): this {
    this.tableName = name;
    return this;
  }

  /**
   * Add a tag column (for indexing and grouping)
   */
  addTag(name: string, dataType: ColumnDataType, nullable: boolean): this {
    return this.push({ name, dataType, semanticType: SemanticType.Tag, nullable });
  }

  /**
   * Add the time index column; always non-null
   */
  addTimestamp(name: string, dataType: ColumnDataType): this {
    return this.push({ name, dataType, semanticType: SemanticType.Timestamp, nullable: false });
  }

  /**
   * Add a field column (measurement values)
   */
  addField(name: string, dataType: ColumnDataType, nullable: boolean): this {
    return this.push({ name, dataType, semanticType: SemanticType.Field, nullable });
  }

  addDecimal128Field(name: string, precision: number, scale: number, nullable: boolean): this {
    return this.push({
      name,
      dataType: ColumnDataType.Decimal128,
      semanticType: SemanticType.Field,
      nullable,
      dataTypeExtension: { kind: 'decimal128', precision, scale },
    });
  }

  build(): TableSchema {
    if (this.tableName === undefined) {
      throw new Error('TableSchema requires a name');
    }
    return new TableSchema(this.tableName, this.columns);
  }

  private push(column: Column): this {
    this.columns.push(column);
    return this;
  }
}

/**
 * Report structural problems the builder lets through
 * Returns an empty list for a schema the store will accept
 */
export function validateSchema(schema: TableSchema): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();

  for (const column of schema.columns) {
    if (seen.has(column.name)) {
      problems.push(`Duplicate column name '${column.name}'`);
    }
    seen.add(column.name);
  }

  const timestamps = schema.columns.filter(c => c.semanticType === SemanticType.Timestamp);
  for (const column of timestamps) {
    if (!isTimestampType(column.dataType)) {
      problems.push(`Timestamp column '${column.name}' has non-timestamp type ${column.dataType}`);
    }
  }
  if (timestamps.length === 0) {
    problems.push(`Table '${schema.name}' has no timestamp column`);
  } else if (timestamps.length > 1) {
    problems.push(`Table '${schema.name}' has ${timestamps.length} timestamp columns: ${timestamps.map(c => c.name).join(', ')}`);
  }

  return problems;
}
