import type { Attribute, AttributeType, Field, Row } from './model.js';
import type { DatasetFormatter } from './formatter.js';
import { formatTimestamp } from './dateFormat.js';
import { assertNever } from './rowParser.js';

/**
 * Target dialect settings: identifier quoting, string escaping and the column
 * type spelled for each attribute type.
 */
export interface SqlDialect {
  readonly name: string;
  readonly identifierQuote: string;
  /** Whether backslashes in string literals must be escaped (MySQL default mode) */
  readonly escapeBackslashes: boolean;
  readonly columnTypes: Readonly<Record<Exclude<AttributeType, 'nominal'>, string>>;
  /** Column type for a nominal attribute whose longest accepted value has `maxLength` characters */
  readonly nominalType: (maxLength: number) => string;
}

export const mysqlDialect: SqlDialect = {
  name: 'mysql',
  identifierQuote: '`',
  escapeBackslashes: true,
  columnTypes: {
    numeric: 'decimal(20,5)',
    real: 'decimal(20,5)',
    integer: 'int',
    date: 'timestamp',
    string: 'varchar(72)',
  },
  nominalType: maxLength => `varchar(${maxLength})`,
};

export const postgresDialect: SqlDialect = {
  name: 'postgres',
  identifierQuote: '"',
  escapeBackslashes: false,
  columnTypes: {
    numeric: 'decimal(20,5)',
    real: 'decimal(20,5)',
    integer: 'integer',
    date: 'timestamp',
    string: 'varchar(72)',
  },
  nominalType: maxLength => `varchar(${maxLength})`,
};

export const dialects: Readonly<Record<'mysql' | 'postgres', SqlDialect>> = {
  mysql: mysqlDialect,
  postgres: postgresDialect,
};

/**
 * Replace every character outside [A-Za-z0-9_$] with an underscore.
 */
export function sanitizeIdentifier(name: string): string {
  return name.replace(/[^a-zA-Z0-9_$]/g, '_');
}

/**
 * Wrap an identifier in quotes, doubling any embedded quote character.
 */
export function escapeIdentifier(name: string, quote = '"'): string {
  return `${quote}${name.split(quote).join(quote + quote)}${quote}`;
}

export function quoteIdentifier(dialect: SqlDialect, name: string): string {
  return escapeIdentifier(sanitizeIdentifier(name), dialect.identifierQuote);
}

export function quoteString(dialect: SqlDialect, text: string): string {
  const escaped = dialect.escapeBackslashes ? text.replace(/\\/g, '\\\\') : text;
  return `'${escaped.replace(/'/g, "''")}'`;
}

export function columnType(dialect: SqlDialect, attribute: Attribute): string {
  switch (attribute.type) {
    case 'numeric':
    case 'real':
    case 'integer':
    case 'date':
    case 'string':
      return dialect.columnTypes[attribute.type];
    case 'nominal':
      return dialect.nominalType(Math.max(1, ...attribute.acceptedValues.map(value => value.length)));
    default:
      return assertNever(attribute);
  }
}

/**
 * Render a number so that decimals always carry a fractional part (85 -> 85.0).
 */
export function formatDecimal(value: number): string {
  const text = String(value);
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

/**
 * Render one field as a SQL literal. Quoting follows the attribute's declared type.
 */
export function formatValue(dialect: SqlDialect, field: Field): string {
  switch (field.type) {
    case 'numeric':
    case 'real':
      return field.value === null ? 'NULL' : formatDecimal(field.value);
    case 'integer':
      return field.value === null ? 'NULL' : String(field.value);
    case 'string':
    case 'nominal':
      return field.value === null ? 'NULL' : quoteString(dialect, field.value);
    case 'date':
      return field.value === null ? 'NULL' : quoteString(dialect, formatTimestamp(field.value));
    default:
      return assertNever(field);
  }
}

export function generateCreateTable(dialect: SqlDialect, relation: string, attributes: readonly Attribute[]): string {
  if (attributes.length === 0) {
    throw new Error(`Table ${relation} needs at least one column`);
  }
  const columns = attributes.map(attr => `\t${quoteIdentifier(dialect, attr.name)} ${columnType(dialect, attr)}`);
  return `CREATE TABLE ${quoteIdentifier(dialect, relation)} (\n${columns.join(',\n')}\n);\n\n`;
}

export function generateInsert(dialect: SqlDialect, relation: string, row: Row): string {
  const values = row.map(field => formatValue(dialect, field));
  return `INSERT INTO ${quoteIdentifier(dialect, relation)} VALUES(${values.join(', ')});\n`;
}

export function generateComment(text: string): string {
  const trimmed = text.trim();
  return trimmed ? `-- ${trimmed}\n` : '--\n';
}

/**
 * Renders parser events as SQL DDL and DML through `write`, one statement per event.
 */
export class SqlFormatter implements DatasetFormatter {
  constructor(
    private readonly _write: (text: string) => void,
    private readonly _dialect: SqlDialect = mysqlDialect
  ) { }

  get dialect(): SqlDialect {
    return this._dialect;
  }

  formatComment(text: string): void {
    this._write(generateComment(text));
  }

  formatCreate(relation: string, attributes: readonly Attribute[]): void {
    this._write(generateCreateTable(this._dialect, relation, attributes));
  }

  formatInstance(relation: string, row: Row): void {
    this._write(generateInsert(this._dialect, relation, row));
  }
}

export interface SqlStatement {
  sql: string;
  params: unknown[];
}

/**
 * Generate a PostgreSQL-style parameterized INSERT ($1, $2, ...) for one row.
 * Dates are passed as timestamp text so that no time zone conversion applies.
 */
export function generateParameterizedInsert(dialect: SqlDialect, relation: string, row: Row): SqlStatement {
  const placeholders = row.map((_, i) => `$${i + 1}`);
  const params = row.map(field => field.value instanceof Date ? formatTimestamp(field.value) : field.value);
  const sql = `INSERT INTO ${quoteIdentifier(dialect, relation)} VALUES(${placeholders.join(', ')});`;

  return { sql, params };
}
