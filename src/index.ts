// Core data model
export type {
  Attribute,
  AttributeType,
  NumericAttribute,
  RealAttribute,
  IntegerAttribute,
  StringAttribute,
  DateAttribute,
  NominalAttribute,
  Field,
  FieldValue,
  Row,
  DiagnosticKind,
  ParseDiagnostic,
  DiagnosticHandler,
} from './model.js';

export { DEFAULT_DATE_FORMAT, rowToObject } from './model.js';

// Errors
export { ArffError, InputError, AttributeDeclarationError, DateFormatError } from './errors.js';

// Attribute declarations
export { parseAttribute, tokenizeDeclaration } from './attribute.js';

// Date formats
export type { CompiledDateFormat } from './dateFormat.js';
export { compileDateFormat, formatTimestamp } from './dateFormat.js';

// Row parsing
export type { RowParser, ReportDiagnostic, RawField } from './rowParser.js';
export { createRowParser, splitFields, readQuoted, unquote, isMissing } from './rowParser.js';

// Dataset parser
export type { ParserState, DatasetParserOptions } from './datasetParser.js';
export { DatasetParser, DEFAULT_RELATION, formatDiagnostic, logDiagnostic } from './datasetParser.js';

// Formatters
export type { DatasetFormatter } from './formatter.js';
export { CollectingFormatter } from './formatter.js';

// SQL generation
export type { SqlDialect, SqlStatement } from './sqlGenerator.js';
export {
  SqlFormatter,
  mysqlDialect,
  postgresDialect,
  dialects,
  sanitizeIdentifier,
  escapeIdentifier,
  quoteIdentifier,
  quoteString,
  columnType,
  formatValue,
  formatDecimal,
  generateComment,
  generateCreateTable,
  generateInsert,
  generateParameterizedInsert,
} from './sqlGenerator.js';

// JSON Lines output
export type { JsonSchema } from './jsonSchemaGenerator.js';
export { generateJsonSchema } from './jsonSchemaGenerator.js';
export type { JsonLinesFormatterOptions } from './jsonFormatter.js';
export { JsonLinesFormatter } from './jsonFormatter.js';

// Conversion drivers
export type { ConvertOptions, ConvertResult } from './converter.js';
export { convertLines, convertText, convertFile } from './converter.js';

// Database loading
export type { DbClient } from './databaseLoader.js';
export { DatabaseLoader } from './databaseLoader.js';

// Command line
export type { CliIo } from './program.js';
export { runCli } from './program.js';
