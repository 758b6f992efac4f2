/**
 * Core data model types for arff-sql.
 *
 * Immutable, readonly types. The attribute type is a closed union so that every
 * switch over it is checked for exhaustiveness.
 */

// === Attribute Types ===

export type AttributeType = Attribute['type'];

export type Attribute =
  | NumericAttribute
  | RealAttribute
  | IntegerAttribute
  | StringAttribute
  | DateAttribute
  | NominalAttribute;

export interface NumericAttribute {
  readonly type: 'numeric';
  readonly name: string;
}

export interface RealAttribute {
  readonly type: 'real';
  readonly name: string;
}

export interface IntegerAttribute {
  readonly type: 'integer';
  readonly name: string;
}

export interface StringAttribute {
  readonly type: 'string';
  readonly name: string;
}

export interface DateAttribute {
  readonly type: 'date';
  readonly name: string;
  readonly dateFormat: string;
}

export interface NominalAttribute {
  readonly type: 'nominal';
  readonly name: string;
  readonly acceptedValues: readonly string[];
}

export const DEFAULT_DATE_FORMAT = '%Y-%m-%dT%H:%M:%S';

// === Row Types ===

/**
 * One parsed field. `value` is null when the field is missing or could not be parsed.
 * The `type` tag repeats the attribute's type so that a switch narrows both.
 */
export type Field =
  | NumberField<NumericAttribute>
  | NumberField<RealAttribute>
  | NumberField<IntegerAttribute>
  | TextField<StringAttribute>
  | TextField<NominalAttribute>
  | DateField;

export interface NumberField<A extends NumericAttribute | RealAttribute | IntegerAttribute> {
  readonly type: A['type'];
  readonly attribute: A;
  readonly value: number | null;
}

export interface TextField<A extends StringAttribute | NominalAttribute> {
  readonly type: A['type'];
  readonly attribute: A;
  readonly value: string | null;
}

export interface DateField {
  readonly type: 'date';
  readonly attribute: DateAttribute;
  readonly value: Date | null;
}

/** One data record, one field per declared attribute, in declaration order. */
export type Row = readonly Field[];

export type FieldValue = Field['value'];

// === Diagnostics ===

export type DiagnosticKind =
  | 'bad-declaration'
  | 'unknown-declaration'
  | 'late-declaration'
  | 'unexpected-line'
  | 'bad-field'
  | 'bad-nominal'
  | 'bad-date'
  | 'field-count'
  | 'missing-relation'
  | 'missing-data'
  | 'no-attributes';

/**
 * A recoverable problem found while parsing. Processing always continues.
 */
export interface ParseDiagnostic {
  readonly kind: DiagnosticKind;
  /** 1-based input line number */
  readonly line: number;
  readonly message: string;
}

export type DiagnosticHandler = (diagnostic: ParseDiagnostic) => void;

// === Helpers ===

/**
 * Field values keyed by attribute name.
 */
export function rowToObject(row: Row): Record<string, FieldValue> {
  const result: Record<string, FieldValue> = {};
  for (const field of row) {
    result[field.attribute.name] = field.value;
  }
  return result;
}
