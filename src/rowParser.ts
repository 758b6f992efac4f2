import type {
	Attribute,
	DateAttribute,
	DateField,
	DiagnosticKind,
	Field,
	IntegerAttribute,
	NominalAttribute,
	NumberField,
	NumericAttribute,
	RealAttribute,
	Row,
	StringAttribute,
	TextField,
} from "./model.js";
import { compileDateFormat } from "./dateFormat.js";

export type ReportDiagnostic = (kind: DiagnosticKind, message: string) => void;

export type RowParser = (line: string, report: ReportDiagnostic) => Row;

type FieldConverter = (raw: RawField | undefined, report: ReportDiagnostic) => Field;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

/**
 * One comma separated field of a data line. `text` is trimmed, with its quotes
 * removed and backslash escapes resolved when the field was quoted.
 */
export interface RawField {
	readonly text: string;
	readonly quoted: boolean;
}

/**
 * Read a quoted value starting at the quote character at `start`.
 * Returns undefined when the closing quote is missing.
 */
export function readQuoted(text: string, start: number): { text: string; end: number } | undefined {
	const quote = text[start];
	let value = "";
	let i = start + 1;
	while (i < text.length && text[i] !== quote) {
		if (text[i] === "\\" && i + 1 < text.length) {
			i++;
		}
		value += text[i];
		i++;
	}
	if (i >= text.length) {
		return undefined;
	}
	return { text: value, end: i + 1 };
}

/**
 * Split a line on commas. A field whose first non-blank character is `'` or `"`
 * runs to the matching quote and may contain commas.
 */
export function splitFields(line: string): RawField[] {
	const fields: RawField[] = [];
	let i = 0;
	for (;;) {
		while (i < line.length && (line[i] === " " || line[i] === "\t")) {
			i++;
		}

		let field: RawField;
		const quoted = line[i] === "'" || line[i] === '"' ? readQuoted(line, i) : undefined;
		if (quoted) {
			let end = line.indexOf(",", quoted.end);
			if (end === -1) {
				end = line.length;
			}
			// anything between the closing quote and the comma is kept as is
			field = { text: quoted.text + line.slice(quoted.end, end).trim(), quoted: true };
			i = end;
		} else {
			let end = line.indexOf(",", i);
			if (end === -1) {
				end = line.length;
			}
			field = { text: line.slice(i, end).trim(), quoted: false };
			i = end;
		}
		fields.push(field);

		if (i >= line.length) {
			return fields;
		}
		i++;
	}
}

/**
 * Remove one level of matching surrounding quotes and resolve backslash escapes inside them.
 */
export function unquote(text: string): string {
	if (text[0] !== "'" && text[0] !== '"') {
		return text;
	}
	const quoted = readQuoted(text, 0);
	return quoted && quoted.end === text.length ? quoted.text : text;
}

export function isMissing(field: RawField): boolean {
	return field.text === "?";
}

/**
 * Build a parser for data lines. `columns` holds one entry per declared column;
 * a null entry is a column whose declaration was rejected and whose raw field is skipped.
 */
export function createRowParser(columns: readonly (Attribute | null)[]): RowParser {
	const converters = columns.map(column => (column ? createFieldConverter(column) : null));

	return (line, report) => {
		const raw = splitFields(line);
		if (raw.length < columns.length) {
			report("field-count", `expected ${columns.length} fields but found ${raw.length}, missing fields are null`);
		} else if (raw.length > columns.length) {
			report("field-count", `expected ${columns.length} fields but found ${raw.length}, extra fields ignored`);
		}

		const row: Field[] = [];
		converters.forEach((convert, index) => {
			if (convert) {
				row.push(convert(raw[index], report));
			}
		});
		return row;
	};
}

function createFieldConverter(attribute: Attribute): FieldConverter {
	switch (attribute.type) {
		case "numeric":
			return (raw, report) => numberField(attribute, raw, report, parseDecimal);
		case "real":
			return (raw, report) => numberField(attribute, raw, report, parseDecimal);
		case "integer":
			return (raw, report) => numberField(attribute, raw, report, parseInteger);
		case "string":
			return raw => stringField(attribute, raw);
		case "nominal":
			return (raw, report) => nominalField(attribute, raw, report);
		case "date":
			return dateFieldConverter(attribute);
		default:
			return assertNever(attribute);
	}
}

function numberField<A extends NumericAttribute | RealAttribute | IntegerAttribute>(
	attribute: A,
	raw: RawField | undefined,
	report: ReportDiagnostic,
	parse: (text: string) => number | undefined
): NumberField<A> {
	if (raw === undefined || isMissing(raw)) {
		return { type: attribute.type, attribute, value: null };
	}
	const value = parse(raw.text);
	if (value === undefined) {
		report("bad-field", `Could not parse field ${raw.text} for ${attribute.type} attribute ${attribute.name}`);
		return { type: attribute.type, attribute, value: null };
	}
	return { type: attribute.type, attribute, value };
}

function parseDecimal(text: string): number | undefined {
	if (!DECIMAL.test(text)) {
		return undefined;
	}
	const value = Number(text);
	return Number.isFinite(value) ? value : undefined;
}

function parseInteger(text: string): number | undefined {
	if (!INTEGER.test(text)) {
		return undefined;
	}
	const value = Number(text);
	return Number.isSafeInteger(value) ? value : undefined;
}

function stringField(attribute: StringAttribute, raw: RawField | undefined): TextField<StringAttribute> {
	if (raw === undefined || isMissing(raw)) {
		return { type: "string", attribute, value: null };
	}
	return { type: "string", attribute, value: raw.text };
}

function nominalField(
	attribute: NominalAttribute,
	raw: RawField | undefined,
	report: ReportDiagnostic
): TextField<NominalAttribute> {
	if (raw === undefined || isMissing(raw)) {
		return { type: "nominal", attribute, value: null };
	}
	const value = raw.text;
	if (!attribute.acceptedValues.includes(value)) {
		report(
			"bad-nominal",
			`Bad value ${value} for nominal attribute ${attribute.name}, expected one of {${attribute.acceptedValues.join(",")}}`
		);
		return { type: "nominal", attribute, value: null };
	}
	return { type: "nominal", attribute, value };
}

function dateFieldConverter(attribute: DateAttribute): FieldConverter {
	const format = compileDateFormat(attribute.dateFormat);

	return (raw, report): DateField => {
		if (raw === undefined || isMissing(raw)) {
			return { type: "date", attribute, value: null };
		}
		const value = format.parse(raw.text);
		if (value === undefined) {
			report("bad-date", `Bad date format for attribute ${attribute.name}: ${format.pattern} | ${raw.text}`);
			return { type: "date", attribute, value: null };
		}
		return { type: "date", attribute, value };
	};
}

export function assertNever(value: never): never {
	throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
