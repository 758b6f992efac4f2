import type { Attribute, Row } from "./model.js";
import type { DatasetFormatter } from "./formatter.js";
import { generateJsonSchema, type JsonSchema } from "./jsonSchemaGenerator.js";

export interface JsonLinesFormatterOptions {
	/** Called once with the schema of a row, when the attribute list is final */
	readonly onSchema?: (schema: JsonSchema) => void;
}

/**
 * Renders each row as one JSON object per line, keyed by attribute name.
 * Dates become ISO-8601 strings. Comments have no JSON Lines form and are dropped.
 */
export class JsonLinesFormatter implements DatasetFormatter {
	constructor(
		private readonly _write: (text: string) => void,
		private readonly _options: JsonLinesFormatterOptions = {}
	) { }

	formatComment(_text: string): void { }

	formatCreate(relation: string, attributes: readonly Attribute[]): void {
		this._options.onSchema?.(generateJsonSchema(relation, attributes));
	}

	formatInstance(_relation: string, row: Row): void {
		const obj: Record<string, string | number | null> = {};
		for (const field of row) {
			obj[field.attribute.name] = field.value instanceof Date ? field.value.toISOString() : field.value;
		}
		this._write(`${JSON.stringify(obj)}\n`);
	}
}
