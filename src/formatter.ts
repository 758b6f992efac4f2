import type { Attribute, Row } from "./model.js";

/**
 * Rendering target for the events of a DatasetParser.
 *
 * `formatCreate` is called exactly once, after the attribute list is final and
 * before the first `formatInstance`. Rows are handed over one at a time, in input order.
 */
export interface DatasetFormatter {
	formatComment(text: string): void;
	formatCreate(relation: string, attributes: readonly Attribute[]): void;
	formatInstance(relation: string, row: Row): void;
}

/**
 * Keeps every event in memory: the header comments, the schema and all rows.
 */
export class CollectingFormatter implements DatasetFormatter {
	readonly header: string[] = [];
	readonly instances: Row[] = [];
	private _relation: string | undefined;
	private _attributes: readonly Attribute[] = [];

	get relation(): string | undefined {
		return this._relation;
	}

	get attributes(): readonly Attribute[] {
		return this._attributes;
	}

	formatComment(text: string): void {
		this.header.push(text);
	}

	formatCreate(relation: string, attributes: readonly Attribute[]): void {
		this._relation = relation;
		this._attributes = attributes;
	}

	formatInstance(_relation: string, row: Row): void {
		this.instances.push(row);
	}
}
