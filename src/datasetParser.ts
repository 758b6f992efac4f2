import type { Attribute, DiagnosticHandler, DiagnosticKind, ParseDiagnostic } from "./model.js";
import type { DatasetFormatter } from "./formatter.js";
import { parseAttribute } from "./attribute.js";
import { AttributeDeclarationError } from "./errors.js";
import { createRowParser, unquote, type RowParser } from "./rowParser.js";

export type ParserState = "header" | "data";

export interface DatasetParserOptions {
	/** Receives recoverable problems. Defaults to writing them to stderr. */
	readonly onDiagnostic?: DiagnosticHandler;
}

/** Relation name used when `@DATA` arrives without a `@RELATION`. */
export const DEFAULT_RELATION = "relation";

/**
 * Line-by-line state machine over an ARFF document.
 *
 * In the header it collects the relation name and the attributes. `@DATA` switches to
 * the data section once and for all, announces the schema to the formatter, and from
 * then on every non-comment line is parsed into a row and handed to the formatter.
 */
export class DatasetParser {
	private _state: ParserState = "header";
	private _relation: string | undefined;
	private readonly _columns: (Attribute | null)[] = [];
	private _rowParser: RowParser | undefined;
	private _lineNumber = 0;
	private _rowCount = 0;
	private _diagnosticCount = 0;
	private readonly _onDiagnostic: DiagnosticHandler;

	constructor(
		private readonly _formatter: DatasetFormatter,
		options: DatasetParserOptions = {}
	) {
		this._onDiagnostic = options.onDiagnostic ?? logDiagnostic;
	}

	get state(): ParserState {
		return this._state;
	}

	get relation(): string | undefined {
		return this._relation;
	}

	get attributes(): Attribute[] {
		return this._columns.filter((column): column is Attribute => column !== null);
	}

	get rowCount(): number {
		return this._rowCount;
	}

	get diagnosticCount(): number {
		return this._diagnosticCount;
	}

	/**
	 * Consume one input line. Never throws for malformed content.
	 */
	parseLine(rawLine: string): void {
		this._lineNumber++;
		const line = rawLine.replace(/^\uFEFF/, "").replace(/\r?\n$/, "").replace(/\r$/, "");
		const content = line.trimStart();

		if (content === "") {
			return;
		}
		if (content[0] === "%") {
			this._formatter.formatComment(content.slice(1));
			return;
		}
		if (content[0] === "@") {
			this._parseDeclaration(content);
			return;
		}
		if (this._state === "data") {
			// without a usable attribute there is no table to fill
			if (this._rowParser) {
				const row = this._rowParser(line, (kind, message) => this._report(kind, message));
				this._rowCount++;
				this._formatter.formatInstance(this._relationName(), row);
			}
			return;
		}
		this._report("unexpected-line", `Unexpected line encountered: ${line}`);
	}

	/**
	 * Signal the end of the input.
	 */
	finish(): void {
		if (this._state === "header") {
			this._report("missing-data", "input ended before @DATA, no table was created");
		}
	}

	private _parseDeclaration(content: string): void {
		const match = /^(\S+)\s*(.*)$/.exec(content);
		const keyword = (match?.[1] ?? content).toUpperCase();
		const value = (match?.[2] ?? "").trim();

		switch (matchKeyword(keyword)) {
			case "@RELATION":
				if (this._state === "data") {
					this._report("late-declaration", "@RELATION after @DATA ignored");
					return;
				}
				this._relation = unquote(value);
				return;
			case "@ATTRIBUTE":
				if (this._state === "data") {
					this._report("late-declaration", `@ATTRIBUTE after @DATA ignored: ${value}`);
					return;
				}
				this._declareAttribute(value);
				return;
			case "@DATA":
				if (this._state === "data") {
					this._report("late-declaration", "duplicate @DATA ignored");
					return;
				}
				this._beginData();
				return;
			default:
				this._report("unknown-declaration", `Unknown declaration ${keyword}`);
		}
	}

	private _declareAttribute(value: string): void {
		try {
			this._columns.push(parseAttribute(value));
		} catch (error) {
			if (!(error instanceof AttributeDeclarationError)) {
				throw error;
			}
			// keep the column position so data fields stay aligned
			this._columns.push(null);
			this._report("bad-declaration", `${error.message}, column skipped`);
		}
	}

	private _beginData(): void {
		if (this._relation === undefined) {
			this._report("missing-relation", `@DATA without @RELATION, using "${DEFAULT_RELATION}"`);
		}
		this._state = "data";
		const attributes = this.attributes;
		if (attributes.length === 0) {
			this._report("no-attributes", "@DATA without a usable @ATTRIBUTE, no table was created and rows are skipped");
			return;
		}
		this._rowParser = createRowParser(this._columns);
		this._formatter.formatCreate(this._relationName(), attributes);
	}

	private _relationName(): string {
		return this._relation ?? DEFAULT_RELATION;
	}

	private _report(kind: DiagnosticKind, message: string): void {
		this._diagnosticCount++;
		this._onDiagnostic({ kind, line: this._lineNumber, message });
	}
}

const KEYWORDS = ["@RELATION", "@ATTRIBUTE", "@DATA"] as const;

/**
 * Resolve an upper-cased declaration token to the keyword it abbreviates, so `@REL` is `@RELATION`.
 * The token needs at least one letter after the `@`.
 */
function matchKeyword(token: string): (typeof KEYWORDS)[number] | undefined {
	if (token.length < 2) {
		return undefined;
	}
	return KEYWORDS.find(keyword => keyword.startsWith(token));
}

export function formatDiagnostic(diagnostic: ParseDiagnostic): string {
	return `line ${diagnostic.line}: ${diagnostic.message}`;
}

export function logDiagnostic(diagnostic: ParseDiagnostic): void {
	console.error(formatDiagnostic(diagnostic));
}
