import { describe, test, expect } from "vitest";
import { DatasetParser, formatDiagnostic } from "./datasetParser";
import { CollectingFormatter, type DatasetFormatter } from "./formatter";
import { rowToObject, type Attribute, type ParseDiagnostic, type Row } from "./model";

type Event =
	| { type: "comment"; text: string }
	| { type: "create"; relation: string; attributes: readonly Attribute[] }
	| { type: "instance"; relation: string; row: Row };

class RecordingFormatter implements DatasetFormatter {
	readonly events: Event[] = [];

	formatComment(text: string): void {
		this.events.push({ type: "comment", text });
	}

	formatCreate(relation: string, attributes: readonly Attribute[]): void {
		this.events.push({ type: "create", relation, attributes });
	}

	formatInstance(relation: string, row: Row): void {
		this.events.push({ type: "instance", relation, row });
	}
}

function parseAll(lines: string[], formatter: DatasetFormatter) {
	const diagnostics: ParseDiagnostic[] = [];
	const parser = new DatasetParser(formatter, { onDiagnostic: d => diagnostics.push(d) });
	for (const line of lines) {
		parser.parseLine(line);
	}
	parser.finish();
	return { parser, diagnostics };
}

const weather = [
	"% Weather data",
	"@RELATION weather",
	"",
	"@ATTRIBUTE outlook {sunny,overcast,rainy}",
	"@ATTRIBUTE temperature NUMERIC",
	"@DATA",
	"sunny,85.0",
	"overcast,?",
];

describe("DatasetParser", () => {
	test("emits comment, schema and rows in order", () => {
		const formatter = new RecordingFormatter();
		const { parser, diagnostics } = parseAll(weather, formatter);

		expect(formatter.events.map(e => e.type)).toEqual(["comment", "create", "instance", "instance"]);
		expect(formatter.events[0]).toEqual({ type: "comment", text: " Weather data" });
		expect(formatter.events[1]).toEqual({
			type: "create",
			relation: "weather",
			attributes: [
				{ type: "nominal", name: "outlook", acceptedValues: ["sunny", "overcast", "rainy"] },
				{ type: "numeric", name: "temperature" },
			],
		});
		expect(parser.state).toBe("data");
		expect(parser.rowCount).toBe(2);
		expect(diagnostics).toEqual([]);
	});

	test("collects rows in memory with CollectingFormatter", () => {
		const formatter = new CollectingFormatter();
		parseAll(weather, formatter);

		expect(formatter.header).toEqual([" Weather data"]);
		expect(formatter.relation).toBe("weather");
		expect(formatter.attributes.map(a => a.name)).toEqual(["outlook", "temperature"]);
		expect(formatter.instances.map(rowToObject)).toEqual([
			{ outlook: "sunny", temperature: 85 },
			{ outlook: "overcast", temperature: null },
		]);
	});

	test("matches declaration keywords case-insensitively", () => {
		const formatter = new CollectingFormatter();
		const { diagnostics } = parseAll(["@relation  'my data'", "@attribute a integer", "@data", "7"], formatter);

		expect(formatter.relation).toBe("my data");
		expect(formatter.instances.map(rowToObject)).toEqual([{ a: 7 }]);
		expect(diagnostics).toEqual([]);
	});

	test("reports data lines before @DATA and continues", () => {
		const formatter = new CollectingFormatter();
		const { diagnostics } = parseAll(
			["@RELATION r", "@ATTRIBUTE a NUMERIC", "1.0", "@DATA", "2.0"],
			formatter
		);

		expect(diagnostics).toEqual([
			{ kind: "unexpected-line", line: 3, message: "Unexpected line encountered: 1.0" },
		]);
		expect(formatter.instances.map(rowToObject)).toEqual([{ a: 2 }]);
	});

	test("skips the column of a bad declaration and keeps the others aligned", () => {
		const formatter = new CollectingFormatter();
		const { diagnostics } = parseAll(
			["@RELATION r", "@ATTRIBUTE a NUMERIC", "@ATTRIBUTE broken", "@ATTRIBUTE c STRING", "@DATA", "1,x,hello"],
			formatter
		);

		expect(formatter.attributes.map(a => a.name)).toEqual(["a", "c"]);
		expect(formatter.instances.map(rowToObject)).toEqual([{ a: 1, c: "hello" }]);
		expect(diagnostics).toEqual([
			{
				kind: "bad-declaration",
				line: 3,
				message: 'bad attribute specification "broken": missing attribute type, column skipped',
			},
		]);
	});

	test("fires the schema event once and ignores late declarations", () => {
		const formatter = new RecordingFormatter();
		const { diagnostics } = parseAll(
			["@RELATION r", "@ATTRIBUTE a NUMERIC", "@DATA", "1", "@ATTRIBUTE b NUMERIC", "@DATA", "@RELATION s", "2"],
			formatter
		);

		expect(formatter.events.filter(e => e.type === "create")).toHaveLength(1);
		expect(formatter.events.filter(e => e.type === "instance")).toHaveLength(2);
		expect(diagnostics.map(d => [d.kind, d.line])).toEqual([
			["late-declaration", 5],
			["late-declaration", 6],
			["late-declaration", 7],
		]);
	});

	test("uses a default relation name when @RELATION is missing", () => {
		const formatter = new CollectingFormatter();
		const { diagnostics } = parseAll(["@ATTRIBUTE a NUMERIC", "@DATA", "1"], formatter);

		expect(formatter.relation).toBe("relation");
		expect(diagnostics.map(d => d.kind)).toEqual(["missing-relation"]);
	});

	test("reports unknown declarations", () => {
		const formatter = new CollectingFormatter();
		const { diagnostics } = parseAll(["@RELATION r", "@END", "@ATTRIBUTE a NUMERIC", "@", "@DATA"], formatter);

		expect(diagnostics).toEqual([
			{ kind: "unknown-declaration", line: 2, message: "Unknown declaration @END" },
			{ kind: "unknown-declaration", line: 4, message: "Unknown declaration @" },
		]);
	});

	test("accepts abbreviated declaration keywords", () => {
		const formatter = new CollectingFormatter();
		const { diagnostics } = parseAll(["@REL r", "@attr a NUMERIC", "@At b INTEGER", "@DAT", "1.5,2"], formatter);

		expect(formatter.relation).toBe("r");
		expect(formatter.instances.map(rowToObject)).toEqual([{ a: 1.5, b: 2 }]);
		expect(diagnostics).toEqual([]);
	});

	test("creates no table when no attribute survived", () => {
		const formatter = new RecordingFormatter();
		const { parser, diagnostics } = parseAll(["@RELATION r", "@ATTRIBUTE broken", "@DATA", "1", "2"], formatter);

		expect(formatter.events).toEqual([]);
		expect(parser.rowCount).toBe(0);
		expect(diagnostics.map(d => [d.kind, d.line])).toEqual([
			["bad-declaration", 2],
			["no-attributes", 3],
		]);
	});

	test("reports input that never reaches @DATA", () => {
		const formatter = new RecordingFormatter();
		const { diagnostics } = parseAll(["@RELATION r", "@ATTRIBUTE a NUMERIC"], formatter);

		expect(formatter.events).toEqual([]);
		expect(diagnostics.map(d => d.kind)).toEqual(["missing-data"]);
	});

	test("passes comments in the data section through", () => {
		const formatter = new RecordingFormatter();
		parseAll(["@RELATION r", "@ATTRIBUTE a NUMERIC", "@DATA", "% first row", "1", "  % indented"], formatter);

		expect(formatter.events.map(e => e.type)).toEqual(["create", "comment", "instance", "comment"]);
	});

	test("strips line terminators", () => {
		const formatter = new CollectingFormatter();
		parseAll(["@RELATION r\r\n", "@ATTRIBUTE s STRING\r", "@DATA\r", "abc\r\n"], formatter);

		expect(formatter.relation).toBe("r");
		expect(formatter.instances.map(rowToObject)).toEqual([{ s: "abc" }]);
	});
});

describe("formatDiagnostic", () => {
	test("prefixes the line number", () => {
		expect(formatDiagnostic({ kind: "bad-field", line: 12, message: "Could not parse field x" })).toBe(
			"line 12: Could not parse field x"
		);
	});
});
