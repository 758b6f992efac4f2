import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { PGlite } from "@electric-sql/pglite";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { DatabaseLoader } from "./databaseLoader";

const dataset = [
	"% Observations",
	"@RELATION 'weather log'",
	"@ATTRIBUTE outlook {sunny,overcast,rainy}",
	"@ATTRIBUTE temperature NUMERIC",
	"@ATTRIBUTE visits INTEGER",
	"@ATTRIBUTE note STRING",
	"@ATTRIBUTE observed DATE 'yyyy-MM-dd HH:mm:ss'",
	"@DATA",
	"sunny,85.5,3,'warm, dry',  '2021-07-01 10:00:00'",
	"foggy,?,7,?,?",
].join("\n");

describe("DatabaseLoader", () => {
	let db: PGlite;
	let tempDir: string;
	let filePath: string;

	beforeEach(() => {
		db = new PGlite();
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "arff-sql-db-test-"));
		filePath = path.join(tempDir, "weather.arff");
		fs.writeFileSync(filePath, dataset);
	});

	afterEach(async () => {
		await db.close();
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	test("creates the table and inserts every row", async () => {
		const loader = DatabaseLoader.fromClient(db);
		const result = await loader.loadFile(filePath, { onDiagnostic: () => { } });

		expect(result).toEqual({ relation: "weather log", rowCount: 2, diagnosticCount: 1 });

		const rows = await db.query<Record<string, unknown>>(`
			SELECT outlook, temperature::float8 AS temperature, visits, note, observed::text AS observed
			FROM "weather_log"
		`);
		expect(rows.rows).toEqual([
			{ outlook: "sunny", temperature: 85.5, visits: 3, note: "warm, dry", observed: "2021-07-01 10:00:00" },
			{ outlook: null, temperature: null, visits: 7, note: null, observed: null },
		]);
	});

	test("creates columns with the PostgreSQL types", async () => {
		await DatabaseLoader.fromClient(db).loadFile(filePath, { onDiagnostic: () => { } });

		const columns = await db.query<{ column_name: string; data_type: string; max_length: number | null }>(`
			SELECT column_name::text AS column_name, data_type::text AS data_type, character_maximum_length::int AS max_length
			FROM information_schema.columns
			WHERE table_name = 'weather_log'
			ORDER BY ordinal_position
		`);
		expect(columns.rows).toEqual([
			{ column_name: "outlook", data_type: "character varying", max_length: 8 },
			{ column_name: "temperature", data_type: "numeric", max_length: null },
			{ column_name: "visits", data_type: "integer", max_length: null },
			{ column_name: "note", data_type: "character varying", max_length: 72 },
			{ column_name: "observed", data_type: "timestamp without time zone", max_length: null },
		]);
	});

	test("rolls back when a statement fails", async () => {
		const loader = DatabaseLoader.fromClient(db);
		await loader.loadFile(filePath, { onDiagnostic: () => { } });

		// the table exists now, so CREATE TABLE fails on the second load
		await expect(loader.loadFile(filePath, { onDiagnostic: () => { } })).rejects.toThrow();

		const count = await db.query<{ n: number }>(`SELECT count(*)::int AS n FROM "weather_log"`);
		expect(count.rows).toEqual([{ n: 2 }]);
	});
});
