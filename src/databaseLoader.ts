import { Client } from "pg";
import { PGlite } from "@electric-sql/pglite";
import type { Attribute, Row } from "./model.js";
import type { DatasetFormatter } from "./formatter.js";
import {
	generateCreateTable,
	generateParameterizedInsert,
	postgresDialect,
	type SqlStatement,
} from "./sqlGenerator.js";
import { convertFile, type ConvertOptions, type ConvertResult } from "./converter.js";

/**
 * Database client interface - compatible with both pg.Client and PGlite
 */
export interface DbClient {
	query<T = unknown>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

/**
 * Executes the statements of a dataset against PostgreSQL, statement by statement,
 * in the order the parser produces them.
 */
export class DatabaseLoader implements DatasetFormatter {
	private readonly _pending: SqlStatement[] = [];

	private constructor(
		private readonly _client: DbClient,
		private readonly _close: () => Promise<void>
	) { }

	/**
	 * Connect to a database.
	 *
	 * Connection string formats:
	 * - `pglite:` or `pglite::memory:` - In-memory PGLite database
	 * - `pglite:/path/to/dir` - PGLite database persisted to filesystem
	 * - `postgresql://...` or other - PostgreSQL connection string
	 */
	static async connect(connectionString: string): Promise<DatabaseLoader> {
		if (connectionString.startsWith("pglite:")) {
			const pglitePath = connectionString.slice("pglite:".length);
			const db = new PGlite(pglitePath || undefined);
			return new DatabaseLoader(db, () => db.close());
		}

		const client = new Client({ connectionString });
		await client.connect();
		return new DatabaseLoader(client, () => client.end());
	}

	/**
	 * Create a loader on an existing client (useful for testing with PGLite).
	 * Closing the loader leaves the client open.
	 */
	static fromClient(client: DbClient): DatabaseLoader {
		return new DatabaseLoader(client, async () => { });
	}

	formatComment(_text: string): void { }

	formatCreate(relation: string, attributes: readonly Attribute[]): void {
		this._pending.push({ sql: generateCreateTable(postgresDialect, relation, attributes), params: [] });
	}

	formatInstance(relation: string, row: Row): void {
		this._pending.push(generateParameterizedInsert(postgresDialect, relation, row));
	}

	/**
	 * Execute the statements produced so far.
	 */
	async flush(): Promise<void> {
		for (let stmt = this._pending.shift(); stmt; stmt = this._pending.shift()) {
			await this._client.query(stmt.sql, stmt.params);
		}
	}

	/**
	 * Load a file into the database. Executes in a transaction - rolls back on any error.
	 */
	async loadFile(filePath: string, options: Omit<ConvertOptions, "flush"> = {}): Promise<ConvertResult> {
		await this._client.query("BEGIN");

		try {
			const result = await convertFile(filePath, this, { ...options, flush: () => this.flush() });
			await this._client.query("COMMIT");
			return result;
		} catch (error) {
			this._pending.length = 0;
			await this._client.query("ROLLBACK");
			throw error;
		}
	}

	async close(): Promise<void> {
		await this._close();
	}
}
