import { Command, CommanderError, Option } from "commander";
import * as fs from "fs";
import type { DatasetFormatter } from "./formatter.js";
import type { ParseDiagnostic } from "./model.js";
import { formatDiagnostic } from "./datasetParser.js";
import { convertFile, type ConvertResult } from "./converter.js";
import { SqlFormatter, dialects } from "./sqlGenerator.js";
import { JsonLinesFormatter } from "./jsonFormatter.js";
import { DatabaseLoader } from "./databaseLoader.js";

/**
 * Where the command line writes. The real CLI binds these to process.stdout and process.stderr.
 */
export interface CliIo {
	stdout(text: string): void;
	stderr(text: string): void;
}

interface CliOptions {
	dialect: "mysql" | "postgres";
	format: "sql" | "jsonl";
	output?: string;
	jsonSchema?: string;
	connection?: string;
	quiet?: boolean;
}

export const processIo: CliIo = {
	stdout: text => process.stdout.write(text),
	stderr: text => process.stderr.write(text),
};

/**
 * Run the command line and resolve to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo): Promise<number> {
	let exitCode = 0;

	const program = new Command();

	program
		.name("arff-sql")
		.description("Convert an ARFF dataset into a CREATE TABLE statement and one INSERT per row")
		.version("1.0.0")
		.argument("<file>", "ARFF file to convert")
		.addOption(new Option("-d, --dialect <dialect>", "SQL dialect").choices(["mysql", "postgres"]).default("mysql"))
		.addOption(new Option("-f, --format <format>", "Output format").choices(["sql", "jsonl"]).default("sql"))
		.option("-o, --output <file>", "Output file (defaults to stdout)")
		.option("--json-schema <file>", "Write the JSON Schema of a row (jsonl format only)")
		.addOption(
			new Option("-c, --connection <string>", "Load into PostgreSQL (postgresql://...) or PGlite (pglite:[path]) instead of printing")
				.conflicts("output")
		)
		.option("-q, --quiet", "Do not report skipped or malformed values")
		.exitOverride()
		.configureOutput({
			writeOut: text => io.stdout(text),
			writeErr: text => io.stderr(text),
		})
		.action(async (file: string, options: CliOptions, command: Command) => {
			const conflict = findConflict(options, command.getOptionValueSource("dialect") === "cli");
			if (conflict) {
				command.error(`error: ${conflict}`);
			}
			exitCode = await convertCommand(file, options, io);
		});

	try {
		await program.parseAsync([...argv], { from: "user" });
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		throw error;
	}
	return exitCode;
}

/**
 * Options that would otherwise be silently ignored by the chosen output.
 */
function findConflict(options: CliOptions, dialectGiven: boolean): string | undefined {
	if (options.jsonSchema !== undefined && options.format !== "jsonl") {
		return "option '--json-schema <file>' requires '--format jsonl'";
	}
	if (options.connection !== undefined) {
		if (options.format === "jsonl") {
			return "option '-c, --connection <string>' cannot be used with '--format jsonl'";
		}
		if (options.dialect !== "postgres" && dialectGiven) {
			return "option '-c, --connection <string>' always loads with the postgres dialect";
		}
		return undefined;
	}
	if (options.format === "jsonl" && dialectGiven) {
		return "option '-d, --dialect <dialect>' only applies to '--format sql'";
	}
	return undefined;
}

async function convertCommand(file: string, options: CliOptions, io: CliIo): Promise<number> {
	const onDiagnostic = (diagnostic: ParseDiagnostic) => {
		if (!options.quiet) {
			io.stderr(`${formatDiagnostic(diagnostic)}\n`);
		}
	};

	try {
		if (options.connection) {
			const loader = await DatabaseLoader.connect(options.connection);
			try {
				const result = await loader.loadFile(file, { onDiagnostic });
				io.stdout(`Loaded ${summarize(result)}\n`);
			} finally {
				await loader.close();
			}
			return 0;
		}

		if (options.output) {
			const fd = fs.openSync(options.output, "w");
			try {
				const result = await convertFile(file, createFormatter(options, text => fs.writeSync(fd, text)), {
					onDiagnostic,
				});
				io.stdout(`Converted ${summarize(result)} to ${options.output}\n`);
			} finally {
				fs.closeSync(fd);
			}
			return 0;
		}

		const result = await convertFile(file, createFormatter(options, text => io.stdout(text)), { onDiagnostic });
		io.stderr(`Converted ${summarize(result)}\n`);
		return 0;
	} catch (error) {
		// InputError (unreadable input) and database failures end the run
		io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
		return 1;
	}
}

function createFormatter(options: CliOptions, write: (text: string) => void): DatasetFormatter {
	if (options.format === "jsonl") {
		const schemaPath = options.jsonSchema;
		return new JsonLinesFormatter(write, {
			onSchema: schemaPath
				? schema => fs.writeFileSync(schemaPath, JSON.stringify(schema, null, 2))
				: undefined,
		});
	}
	return new SqlFormatter(write, dialects[options.dialect]);
}

function summarize(result: ConvertResult): string {
	return `${result.rowCount} row(s) with ${result.diagnosticCount} warning(s)`;
}
