import * as fs from "fs/promises";
import type { DatasetFormatter } from "./formatter.js";
import { DatasetParser, type DatasetParserOptions } from "./datasetParser.js";
import { InputError } from "./errors.js";

export interface ConvertOptions extends DatasetParserOptions {
	/** Awaited after every consumed line, before the next one is read */
	readonly flush?: () => Promise<void>;
}

export interface ConvertResult {
	readonly relation: string | undefined;
	readonly rowCount: number;
	readonly diagnosticCount: number;
}

/**
 * Run a DatasetParser over a sequence of lines.
 */
export async function convertLines(
	lines: Iterable<string> | AsyncIterable<string>,
	formatter: DatasetFormatter,
	options: ConvertOptions = {}
): Promise<ConvertResult> {
	const parser = new DatasetParser(formatter, options);
	for await (const line of lines) {
		parser.parseLine(line);
		await options.flush?.();
	}
	parser.finish();
	await options.flush?.();

	return {
		relation: parser.relation,
		rowCount: parser.rowCount,
		diagnosticCount: parser.diagnosticCount,
	};
}

/**
 * Convert a whole document held in memory.
 */
export function convertText(
	text: string,
	formatter: DatasetFormatter,
	options: ConvertOptions = {}
): Promise<ConvertResult> {
	return convertLines(text.split(/\r?\n/), formatter, options);
}

/**
 * Stream a file line by line through the parser.
 *
 * @throws InputError when the file cannot be opened or read.
 */
export async function convertFile(
	filePath: string,
	formatter: DatasetFormatter,
	options: ConvertOptions = {}
): Promise<ConvertResult> {
	let handle: fs.FileHandle;
	try {
		handle = await fs.open(filePath, "r");
	} catch (error) {
		throw new InputError(filePath, error);
	}

	try {
		return await convertLines(readLines(handle, filePath), formatter, options);
	} finally {
		await handle.close();
	}
}

async function* readLines(handle: fs.FileHandle, filePath: string): AsyncGenerator<string> {
	try {
		for await (const line of handle.readLines({ encoding: "utf-8", autoClose: false })) {
			yield line;
		}
	} catch (error) {
		throw new InputError(filePath, error);
	}
}
