import type { Attribute } from "./model.js";
import { DEFAULT_DATE_FORMAT } from "./model.js";
import { AttributeDeclarationError, DateFormatError } from "./errors.js";
import { compileDateFormat } from "./dateFormat.js";
import { readQuoted, splitFields } from "./rowParser.js";

interface Token {
	readonly text: string;
	/** Index just past the token */
	readonly end: number;
}

/**
 * Split a declaration into whitespace separated tokens. Quoted tokens may contain
 * whitespace; their quotes are removed and backslash escapes resolved.
 */
export function tokenizeDeclaration(text: string): string[] {
	const tokens: string[] = [];
	let position = 0;
	for (;;) {
		const token = readToken(text, position);
		if (!token) {
			return tokens;
		}
		tokens.push(token.text);
		position = token.end;
	}
}

function readToken(text: string, start: number): Token | undefined {
	let i = start;
	while (i < text.length && /\s/.test(text[i])) {
		i++;
	}
	if (i >= text.length) {
		return undefined;
	}

	if (text[i] === "'" || text[i] === '"') {
		const quoted = readQuoted(text, i);
		if (!quoted) {
			throw new Error(`unterminated quote in ${text.slice(i)}`);
		}
		return quoted;
	}

	let j = i;
	// an unquoted name ends where a nominal value list begins
	while (j < text.length && !/\s/.test(text[j]) && !(text[j] === "{" && j > i)) {
		j++;
	}
	return { text: text.slice(i, j), end: j };
}

/**
 * Parse the part of an `@ATTRIBUTE` line after the keyword.
 *
 * @throws AttributeDeclarationError when there is no type, the type is unknown or
 * unsupported, or the nominal list or date format is malformed.
 */
export function parseAttribute(declaration: string): Attribute {
	let nameToken: Token | undefined;
	try {
		nameToken = readToken(declaration, 0);
	} catch (error) {
		throw new AttributeDeclarationError(declaration, error instanceof Error ? error.message : String(error));
	}
	if (!nameToken) {
		throw new AttributeDeclarationError(declaration, "missing attribute name");
	}
	const name = nameToken.text.replace(/ /g, "_");
	const rest = declaration.slice(nameToken.end).trim();

	if (rest === "") {
		throw new AttributeDeclarationError(declaration, "missing attribute type");
	}

	if (rest.startsWith("{")) {
		const close = rest.lastIndexOf("}");
		if (close === -1) {
			throw new AttributeDeclarationError(declaration, "unclosed nominal value list");
		}
		const acceptedValues = splitFields(rest.slice(1, close)).map(field => field.text);
		return { type: "nominal", name, acceptedValues };
	}

	let tokens: string[];
	try {
		tokens = tokenizeDeclaration(rest);
	} catch (error) {
		throw new AttributeDeclarationError(declaration, error instanceof Error ? error.message : String(error));
	}
	const [typeToken = "", formatToken] = tokens;

	switch (typeToken.toUpperCase()) {
		case "NUMERIC":
			return { type: "numeric", name };
		case "REAL":
			return { type: "real", name };
		case "INTEGER":
			return { type: "integer", name };
		case "STRING":
			return { type: "string", name };
		case "DATE": {
			const dateFormat = formatToken ?? DEFAULT_DATE_FORMAT;
			try {
				compileDateFormat(dateFormat);
			} catch (error) {
				if (error instanceof DateFormatError) {
					throw new AttributeDeclarationError(declaration, error.message);
				}
				throw error;
			}
			return { type: "date", name, dateFormat };
		}
		case "RELATIONAL":
			throw new AttributeDeclarationError(declaration, "relational attributes are not supported");
		default:
			throw new AttributeDeclarationError(declaration, `unknown attribute type ${typeToken}`);
	}
}
