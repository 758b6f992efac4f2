import { DateFormatError } from "./errors.js";

type DatePart =
	| "year"
	| "shortYear"
	| "month"
	| "monthName"
	| "day"
	| "hour"
	| "hour12"
	| "minute"
	| "second"
	| "fraction"
	| "meridiem";

type FormatToken =
	| { readonly kind: "literal"; readonly text: string }
	| { readonly kind: "part"; readonly part: DatePart };

export interface CompiledDateFormat {
	readonly pattern: string;
	/** Returns undefined when the text does not match the pattern or names an impossible date. */
	parse(text: string): Date | undefined;
}

const MONTH_NAMES = [
	"january", "february", "march", "april", "may", "june",
	"july", "august", "september", "october", "november", "december",
];

const PART_PATTERNS: Record<DatePart, string> = {
	year: "(\\d{4})",
	shortYear: "(\\d{2})",
	month: "(\\d{1,2})",
	monthName: `(${MONTH_NAMES.map(name => `${name}|${name.slice(0, 3)}`).join("|")})`,
	day: "(\\d{1,2})",
	hour: "(\\d{1,2})",
	hour12: "(\\d{1,2})",
	minute: "(\\d{1,2})",
	second: "(\\d{1,2})",
	fraction: "(\\d{1,6})",
	meridiem: "(am|pm)",
};

const STRPTIME_DIRECTIVES: Readonly<Record<string, DatePart>> = {
	Y: "year",
	y: "shortYear",
	m: "month",
	b: "monthName",
	B: "monthName",
	d: "day",
	H: "hour",
	I: "hour12",
	M: "minute",
	S: "second",
	f: "fraction",
	p: "meridiem",
};

/**
 * Compile a date pattern. Patterns containing `%` use strptime directives
 * (`%Y-%m-%dT%H:%M:%S`); anything else is read as a SimpleDateFormat-style
 * pattern (`yyyy-MM-dd HH:mm:ss`), the form ARFF files usually declare.
 */
export function compileDateFormat(pattern: string): CompiledDateFormat {
	const tokens = pattern.includes("%") ? tokenizeStrptime(pattern) : tokenizeSimpleDateFormat(pattern);
	const parts: DatePart[] = [];
	let source = "";
	for (const token of tokens) {
		if (token.kind === "literal") {
			source += escapeRegExp(token.text);
		} else {
			parts.push(token.part);
			source += PART_PATTERNS[token.part];
		}
	}
	const regex = new RegExp(`^${source}$`, "i");

	return {
		pattern,
		parse(text: string): Date | undefined {
			const match = regex.exec(text);
			if (!match) {
				return undefined;
			}
			return buildDate(parts, match.slice(1));
		},
	};
}

function tokenizeStrptime(pattern: string): FormatToken[] {
	const tokens: FormatToken[] = [];
	let literal = "";
	for (let i = 0; i < pattern.length; i++) {
		const ch = pattern[i];
		if (ch !== "%") {
			literal += ch;
			continue;
		}
		const directive = pattern[i + 1];
		i++;
		if (directive === "%") {
			literal += "%";
			continue;
		}
		const part = directive === undefined ? undefined : STRPTIME_DIRECTIVES[directive];
		if (part === undefined) {
			throw new DateFormatError(pattern, `directive %${directive ?? ""} is not supported`);
		}
		if (literal) {
			tokens.push({ kind: "literal", text: literal });
			literal = "";
		}
		tokens.push({ kind: "part", part });
	}
	if (literal) {
		tokens.push({ kind: "literal", text: literal });
	}
	return tokens;
}

function tokenizeSimpleDateFormat(pattern: string): FormatToken[] {
	const tokens: FormatToken[] = [];
	let i = 0;
	while (i < pattern.length) {
		const ch = pattern[i];
		if (ch === "'") {
			// '' is an escaped quote, otherwise text up to the next quote is literal
			if (pattern[i + 1] === "'") {
				tokens.push({ kind: "literal", text: "'" });
				i += 2;
				continue;
			}
			const end = pattern.indexOf("'", i + 1);
			if (end === -1) {
				throw new DateFormatError(pattern, "unterminated quoted text");
			}
			tokens.push({ kind: "literal", text: pattern.slice(i + 1, end) });
			i = end + 1;
			continue;
		}
		if (!/[A-Za-z]/.test(ch)) {
			tokens.push({ kind: "literal", text: ch });
			i++;
			continue;
		}
		let run = 1;
		while (pattern[i + run] === ch) {
			run++;
		}
		tokens.push({ kind: "part", part: simpleDateFormatPart(pattern, ch, run) });
		i += run;
	}
	return tokens;
}

function simpleDateFormatPart(pattern: string, letter: string, run: number): DatePart {
	switch (letter) {
		case "y":
			return run === 2 ? "shortYear" : "year";
		case "M":
			return run >= 3 ? "monthName" : "month";
		case "d":
			return "day";
		case "H":
			return "hour";
		case "h":
			return "hour12";
		case "m":
			return "minute";
		case "s":
			return "second";
		case "S":
			return "fraction";
		case "a":
			return "meridiem";
		default:
			throw new DateFormatError(pattern, `pattern letter ${letter} is not supported`);
	}
}

function buildDate(parts: readonly DatePart[], values: readonly string[]): Date | undefined {
	let year = 1900;
	let month = 1;
	let day = 1;
	let hour = 0;
	let hour12: number | undefined;
	let pm: boolean | undefined;
	let minute = 0;
	let second = 0;
	let millisecond = 0;

	parts.forEach((part, index) => {
		const value = values[index] ?? "";
		switch (part) {
			case "year":
				year = parseInt(value, 10);
				break;
			case "shortYear": {
				const short = parseInt(value, 10);
				year = short < 69 ? 2000 + short : 1900 + short;
				break;
			}
			case "month":
				month = parseInt(value, 10);
				break;
			case "monthName":
				month = MONTH_NAMES.findIndex(name => name.startsWith(value.toLowerCase().slice(0, 3))) + 1;
				break;
			case "day":
				day = parseInt(value, 10);
				break;
			case "hour":
				hour = parseInt(value, 10);
				break;
			case "hour12":
				hour12 = parseInt(value, 10);
				break;
			case "minute":
				minute = parseInt(value, 10);
				break;
			case "second":
				second = parseInt(value, 10);
				break;
			case "fraction":
				// digits are a fraction of a second: "5" is 500ms, "123456" is 123.456ms
				millisecond = Math.floor(parseInt(value.padEnd(6, "0"), 10) / 1000);
				break;
			case "meridiem":
				pm = value.toLowerCase() === "pm";
				break;
		}
	});

	if (hour12 !== undefined) {
		if (hour12 < 1 || hour12 > 12) {
			return undefined;
		}
		hour = (hour12 % 12) + (pm ? 12 : 0);
	}

	if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
		return undefined;
	}
	if (hour > 23 || minute > 59 || second > 59) {
		return undefined;
	}

	const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, millisecond));
	// Date.UTC maps years 0-99 onto 1900-1999
	date.setUTCFullYear(year);
	return date;
}

function daysInMonth(year: number, month: number): number {
	if (month === 2 && isLeapYear(year)) {
		return 29;
	}
	return new Date(Date.UTC(2001, month, 0)).getUTCDate();
}

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Render a timestamp as `YYYY-MM-DD HH:MM:SS`, with milliseconds when present.
 */
export function formatTimestamp(date: Date): string {
	const pad = (value: number, width = 2) => String(value).padStart(width, "0");
	const base = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
		+ `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
	const ms = date.getUTCMilliseconds();
	return ms === 0 ? base : `${base}.${pad(ms, 3)}`;
}
