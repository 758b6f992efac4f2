/**
 * Base class for errors raised by the converter.
 */
export class ArffError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * The input source could not be opened or read. This is the only fatal condition.
 */
export class InputError extends ArffError {
	constructor(readonly path: string, cause: unknown) {
		super(`Cannot read file ${path}: ${describeCause(cause)}`, { cause });
	}
}

/**
 * An `@ATTRIBUTE` declaration could not be turned into an attribute.
 */
export class AttributeDeclarationError extends ArffError {
	constructor(readonly declaration: string, reason: string) {
		super(`bad attribute specification "${declaration}": ${reason}`);
	}
}

/**
 * A date pattern uses a directive that is not supported.
 */
export class DateFormatError extends ArffError {
	constructor(readonly pattern: string, reason: string) {
		super(`unsupported date format "${pattern}": ${reason}`);
	}
}

function describeCause(cause: unknown): string {
	if (cause instanceof Error) {
		return cause.message;
	}
	return String(cause);
}
