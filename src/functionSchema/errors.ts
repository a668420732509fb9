import type { SchemaFragment } from './functions';

/**
 * Base class of every error thrown by the function library.
 */
export class FunctionLibraryError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'FunctionLibraryError';
	}
}

function formatArguments(args: unknown): string {
	if (typeof args === 'string') return args;
	if (args === undefined) return '';
	return JSON.stringify(args);
}

/** A function call named a function which is not in the library */
export class FunctionNotFound extends FunctionLibraryError {
	constructor(
		public readonly functionName: string,
		public readonly args: unknown,
	) {
		super(`Function '${functionName}' not found.\nargs: ${formatArguments(args)}`);
		this.name = 'FunctionNotFound';
	}
}

/** The arguments of a function call were neither a JSON string nor an object */
export class InvalidArgType extends FunctionLibraryError {
	constructor(
		public readonly functionName: string,
		public readonly args: unknown,
	) {
		super(`args: ${formatArguments(args)} is ${args === null ? 'null' : Array.isArray(args) ? 'array' : typeof args}, not a string or an object!`);
		this.name = 'InvalidArgType';
	}
}

export interface JsonErrorLocation {
	/** Zero-based offset into the arguments string */
	position: number;
	/** One-based line number */
	line: number;
	/** One-based column number */
	column: number;
	/** The characters at the failing position */
	span: string;
}

/** The arguments string could not be parsed as JSON, even after the repairs were applied */
export class ArgDecodeError extends FunctionLibraryError {
	readonly position: number;
	readonly line: number;
	readonly column: number;
	readonly span: string;

	constructor(
		public readonly functionName: string,
		public readonly args: string,
		public readonly reason: string,
		location: JsonErrorLocation,
		options?: { cause?: unknown },
	) {
		super(`Could not decode the arguments for '${functionName}': ${reason} at line ${location.line} column ${location.column}: \`${location.span}\` \n ${args}`, options);
		this.name = 'ArgDecodeError';
		this.position = location.position;
		this.line = location.line;
		this.column = location.column;
		this.span = location.span;
	}
}

/** A mismatch between a function call and the library, eg invoking an async function synchronously */
export class InvalidFuncArg extends FunctionLibraryError {
	constructor(message: string) {
		super(message);
		this.name = 'InvalidFuncArg';
	}
}

export class ConversionError extends FunctionLibraryError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'ConversionError';
	}
}

/** A converter is already registered for the type name */
export class ConversionAddError extends ConversionError {
	constructor(public readonly typeName: string) {
		super(`A converter for type '${typeName}' is already registered`);
		this.name = 'ConversionAddError';
	}
}

/** A parameter could not be turned into a schema fragment */
export class ConversionToError extends ConversionError {
	constructor(
		public readonly paramName: string,
		public readonly typeName: string,
		public readonly constraints: Readonly<Record<string, unknown>>,
		options?: { cause?: unknown },
	) {
		super(`Could not generate a schema for parameter '${paramName}' of type '${typeName}' with ${JSON.stringify(constraints)}`, options);
		this.name = 'ConversionToError';
	}
}

/** A supplied argument value failed validation against its schema fragment */
export class ConversionFromError extends ConversionError {
	constructor(
		public readonly paramName: string,
		public readonly value: unknown,
		public readonly schema: SchemaFragment,
		public readonly reason: string,
		options?: { cause?: unknown },
	) {
		super(`Could not convert argument '${paramName}' with value ${JSON.stringify(value)}: ${reason}`, options);
		this.name = 'ConversionFromError';
	}
}
