import { type ParseError, parse as parseJsonc } from 'jsonc-parser';
import { evaluate } from 'mathjs';
import { logger } from '../o11y/logger';
import { ArgDecodeError, FunctionNotFound, InvalidArgType, type JsonErrorLocation } from './errors';
import { type FunctionArguments, type FunctionCallPayload, isRecord } from './functions';

/** Evaluates an arithmetic expression, returning the text to substitute for it */
export type ExpressionEvaluator = (expression: string) => string;

export interface CallParserOptions {
	/** Rewrite bare arithmetic values, eg "x": 2+2, into their result before parsing */
	evaluateExpressions?: boolean;
	expressionEvaluator?: ExpressionEvaluator;
}

export interface ParsedCall {
	name: string;
	args: FunctionArguments;
}

// A string value which follows a key, up to the closing quote before a comma or closing brace
const QUOTED_VALUE_PATTERN = /(?<=:\s")(.*?)(?="(?:,|\s*\}))/g;
// A bare value containing an arithmetic operator, between a key and the next comma or closing brace
const EXPRESSION_PATTERN = /(?<=:\s)([^"]*?[+\-*/][^"]*?)(?=(?:,|\s*\}))/g;

/**
 * Evaluates an arithmetic expression with mathjs
 */
export const mathjsEvaluator: ExpressionEvaluator = (expression: string): string => {
	const result: unknown = evaluate(expression);
	if (typeof result !== 'number' || !Number.isFinite(result)) throw new Error(`Expression ${expression} did not evaluate to a finite number`);
	return String(result);
};

/**
 * Replaces literal \n sequences with newlines
 */
export function normalizeNewlines(args: string): string {
	return args.replace(/\\n/g, '\n');
}

/**
 * Escapes the unescaped double quotes inside string values, eg {"a": "say "hi""} becomes {"a": "say \"hi\""}.
 * Only the quoted value spans are changed, keys and structural characters are left as they are.
 */
export function fixQuoteEscapes(args: string): string {
	return args.replace(QUOTED_VALUE_PATTERN, (value) => value.replace(/(?<!\\)"/g, '\\"'));
}

/**
 * Replaces bare arithmetic values with their result, eg {"x": 2+2} becomes {"x": 4}.
 * Expressions which cannot be evaluated are left unchanged.
 */
export function evaluateExpressions(args: string, evaluator: ExpressionEvaluator = mathjsEvaluator): string {
	return args.replace(EXPRESSION_PATTERN, (expression) => {
		try {
			return evaluator(expression);
		} catch (e) {
			logger.warn({ expression, err: e }, 'Could not evaluate expression in function arguments');
			return expression;
		}
	});
}

/**
 * Escapes the control characters (eg raw newlines and tabs) inside JSON string literals, which JSON.parse rejects.
 */
export function escapeControlCharacters(json: string): string {
	let result = '';
	let inString = false;
	let escaped = false;
	for (const char of json) {
		const code = char.charCodeAt(0);
		if (inString && code < 0x20) {
			if (char === '\n') result += '\\n';
			else if (char === '\r') result += '\\r';
			else if (char === '\t') result += '\\t';
			else result += `\\u${code.toString(16).padStart(4, '0')}`;
			escaped = false;
			continue;
		}
		result += char;
		if (escaped) escaped = false;
		else if (inString && char === '\\') escaped = true;
		else if (char === '"') inString = !inString;
	}
	return result;
}

/**
 * Converts a zero-based offset into one-based line and column numbers
 */
export function lineAndColumn(text: string, position: number): { line: number; column: number } {
	const before = text.slice(0, position);
	const lines = before.split('\n');
	return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}

/**
 * Finds where a JSON string which JSON.parse rejected is malformed.
 */
export function locateJsonError(json: string, error: unknown): JsonErrorLocation {
	const errors: ParseError[] = [];
	parseJsonc(json, errors, { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false });
	let position = json.length;
	let length = 1;
	const first = errors[0];
	if (first) {
		position = first.offset;
		length = Math.max(first.length, 1);
	} else {
		const positionMatch = error instanceof Error ? /position (\d+)/.exec(error.message) : null;
		if (positionMatch) position = Number.parseInt(positionMatch[1], 10);
	}
	return { position, ...lineAndColumn(json, position), span: json.slice(position, position + length) };
}

export type LenientParseResult = { ok: true; value: unknown } | { ok: false; error: unknown; location: JsonErrorLocation; text: string };

/**
 * Parses JSON, tolerating control characters inside strings.
 * On failure the result holds the error from JSON.parse and where the escaped text is malformed.
 */
export function parseJsonLenient(json: string): LenientParseResult {
	const text = escapeControlCharacters(json);
	try {
		return { ok: true, value: JSON.parse(text) };
	} catch (e) {
		return { ok: false, error: e, location: locateJsonError(text, e), text };
	}
}

/**
 * Applies the repairs for common malformations in the arguments string returned by the model
 */
export function repairArguments(args: string, options: CallParserOptions = {}): string {
	let repaired = fixQuoteEscapes(normalizeNewlines(args));
	if (options.evaluateExpressions) repaired = evaluateExpressions(repaired, options.expressionEvaluator);
	return repaired;
}

/**
 * Parses the name and arguments of a function call.
 * @param payload the function call from the model
 * @param isKnown returns if a function name is in the library
 * @param options
 * @throws FunctionNotFound if the function name is not known
 * @throws ArgDecodeError if the arguments string is not valid JSON after the repairs
 * @throws InvalidArgType if the arguments are not a JSON object string or an object
 */
export function parseNameArgs(payload: FunctionCallPayload, isKnown: (name: string) => boolean, options: CallParserOptions = {}): ParsedCall {
	const name = payload.name;
	const rawArgs = payload.arguments;
	if (!isKnown(name)) throw new FunctionNotFound(name, rawArgs);

	if (rawArgs === undefined) return { name, args: {} };
	if (isRecord(rawArgs)) return { name, args: { ...rawArgs } };
	if (typeof rawArgs !== 'string') throw new InvalidArgType(name, rawArgs);

	const repaired = repairArguments(rawArgs, options);
	logger.debug({ functionName: name, repaired }, 'Transformed function arguments');

	const result = parseJsonLenient(repaired);
	if (!result.ok) {
		const reason = result.error instanceof Error ? result.error.message : String(result.error);
		throw new ArgDecodeError(name, result.text, reason, result.location, { cause: result.error });
	}
	if (!isRecord(result.value)) throw new InvalidArgType(name, result.value);
	return { name, args: result.value };
}
