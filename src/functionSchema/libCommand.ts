import { types } from 'node:util';
import { logger } from '../o11y/logger';
import type { Converter } from './converters/converter';
import type { ConverterRegistry } from './converters/converterRegistry';
import { ConversionFromError, ConversionToError } from './errors';
import type { FunctionDeclaration } from './functionDecorators';
import {
	type FunctionArguments,
	type FunctionSchemaDocument,
	type ParamDeclaration,
	type ParameterSpec,
	type SchemaFragment,
	type ToolDefinition,
	isRecord,
} from './functions';

export type ExecutionKind = 'sync' | 'async';

const DECLARATION_KEYS = new Set(['name', 'type', 'optional', 'description', 'items', 'values']);

/**
 * Normalises a parameter declaration into an immutable ParameterSpec
 */
export function toParameterSpec(declaration: ParamDeclaration, index: number): ParameterSpec {
	const constraints: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(declaration)) {
		if (!DECLARATION_KEYS.has(key)) constraints[key] = value;
	}
	return Object.freeze({
		index,
		name: declaration.name,
		type: declaration.type,
		hasDefault: declaration.optional === true,
		description: declaration.description,
		items: declaration.items,
		values: declaration.values ? Object.freeze([...declaration.values]) : undefined,
		constraints: Object.freeze(constraints),
	});
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * A library function callable by the model. Holds the handler, its parameters,
 * the generated function schema and the converter bound to each schema property.
 */
export class LibCommand {
	readonly name: string;
	readonly description: string;
	readonly methodName: string;
	readonly kind: ExecutionKind;
	readonly params: readonly ParameterSpec[];
	readonly schema: FunctionSchemaDocument;
	readonly required: ReadonlySet<string>;
	readonly forceWords: readonly string[];
	readonly strict: boolean;
	enabled: boolean;
	// biome-ignore lint/complexity/noBannedTypes: invoked with Reflect.apply on the library instance
	private readonly handler: Function;
	private readonly paramConverters = new Map<string, Converter>();
	private readonly forceRegex: RegExp | undefined;

	constructor(declaration: FunctionDeclaration, converters: ConverterRegistry, defaultStrict = false) {
		this.name = declaration.name;
		this.description = declaration.description;
		this.methodName = declaration.methodName;
		this.handler = declaration.handler;
		this.kind = types.isAsyncFunction(declaration.handler) ? 'async' : 'sync';
		this.params = Object.freeze((declaration.params ?? []).map(toParameterSpec));
		this.forceWords = Object.freeze([...(declaration.forceWords ?? [])]);
		this.strict = declaration.strict ?? defaultStrict;
		this.enabled = declaration.enabled ?? true;
		this.forceRegex = this.forceWords.length ? new RegExp(`\\b(?:${this.forceWords.map(escapeRegExp).join('|')})\\b`, 'i') : undefined;

		const forcedRequired = new Set(declaration.required ?? []);
		const properties: Record<string, SchemaFragment> = {};
		const required: string[] = [];

		for (const param of this.params) {
			if (!param.description) {
				logger.debug(`Parameter ${param.name} of ${this.name} has no description and will not be sent to the model`);
				continue;
			}
			const converterClass = converters.get(param.type);
			if (!converterClass) {
				logger.info(`Type ${param.type} of parameter ${param.name} of ${this.name} has no converter and will not be sent to the model`);
				continue;
			}
			const converter = new converterClass();
			let fragment: unknown;
			try {
				fragment = converter.toSchema(param, param.constraints);
			} catch (e) {
				throw new ConversionToError(param.name, param.type, param.constraints, { cause: e });
			}
			if (!isRecord(fragment)) throw new ConversionToError(param.name, param.type, param.constraints);

			properties[param.name] = { description: param.description, ...fragment };
			this.paramConverters.set(param.name, converter);
			if (!param.hasDefault || forcedRequired.has(param.name)) required.push(param.name);
			logger.debug(`Schema generated for parameter ${param.name} with type ${param.type}`);
		}

		this.required = new Set(required);
		this.schema = {
			name: this.name,
			description: this.description,
			parameters: { type: 'object', properties, required },
			strict: this.strict,
		};
		logger.info(`Added function ${this.name}, execution kind is ${this.kind}`);
	}

	/**
	 * Validates and converts every argument which has a schema property.
	 * Properties missing from the arguments are left missing, so the handler's default values apply.
	 * @throws ConversionFromError on the first argument which fails validation
	 */
	convertArgs(args: FunctionArguments): FunctionArguments {
		const converted: FunctionArguments = { ...args };
		logger.debug({ functionName: this.name, args }, 'Converting arguments');
		for (const [paramName, fragment] of Object.entries(this.schema.parameters.properties)) {
			if (!Object.hasOwn(args, paramName)) continue;
			const converter = this.paramConverters.get(paramName);
			const value = args[paramName];
			if (!converter) throw new ConversionFromError(paramName, value, fragment, 'No converter found.');
			try {
				converted[paramName] = converter.fromSchema(value, fragment);
			} catch (e) {
				const error = new ConversionFromError(paramName, value, fragment, e instanceof Error ? e.message : String(e), { cause: e });
				logger.error({ err: error, functionName: this.name }, error.message);
				throw error;
			}
		}
		return converted;
	}

	/**
	 * @returns the named arguments in the handler's positional order. Missing arguments are undefined.
	 */
	toPositionalArgs(args: FunctionArguments): unknown[] {
		const positional = this.params.map((param) => (Object.hasOwn(args, param.name) ? args[param.name] : undefined));
		while (positional.length && positional[positional.length - 1] === undefined) positional.pop();
		return positional;
	}

	/**
	 * Invokes the handler on the library instance. Zero-argument calls invoke the handler without arguments.
	 */
	invoke(target: object, args: FunctionArguments): unknown {
		const positional = Object.keys(args).length > 0 ? this.toPositionalArgs(args) : [];
		return Reflect.apply(this.handler, target, positional);
	}

	/**
	 * @returns if the text contains any of the force words as a whole word, ignoring case
	 */
	checkForce(text: string): boolean {
		return this.forceRegex ? this.forceRegex.test(text) : false;
	}

	toolDefinition(): ToolDefinition {
		return { type: 'function', function: this.schema };
	}
}
