import { loadLibraryConfig } from '../config/libraryConfig';
import { logger } from '../o11y/logger';
import { type CallParserOptions, type ExpressionEvaluator, type ParsedCall, parseNameArgs } from './callParser';
import { type ConverterRegistry, defaultConverterRegistry } from './converters/converterRegistry';
import { ConversionFromError, FunctionLibraryError, FunctionNotFound, InvalidFuncArg } from './errors';
import { getFunctionDeclaration } from './functionDecorators';
import type { FunctionArguments, FunctionCallPayload, FunctionSchemaDocument, ToolCall, ToolDefinition, ToolResultMessage } from './functions';
import { LibCommand } from './libCommand';

export interface FunctionLibraryOptions {
	/** The converters for the parameter types. Defaults to the process-wide default registry */
	converters?: ConverterRegistry;
	/** Defaults to the FUNCTION_LIB_EVALUATE_EXPRESSIONS configuration */
	evaluateExpressions?: boolean;
	/** Defaults to evaluating with mathjs */
	expressionEvaluator?: ExpressionEvaluator;
}

type Dispatch = { result: string } | { command: LibCommand; args: FunctionArguments };

/**
 * A collection of functions to be used with the function/tool calling of a chat completion API.
 *
 * When subclassed, the methods decorated with \@func are added to the library's commands when it is constructed.
 * The function schemas are sent to the model with the user's message, and the function calls the model returns
 * are dispatched to the decorated methods with callByDict, callByDictAsync, callByTool or callByToolAsync.
 *
 * Commands are collected from the concrete class and its ancestors. A method overridden in a subclass
 * is only registered once, from the subclass.
 */
export class FunctionLibrary {
	private readonly commands = new Map<string, LibCommand>();
	private readonly parserOptions: CallParserOptions;

	constructor(options: FunctionLibraryOptions = {}) {
		const config = loadLibraryConfig();
		const converters = options.converters ?? defaultConverterRegistry;
		this.parserOptions = {
			evaluateExpressions: options.evaluateExpressions ?? config.evaluateExpressions,
			expressionEvaluator: options.expressionEvaluator,
		};

		const seenMethods = new Set<string>();
		let proto: object | null = Object.getPrototypeOf(this);
		while (proto && proto !== FunctionLibrary.prototype) {
			for (const methodName of Object.getOwnPropertyNames(proto)) {
				if (methodName === 'constructor' || seenMethods.has(methodName)) continue;
				seenMethods.add(methodName);
				const declaration = getFunctionDeclaration(Object.getOwnPropertyDescriptor(proto, methodName)?.value);
				if (!declaration) continue;
				if (this.commands.has(declaration.name)) throw new InvalidFuncArg(`Function name ${declaration.name} is declared by more than one method`);
				this.commands.set(declaration.name, new LibCommand(declaration, converters, config.strictSchemas));
			}
			proto = Object.getPrototypeOf(proto);
		}
	}

	getCommand(name: string): LibCommand | undefined {
		return this.commands.get(name);
	}

	/**
	 * @returns the function names in registration order
	 */
	commandNames(): string[] {
		return Array.from(this.commands.keys());
	}

	/**
	 * Enables or disables a function. Disabled functions are not included in the schemas sent to the model.
	 * @throws FunctionNotFound if there is no function with the name
	 */
	setEnabled(name: string, enabled: boolean): void {
		const command = this.commands.get(name);
		if (!command) throw new FunctionNotFound(name, undefined);
		command.enabled = enabled;
	}

	/**
	 * @returns the function schemas of the enabled functions
	 */
	getSchema(): FunctionSchemaDocument[] {
		const schemas: FunctionSchemaDocument[] = [];
		for (const command of this.commands.values()) {
			if (command.enabled && command.schema.parameters) schemas.push(command.schema);
		}
		return schemas;
	}

	/**
	 * @returns the function schemas of the enabled functions, in the tool definition envelope
	 */
	getToolSchema(): ToolDefinition[] {
		return this.getSchema().map((schema) => ({ type: 'function', function: schema }));
	}

	/**
	 * Checks if the query contains the force words of any function. A match should force the model to call that function.
	 * When force words of more than one function match, the function registered first wins.
	 * @returns the tool definition of the first function with a matching force word
	 */
	forceWordCheck(query: string): ToolDefinition | undefined {
		for (const command of this.commands.values()) {
			if (command.checkForce(query)) return command.toolDefinition();
		}
		return undefined;
	}

	/**
	 * Parses the name and arguments of a function call, repairing common malformations in the arguments JSON.
	 */
	parseNameArgs(payload: FunctionCallPayload): ParsedCall {
		return parseNameArgs(payload, (name) => this.commands.has(name), this.parserOptions);
	}

	/**
	 * Validates and converts the arguments of a function call
	 * @throws ConversionFromError
	 */
	convertArgs(functionName: string, args: FunctionArguments): FunctionArguments {
		const command = this.commands.get(functionName);
		if (!command) throw new FunctionNotFound(functionName, args);
		return command.convertArgs(args);
	}

	/**
	 * The result when the model calls a function which is not in the library
	 */
	defaultCallback(functionName: string, args: unknown): string {
		const argsText = typeof args === 'string' ? args.replace(/\\n/g, '\n') : args === undefined ? '' : JSON.stringify(args);
		return `${functionName} is not a valid function.\n\`\`\`${argsText}\`\`\``;
	}

	/**
	 * Calls the function described by the payload. Parsing and conversion errors are returned as the result,
	 * so something is always returned to the model.
	 * @throws InvalidFuncArg if the function is asynchronous, use callByDictAsync
	 */
	callByDict(payload: FunctionCallPayload): unknown {
		const dispatch = this.prepare(payload);
		if ('result' in dispatch) return dispatch.result;
		const { command, args } = dispatch;
		if (command.kind === 'async') throw new InvalidFuncArg(`Function ${command.name} is asynchronous and must be called with callByDictAsync`);
		return command.invoke(this, args);
	}

	/**
	 * Calls the function described by the payload, awaiting asynchronous functions.
	 * Parsing and conversion errors are returned as the result.
	 * The arguments of asynchronous functions are validated and converted too, the same as for callByDict.
	 */
	async callByDictAsync(payload: FunctionCallPayload): Promise<unknown> {
		const dispatch = this.prepare(payload);
		if ('result' in dispatch) return dispatch.result;
		const { command, args } = dispatch;
		if (command.kind === 'async') return await command.invoke(this, args);
		return command.invoke(this, args);
	}

	/**
	 * Calls the function of a tool call, returning the result in a tool message
	 */
	callByTool(toolCall: ToolCall): ToolResultMessage {
		const content = this.callByDict(toolCall.function);
		return toolResultMessage(toolCall, content);
	}

	async callByToolAsync(toolCall: ToolCall): Promise<ToolResultMessage> {
		const content = await this.callByDictAsync(toolCall.function);
		return toolResultMessage(toolCall, content);
	}

	private prepare(payload: FunctionCallPayload): Dispatch {
		let parsed: ParsedCall;
		try {
			parsed = this.parseNameArgs(payload);
		} catch (e) {
			if (e instanceof FunctionNotFound) {
				logger.warn({ functionName: e.functionName }, `Model called unknown function ${e.functionName}`);
				return { result: this.defaultCallback(e.functionName, e.args) };
			}
			if (e instanceof FunctionLibraryError) {
				logger.warn({ err: e }, `Could not parse the call of ${payload.name}`);
				return { result: String(e) };
			}
			throw e;
		}

		const command = this.commands.get(parsed.name);
		if (!command) throw new InvalidFuncArg(`Function ${parsed.name} was parsed but is not in the library`);

		try {
			return { command, args: command.convertArgs(parsed.args) };
		} catch (e) {
			if (e instanceof ConversionFromError) return { result: String(e) };
			throw e;
		}
	}
}

function toolResultMessage(toolCall: ToolCall, content: unknown): ToolResultMessage {
	const message: ToolResultMessage = { role: 'tool', name: toolCall.function.name, content };
	if (toolCall.id !== undefined) message.tool_call_id = toolCall.id;
	return message;
}
