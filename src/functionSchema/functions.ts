// Definitions for LLM function calling

/** A JSON Schema fragment describing the accepted shape of one parameter */
export type SchemaFragment = Record<string, unknown>;

/** Constraint keywords declared for a parameter, eg minLength, maximum, uniqueItems */
export type Constraints = Readonly<Record<string, unknown>>;

/**
 * Declaration of a handler parameter, supplied to the func decorator in the handler's positional order.
 * Any keys other than the ones named here are treated as constraint keywords for the parameter's converter.
 */
export interface ParamDeclaration {
	name: string;
	/** The converter registry key, eg string, integer, number, boolean, Date, literal, array */
	type: string;
	/** The handler parameter has a default value */
	optional?: boolean;
	/** Parameters without a description are not sent to the model */
	description?: string;
	/** Element type of an array parameter */
	items?: string;
	/** Allowed values of a literal parameter */
	values?: readonly string[];
	[constraint: string]: unknown;
}

/**
 * Function parameter definition, normalised from a ParamDeclaration
 */
export interface ParameterSpec {
	readonly index: number;
	readonly name: string;
	readonly type: string;
	readonly hasDefault: boolean;
	readonly description?: string;
	readonly items?: string;
	readonly values?: readonly string[];
	readonly constraints: Constraints;
}

export interface JsonSchemaParameters {
	type: 'object';
	properties: Record<string, SchemaFragment>;
	required: string[];
}

/**
 * The function schema document sent to the chat completion API
 */
export interface FunctionSchemaDocument {
	name: string;
	description: string;
	parameters: JsonSchemaParameters;
	strict: boolean;
}

/**
 * Tool definition envelope for transports which require it
 */
export interface ToolDefinition {
	type: 'function';
	function: FunctionSchemaDocument;
}

export type FunctionArguments = Record<string, unknown>;

/**
 * A function call as returned by the model
 */
export interface FunctionCallPayload {
	name: string;
	/** A JSON string (OpenAI) or an already parsed object (Ollama) */
	arguments?: unknown;
}

/**
 * A tool call as returned by the model. OpenAI tool calls have an id, Ollama tool calls do not.
 */
export interface ToolCall {
	id?: string;
	function: FunctionCallPayload;
}

export interface ToolResultMessage {
	role: 'tool';
	name: string;
	content: unknown;
	tool_call_id?: string;
}

/**
 * @returns if the value is a plain object record (not null or an array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
