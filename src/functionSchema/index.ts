/**
 * Function Schema Module
 *
 * Provides function schema generation from decorated library methods, and dispatch of
 * the function/tool calls returned by the model back to those methods.
 *
 * @module functionSchema
 */

// Core function schema types
export type {
	Constraints,
	FunctionArguments,
	FunctionCallPayload,
	FunctionSchemaDocument,
	JsonSchemaParameters,
	ParamDeclaration,
	ParameterSpec,
	SchemaFragment,
	ToolCall,
	ToolDefinition,
	ToolResultMessage,
} from './functions';

// Function decorator
export { func, type FuncOptions } from './functionDecorators';

export { LibCommand, type ExecutionKind } from './libCommand';
export { FunctionLibrary, type FunctionLibraryOptions } from './functionLibrary';

// Call parsing
export { type CallParserOptions, type ExpressionEvaluator, mathjsEvaluator, parseNameArgs, repairArguments } from './callParser';

export * from './converters';
export * from './errors';
