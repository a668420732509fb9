import type { Constraints, ParameterSpec, SchemaFragment } from '../functions';

/**
 * Converts a parameter declaration into a JSON Schema fragment, and validates/converts
 * the values the model returns against that fragment.
 */
export interface Converter {
	/**
	 * Generate a schema fragment for the parameter.
	 * Unknown constraint keys are ignored, known keys are copied verbatim.
	 */
	toSchema(param: ParameterSpec, constraints: Constraints): SchemaFragment;
	/**
	 * Validate the value against the schema fragment, throwing on the first violated constraint.
	 * @returns the value, converted into the type the handler expects
	 */
	fromSchema(value: unknown, schema: SchemaFragment): unknown;
}

export type ConverterClass = new () => Converter;

/**
 * Copies the constraint keys which are present into the schema
 */
export function copyConstraints(schema: SchemaFragment, constraints: Constraints, keys: readonly string[]): SchemaFragment {
	for (const key of keys) {
		if (key in constraints) schema[key] = constraints[key];
	}
	return schema;
}

/**
 * Checks the constraint keys which are present hold numbers
 */
export function requireNumberConstraints(constraints: Constraints, keys: readonly string[]): void {
	for (const key of keys) {
		const value = constraints[key];
		if (value !== undefined && typeof value !== 'number') throw new Error(`The schema keyword ${key} must be a number, was ${typeof value}.`);
	}
}

/**
 * Reads a numeric schema keyword. Returns undefined when the keyword is absent.
 */
export function numberKeyword(schema: SchemaFragment, key: string): number | undefined {
	const value = schema[key];
	if (value === undefined) return undefined;
	if (typeof value !== 'number') throw new Error(`The schema keyword ${key} must be a number, was ${typeof value}.`);
	return value;
}
