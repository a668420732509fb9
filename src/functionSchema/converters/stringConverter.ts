import type { Constraints, ParameterSpec, SchemaFragment } from '../functions';
import { type Converter, numberKeyword, requireNumberConstraints } from './converter';

export const DEFAULT_MIN_LENGTH = 0;
export const DEFAULT_MAX_LENGTH = 255;

/**
 * Converter for strings, and the base for types which are derived from strings such as dates.
 *
 * Supported keywords are minLength, maxLength and pattern. When the parameter has no default value
 * the length bounds are always set, defaulting to 0 and 255.
 */
export class StringConverter implements Converter {
	toSchema(param: ParameterSpec, constraints: Constraints): SchemaFragment {
		requireNumberConstraints(constraints, ['minLength', 'maxLength']);
		const schema: SchemaFragment = { type: 'string' };

		if ('minLength' in constraints || !param.hasDefault) schema.minLength = constraints.minLength ?? DEFAULT_MIN_LENGTH;
		if ('maxLength' in constraints || !param.hasDefault) schema.maxLength = constraints.maxLength ?? DEFAULT_MAX_LENGTH;
		if ('pattern' in constraints) schema.pattern = constraints.pattern;

		return schema;
	}

	fromSchema(value: unknown, schema: SchemaFragment): unknown {
		return this.validateString(value, schema);
	}

	/**
	 * Checks the value is a string which meets the length and pattern keywords of the schema
	 */
	protected validateString(value: unknown, schema: SchemaFragment): string {
		if (typeof value !== 'string') throw new Error("Value is not of type 'string'.");

		// Lengths count code points, as JSON Schema does
		const length = [...value].length;
		const minLength = numberKeyword(schema, 'minLength');
		if (minLength !== undefined && length < minLength) throw new Error('Value does not meet the minLength constraint.');

		const maxLength = numberKeyword(schema, 'maxLength');
		if (maxLength !== undefined && length > maxLength) throw new Error('Value exceeds the maxLength constraint.');

		const pattern = schema.pattern;
		// Sticky so the pattern must match from the start of the value, the rest of the value may follow
		if (typeof pattern === 'string' && !new RegExp(pattern, 'y').test(value)) throw new Error('Value does not match the specified pattern.');

		return value;
	}
}
