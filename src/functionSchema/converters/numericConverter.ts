import type { Constraints, ParameterSpec, SchemaFragment } from '../functions';
import { type Converter, copyConstraints, numberKeyword, requireNumberConstraints } from './converter';

const NUMERIC_KEYWORDS = ['minimum', 'maximum', 'exclusiveMinimum', 'exclusiveMaximum', 'multipleOf'] as const;

/**
 * Converter for the integer and number types
 */
export class NumericConverter implements Converter {
	toSchema(param: ParameterSpec, constraints: Constraints): SchemaFragment {
		requireNumberConstraints(constraints, NUMERIC_KEYWORDS);
		const schema = copyConstraints({}, constraints, NUMERIC_KEYWORDS);
		schema.type = param.type === 'integer' ? 'integer' : 'number';
		return schema;
	}

	fromSchema(value: unknown, schema: SchemaFragment): number {
		if (typeof value !== 'number' || !Number.isFinite(value)) throw new Error("Value is not of type 'integer' or 'number'.");
		if (schema.type === 'integer' && !Number.isInteger(value)) throw new Error("Value is not of type 'integer'.");

		const minimum = numberKeyword(schema, 'minimum');
		if (minimum !== undefined && value < minimum) throw new Error('Value is below the minimum constraint.');

		const maximum = numberKeyword(schema, 'maximum');
		if (maximum !== undefined && value > maximum) throw new Error('Value exceeds the maximum constraint.');

		const exclusiveMinimum = numberKeyword(schema, 'exclusiveMinimum');
		if (exclusiveMinimum !== undefined && value <= exclusiveMinimum) throw new Error('Value does not meet the exclusiveMinimum constraint.');

		const exclusiveMaximum = numberKeyword(schema, 'exclusiveMaximum');
		if (exclusiveMaximum !== undefined && value >= exclusiveMaximum) throw new Error('Value does not meet the exclusiveMaximum constraint.');

		const multipleOf = numberKeyword(schema, 'multipleOf');
		if (multipleOf !== undefined && value % multipleOf !== 0) throw new Error('Value does not meet the multipleOf constraint.');

		return value;
	}
}
