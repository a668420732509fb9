import type { Constraints, ParameterSpec, SchemaFragment } from '../functions';
import type { Converter } from './converter';

/**
 * Converter for string literal unions, eg 'celsius' | 'fahrenheit', which become an enum.
 * The allowed values are declared in the values property of the parameter declaration.
 */
export class LiteralConverter implements Converter {
	toSchema(param: ParameterSpec, _constraints: Constraints): SchemaFragment {
		return { type: 'string', enum: [...(param.values ?? [])] };
	}

	fromSchema(value: unknown, schema: SchemaFragment): unknown {
		const allowed = Array.isArray(schema.enum) ? schema.enum : [];
		if (!allowed.includes(value)) throw new Error(`Value ${JSON.stringify(value)} does not match any of the literal values.`);
		return value;
	}
}
