import type { Constraints, ParameterSpec, SchemaFragment } from '../functions';
import type { Converter } from './converter';

export class BooleanConverter implements Converter {
	toSchema(_param: ParameterSpec, _constraints: Constraints): SchemaFragment {
		return { type: 'boolean' };
	}

	fromSchema(value: unknown, _schema: SchemaFragment): boolean {
		if (typeof value !== 'boolean') throw new Error("Value is not of type 'boolean'.");
		return value;
	}
}
