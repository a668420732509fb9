import { isDeepStrictEqual } from 'node:util';
import type { Constraints, ParameterSpec, SchemaFragment } from '../functions';
import { type Converter, copyConstraints, numberKeyword, requireNumberConstraints } from './converter';

const ARRAY_KEYWORDS = ['minItems', 'maxItems', 'uniqueItems'] as const;

const ELEMENT_SCHEMAS: Record<string, SchemaFragment> = {
	integer: { type: 'integer' },
	number: { type: 'number' },
	string: { type: 'string' },
	boolean: { type: 'boolean' },
};

/**
 * @returns the schema for an array element type, or an unconstrained schema for other types
 */
export function elementSchema(elementType: string | undefined): SchemaFragment {
	const schema = elementType ? ELEMENT_SCHEMAS[elementType] : undefined;
	return schema ? { ...schema } : {};
}

function matchesElementType(element: unknown, type: unknown): boolean {
	switch (type) {
		case 'integer':
			return Number.isInteger(element);
		case 'number':
			return typeof element === 'number';
		case 'string':
			return typeof element === 'string';
		case 'boolean':
			return typeof element === 'boolean';
		default:
			return true;
	}
}

/**
 * Converter for arrays, with the element type declared in the items property of the parameter declaration.
 */
export class ArrayConverter implements Converter {
	toSchema(param: ParameterSpec, constraints: Constraints): SchemaFragment {
		requireNumberConstraints(constraints, ['minItems', 'maxItems']);
		const schema: SchemaFragment = { type: 'array', items: elementSchema(param.items) };
		return copyConstraints(schema, constraints, ARRAY_KEYWORDS);
	}

	fromSchema(value: unknown, schema: SchemaFragment): unknown[] {
		if (!Array.isArray(value)) throw new Error("Value is not of type 'array'.");

		const minItems = numberKeyword(schema, 'minItems');
		if (minItems !== undefined && value.length < minItems) throw new Error('Value does not meet the minItems constraint.');

		const maxItems = numberKeyword(schema, 'maxItems');
		if (maxItems !== undefined && value.length > maxItems) throw new Error('Value exceeds the maxItems constraint.');

		if (schema.uniqueItems === true) {
			for (let i = 0; i < value.length; i++) {
				for (let j = i + 1; j < value.length; j++) {
					if (isDeepStrictEqual(value[i], value[j])) throw new Error('Value does not meet the uniqueItems constraint.');
				}
			}
		}

		const items = schema.items;
		if (typeof items === 'object' && items !== null && 'type' in items) {
			const index = value.findIndex((element) => !matchesElementType(element, items.type));
			if (index >= 0) throw new Error(`Element ${index} is not of type '${String(items.type)}'.`);
		}

		return value;
	}
}
