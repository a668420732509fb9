import { isValid, parse } from 'date-fns';
import type { Constraints, ParameterSpec, SchemaFragment } from '../functions';
import { StringConverter } from './stringConverter';

/** Accepted layouts, YYYY-MM-DDTHH:MM:SS followed by a +HHMM, +HH:MM or Z offset */
const DATE_TIME_FORMATS = ["yyyy-MM-dd'T'HH:mm:ssxx", "yyyy-MM-dd'T'HH:mm:ssXXX"];

/**
 * Converter for Date parameters. The schema is a string schema with the date-time format,
 * so the model returns a formatted string which is parsed into a Date.
 */
export class DateTimeConverter extends StringConverter {
	override toSchema(param: ParameterSpec, constraints: Constraints): SchemaFragment {
		const schema = super.toSchema(param, constraints);
		schema.format = 'date-time';
		return schema;
	}

	override fromSchema(value: unknown, schema: SchemaFragment): Date {
		const text = this.validateString(value, schema);
		const format = schema.format;
		if (!format) throw new Error('No format found.');
		if (format !== 'date-time') throw new Error('Format is not "date-time".');

		for (const dateFormat of DATE_TIME_FORMATS) {
			const date = parse(text, dateFormat, new Date(0));
			if (isValid(date)) return date;
		}
		throw new Error(`Value "${text}" does not match the format YYYY-MM-DDTHH:MM:SS+HHMM.`);
	}
}
