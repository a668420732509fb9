import { expect } from 'chai';
import { setupConditionalLoggerOutput } from '../../test/testUtils';
import { ConversionAddError } from '../errors';
import { ConverterRegistry } from './converterRegistry';
import { NumericConverter } from './numericConverter';
import { StringConverter } from './stringConverter';

class UpperCaseConverter extends StringConverter {
	override fromSchema(value: unknown, schema: Record<string, unknown>): string {
		return this.validateString(value, schema).toUpperCase();
	}
}

describe('ConverterRegistry', () => {
	const getLogs = setupConditionalLoggerOutput();

	it('should be seeded with the built-in converters', () => {
		const registry = new ConverterRegistry();
		expect(registry.typeNames()).to.deep.equal(['string', 'integer', 'number', 'boolean', 'Date', 'date-time', 'literal', 'enum', 'array']);
		expect(registry.get('integer')).to.equal(NumericConverter);
		expect(registry.get('Mystery')).to.be.undefined;
	});

	it('should add a converter for a new type', () => {
		const registry = new ConverterRegistry();
		registry.add('UpperCase', UpperCaseConverter);

		expect(registry.has('UpperCase')).to.be.true;
		expect(registry.get('UpperCase')).to.equal(UpperCaseConverter);
		expect(getLogs().some((log) => log.level === 'info' && log.args[0] === 'Added converter UpperCaseConverter for type UpperCase')).to.be.true;
	});

	it('should not replace an existing converter', () => {
		const registry = new ConverterRegistry();
		expect(() => registry.add('string', UpperCaseConverter)).to.throw(ConversionAddError, "A converter for type 'string' is already registered");
		expect(registry.get('string')).to.equal(StringConverter);
	});

	it('should keep registries independent', () => {
		const first = new ConverterRegistry();
		const second = new ConverterRegistry();
		first.add('UpperCase', UpperCaseConverter);
		expect(second.has('UpperCase')).to.be.false;
	});
});
