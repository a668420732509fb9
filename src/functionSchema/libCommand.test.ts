import { expect } from 'chai';
import { setupConditionalLoggerOutput } from '../test/testUtils';
import type { Converter } from './converters/converter';
import { ConverterRegistry } from './converters/converterRegistry';
import { ConversionFromError, ConversionToError } from './errors';
import type { FunctionDeclaration } from './functionDecorators';
import type { SchemaFragment } from './functions';
import { LibCommand, toParameterSpec } from './libCommand';

function declaration(overrides: Partial<FunctionDeclaration> = {}): FunctionDeclaration {
	return {
		name: 'repeat',
		methodName: 'repeat',
		description: 'Repeat some text.',
		params: [
			{ name: 'text', type: 'string', description: 'The text to repeat.' },
			{ name: 'times', type: 'integer', optional: true, description: 'How many times.', minimum: 1 },
		],
		handler(text: string, times = 2): string {
			return text.repeat(times);
		},
		...overrides,
	};
}

class FailingConverter implements Converter {
	toSchema(): SchemaFragment {
		throw new Error('Cannot describe this type');
	}

	fromSchema(value: unknown): unknown {
		return value;
	}
}

describe('LibCommand', () => {
	const getLogs = setupConditionalLoggerOutput();
	const converters = new ConverterRegistry();

	describe('toParameterSpec', () => {
		it('should separate the constraints from the declaration keys', () => {
			const param = toParameterSpec({ name: 'text', type: 'string', optional: true, description: 'Some text.', minLength: 2, pattern: 'a+' }, 1);
			expect(param.index).to.equal(1);
			expect(param.hasDefault).to.be.true;
			expect(param.description).to.equal('Some text.');
			expect(param.constraints).to.deep.equal({ minLength: 2, pattern: 'a+' });
			expect(Object.isFrozen(param)).to.be.true;
			expect(Object.isFrozen(param.constraints)).to.be.true;
		});
	});

	describe('constructor', () => {
		it('should generate the function schema', () => {
			const command = new LibCommand(declaration(), converters);
			expect(command.schema).to.deep.equal({
				name: 'repeat',
				description: 'Repeat some text.',
				parameters: {
					type: 'object',
					properties: {
						text: { description: 'The text to repeat.', type: 'string', minLength: 0, maxLength: 255 },
						times: { description: 'How many times.', type: 'integer', minimum: 1 },
					},
					required: ['text'],
				},
				strict: false,
			});
			expect(command.kind).to.equal('sync');
			expect(command.enabled).to.be.true;
			expect(getLogs().some((log) => log.level === 'info' && log.args[0] === 'Added function repeat, execution kind is sync')).to.be.true;
		});

		it('should detect an async handler', () => {
			const command = new LibCommand(
				declaration({
					async handler(text: string): Promise<string> {
						return text;
					},
				}),
				converters,
			);
			expect(command.kind).to.equal('async');
		});

		it('should require a parameter with a default value when it is forced', () => {
			const command = new LibCommand(declaration({ required: ['times'] }), converters);
			expect(command.schema.parameters.required).to.deep.equal(['text', 'times']);
			expect(command.required.has('times')).to.be.true;
		});

		it('should omit parameters without a description or a converter', () => {
			const command = new LibCommand(
				declaration({
					params: [
						{ name: 'text', type: 'string', description: 'The text to repeat.' },
						{ name: 'hidden', type: 'string' },
						{ name: 'mystery', type: 'Mystery', description: 'Not a known type.' },
					],
				}),
				converters,
			);
			expect(Object.keys(command.schema.parameters.properties)).to.deep.equal(['text']);
			expect(command.params).to.have.length(3);
		});

		it('should use the default strict flag unless declared', () => {
			expect(new LibCommand(declaration(), converters, true).schema.strict).to.be.true;
			expect(new LibCommand(declaration({ strict: false }), converters, true).schema.strict).to.be.false;
		});

		it('should reject a constraint of the wrong type when constructed', () => {
			expect(() => new LibCommand(declaration({ params: [{ name: 'count', type: 'integer', description: 'A count.', minimum: '5' }] }), converters)).to.throw(
				ConversionToError,
				`Could not generate a schema for parameter 'count' of type 'integer' with {"minimum":"5"}`,
			);
		});

		it('should wrap a converter failure in ConversionToError', () => {
			const registry = new ConverterRegistry();
			registry.add('Failing', FailingConverter);
			expect(() => new LibCommand(declaration({ params: [{ name: 'value', type: 'Failing', description: 'Fails.' }] }), registry)).to.throw(
				ConversionToError,
				"Could not generate a schema for parameter 'value' of type 'Failing' with {}",
			);
		});
	});

	describe('convertArgs', () => {
		it('should convert the arguments which have a schema property', () => {
			const command = new LibCommand(declaration(), converters);
			expect(command.convertArgs({ text: 'ab', extra: true })).to.deep.equal({ text: 'ab', extra: true });
		});

		it('should throw ConversionFromError for an invalid argument', () => {
			const command = new LibCommand(declaration(), converters);
			expect(() => command.convertArgs({ text: 'ab', times: 0 })).to.throw(
				ConversionFromError,
				"Could not convert argument 'times' with value 0: Value is below the minimum constraint.",
			);
			expect(getLogs().filter((log) => log.level === 'error')).to.have.length(1);
		});

		it('should leave out a missing argument named like an Object.prototype member', () => {
			const command = new LibCommand(
				declaration({
					params: [
						{ name: 'text', type: 'string', description: 'The text.' },
						{ name: 'toString', type: 'string', optional: true, description: 'A suffix.' },
					],
					handler(text: string, suffix = '!'): string {
						return `${text}${suffix}`;
					},
				}),
				converters,
			);
			expect(command.convertArgs({ text: 'ab' })).to.deep.equal({ text: 'ab' });
			expect(command.toPositionalArgs({ text: 'ab' })).to.deep.equal(['ab']);
			expect(command.invoke({}, { text: 'ab' })).to.equal('ab!');
		});
	});

	describe('invoke', () => {
		it('should pass the arguments in declaration order', () => {
			const command = new LibCommand(declaration(), converters);
			expect(command.toPositionalArgs({ times: 3, text: 'ab' })).to.deep.equal(['ab', 3]);
			expect(command.invoke({}, { times: 3, text: 'ab' })).to.equal('ababab');
		});

		it('should leave missing arguments to the default values', () => {
			const command = new LibCommand(declaration(), converters);
			expect(command.toPositionalArgs({ text: 'ab' })).to.deep.equal(['ab']);
			expect(command.invoke({}, { text: 'ab' })).to.equal('abab');
		});

		it('should call without arguments when there are none', () => {
			const command = new LibCommand(
				declaration({
					handler(...args: unknown[]): number {
						return args.length;
					},
				}),
				converters,
			);
			expect(command.invoke({}, {})).to.equal(0);
		});

		it('should call the handler on the target', () => {
			const target = { prefix: '>' };
			const command = new LibCommand(
				declaration({
					params: [],
					handler(this: { prefix: string }): string {
						return this.prefix;
					},
				}),
				converters,
			);
			expect(command.invoke(target, {})).to.equal('>');
		});
	});

	describe('checkForce', () => {
		it('should match whole force words ignoring case', () => {
			const command = new LibCommand(declaration({ forceWords: ['repeat', 'echo'] }), converters);
			expect(command.checkForce('Please ECHO this')).to.be.true;
			expect(command.checkForce('It was repeated')).to.be.false;
			expect(new LibCommand(declaration(), converters).checkForce('repeat')).to.be.false;
		});

		it('should return the tool definition', () => {
			const command = new LibCommand(declaration(), converters);
			expect(command.toolDefinition()).to.deep.equal({ type: 'function', function: command.schema });
		});
	});
});
