import { logger } from '../../o11y/logger';
import { ConversionAddError } from '../errors';
import { ArrayConverter } from './arrayConverter';
import { BooleanConverter } from './booleanConverter';
import type { ConverterClass } from './converter';
import { DateTimeConverter } from './dateTimeConverter';
import { LiteralConverter } from './literalConverter';
import { NumericConverter } from './numericConverter';
import { StringConverter } from './stringConverter';

const BUILT_IN_CONVERTERS: ReadonlyArray<[string, ConverterClass]> = [
	['string', StringConverter],
	['integer', NumericConverter],
	['number', NumericConverter],
	['boolean', BooleanConverter],
	['Date', DateTimeConverter],
	['date-time', DateTimeConverter],
	['literal', LiteralConverter],
	['enum', LiteralConverter],
	['array', ArrayConverter],
];

/**
 * Maps parameter type names to the converter class which generates their schema and validates their values.
 * A new registry is seeded with the built-in converters.
 */
export class ConverterRegistry {
	private readonly converters = new Map<string, ConverterClass>(BUILT_IN_CONVERTERS);

	/**
	 * Registers a converter for a new type name.
	 * @throws ConversionAddError if the type name already has a converter
	 */
	add(typeName: string, converterClass: ConverterClass): void {
		if (this.converters.has(typeName)) throw new ConversionAddError(typeName);
		this.converters.set(typeName, converterClass);
		logger.info(`Added converter ${converterClass.name} for type ${typeName}`);
	}

	get(typeName: string): ConverterClass | undefined {
		return this.converters.get(typeName);
	}

	has(typeName: string): boolean {
		return this.converters.has(typeName);
	}

	typeNames(): string[] {
		return Array.from(this.converters.keys());
	}
}

/** The process-wide registry used by libraries which are not given their own */
export const defaultConverterRegistry = new ConverterRegistry();

/**
 * Registers a converter in the process-wide default registry.
 * Register all converters before function libraries are constructed and calls are dispatched.
 * @throws ConversionAddError if the type name already has a converter
 */
export function addConverter(typeName: string, converterClass: ConverterClass): void {
	defaultConverterRegistry.add(typeName, converterClass);
}
