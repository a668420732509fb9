export { ArrayConverter, elementSchema } from './arrayConverter';
export { BooleanConverter } from './booleanConverter';
export { type Converter, type ConverterClass, copyConstraints } from './converter';
export { ConverterRegistry, addConverter, defaultConverterRegistry } from './converterRegistry';
export { DateTimeConverter } from './dateTimeConverter';
export { LiteralConverter } from './literalConverter';
export { NumericConverter } from './numericConverter';
export { DEFAULT_MAX_LENGTH, DEFAULT_MIN_LENGTH, StringConverter } from './stringConverter';
