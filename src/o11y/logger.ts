import Pino from 'pino';
import { envVar } from '../utils/env-var';

const logLevel = envVar('LOG_LEVEL', 'info').toLowerCase();

// https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#logseverity
const PinoLevelToSeverityLookup: Record<string, string> = {
	trace: 'DEBUG',
	debug: 'DEBUG',
	info: 'INFO',
	warn: 'WARNING',
	error: 'ERROR',
	fatal: 'CRITICAL',
};

// When running locally log in a human-readable format and not JSON
const transport =
	envVar('LOG_PRETTY', 'false') === 'true'
		? {
				target: 'pino-pretty',
				options: {
					colorize: true,
				},
			}
		: undefined;

// Fields that should not be considered "custom" keys
const standardFields = new Set(['level', 'time', 'pid', 'hostname', 'msg', 'err', 'stack_trace', 'severity']);

/**
 * Appends the custom keys of a log call's merge object to its message, eg "Converting arguments [functionName, args]",
 * so a viewer of the logs knows what additional information was logged.
 */
export function appendCustomKeys(msg: string, mergeObject: unknown): string {
	if (!msg || typeof mergeObject !== 'object' || mergeObject === null || mergeObject instanceof Error) return msg;
	const customKeys = Object.keys(mergeObject).filter((key) => !standardFields.has(key));
	return customKeys.length ? `${msg} [${customKeys.join(', ')}]` : msg;
}

/**
 * Options of the function library logger, without the transport
 */
export const loggerOptions: Pino.LoggerOptions = {
	name: 'function-library',
	level: logLevel,
	formatters: {
		level(label: string, number: number) {
			const severity = PinoLevelToSeverityLookup[label] ?? 'INFO';
			return { severity, level: number };
		},
		log(object: Record<string, unknown>) {
			const err = object.err;
			const stackProp = err instanceof Error && err.stack ? { stack_trace: err.stack } : {};
			return { ...object, ...stackProp };
		},
	},
	hooks: {
		// The message is only available to the log method, the log formatter receives the merge object alone
		logMethod(inputArgs, method) {
			const args: unknown[] = [...inputArgs];
			if (typeof args[1] === 'string') args[1] = appendCustomKeys(args[1], args[0]);
			Reflect.apply(method, this, args);
		},
	},
};

/**
 * Pino logger for the function library.
 */
export const logger: Pino.Logger = Pino({ ...loggerOptions, transport });
