import { envFlag } from '../utils/env-var';

export interface LibraryConfig {
	/** Rewrite arithmetic expressions returned as argument values (eg "x": 2+2) into their result */
	evaluateExpressions: boolean;
	/** The default value of the strict flag on generated function schemas */
	strictSchemas: boolean;
}

export const EVALUATE_EXPRESSIONS_ENV = 'FUNCTION_LIB_EVALUATE_EXPRESSIONS';
export const STRICT_SCHEMAS_ENV = 'FUNCTION_LIB_STRICT_SCHEMAS';

/**
 * Reads the library configuration from the environment variables.
 * Evaluated on each call so tests and applications can change the environment before constructing a library.
 */
export function loadLibraryConfig(): LibraryConfig {
	return {
		evaluateExpressions: envFlag(EVALUATE_EXPRESSIONS_ENV, false),
		strictSchemas: envFlag(STRICT_SCHEMAS_ENV, false),
	};
}
