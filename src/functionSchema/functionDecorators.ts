import { InvalidFuncArg } from './errors';
import type { ParamDeclaration } from './functions';

export interface FuncOptions {
	/** The function name sent to the model. Defaults to the method name */
	name?: string;
	description: string;
	/** The handler parameters, in positional order */
	params?: readonly ParamDeclaration[];
	/** Parameters the model must always provide, even if they have a default value */
	required?: readonly string[];
	/** Words which force the model to call this function when they appear in a query */
	forceWords?: readonly string[];
	/** Defaults to true */
	enabled?: boolean;
	/** Defaults to the FUNCTION_LIB_STRICT_SCHEMAS configuration */
	strict?: boolean;
}

/**
 * A method declared as callable by the model. The command descriptor is built from it when a library is constructed.
 */
export interface FunctionDeclaration extends FuncOptions {
	name: string;
	methodName: string;
	// biome-ignore lint/complexity/noBannedTypes: invoked with Reflect.apply on the library instance
	handler: Function;
}

// Keyed by the decorated method, so the declaration can be found from the class prototype
const declarations = new WeakMap<object, FunctionDeclaration>();

/**
 * Decorator for the methods of a FunctionLibrary subclass which the model can call.
 * Methods without this decorator are never sent to the model.
 *
 * <code>
 * class Clock extends FunctionLibrary {
 *    \@func({
 *        name: 'get_time',
 *        description: 'Get the current time and day in UTC.',
 *        params: [{ name: 'comment', type: 'string', description: 'An interesting, amusing remark.' }],
 *    })
 *    getTime(comment: string): string {
 *        return comment;
 *    }
 * }
 * </code>
 */
export function func(options: FuncOptions) {
	return function funcDecorator<This extends object, Args extends unknown[], Return>(
		method: (this: This, ...args: Args) => Return,
		context: ClassMethodDecoratorContext<This, (this: This, ...args: Args) => Return>,
	): void {
		const methodName = String(context.name);
		if (context.static || context.private) throw new InvalidFuncArg(`@func can only be applied to public instance methods. ${methodName} is not.`);
		declarations.set(method, {
			...options,
			name: options.name ?? methodName,
			methodName,
			handler: method,
		});
	};
}

/**
 * @returns the declaration registered by the func decorator for a method, if any
 */
export function getFunctionDeclaration(method: unknown): FunctionDeclaration | undefined {
	if (typeof method !== 'function') return undefined;
	return declarations.get(method);
}
