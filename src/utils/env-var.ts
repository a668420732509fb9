/**
 * Gets an environment variable for a key.
 * If a default value is provided, it will be returned if the environment variable is nullish or empty.
 * If no default value is provided and the environment variable is nullish or empty, an error will be thrown.
 * @param key The environment variable key.
 * @param defaultValue Optional default value.
 */
export function envVar(key: string, defaultValue?: string): string {
	const value = process.env[key];
	if (value === undefined || value === null || value.trim() === '') {
		if (defaultValue !== undefined) {
			return defaultValue;
		}
		throw new Error(`The environment variable ${key} is required and was not found.`);
	}
	return value;
}

/**
 * Gets a boolean environment variable. Accepts true/false, 1/0 and yes/no (case-insensitive).
 * @param key The environment variable key.
 * @param defaultValue returned when the variable is unset or empty
 */
export function envFlag(key: string, defaultValue: boolean): boolean {
	const value = envVar(key, String(defaultValue)).trim().toLowerCase();
	if (value === 'true' || value === '1' || value === 'yes') return true;
	if (value === 'false' || value === '0' || value === 'no') return false;
	throw new Error(`The environment variable ${key} must be a boolean (true/false) but was "${value}".`);
}
