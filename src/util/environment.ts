/**
 * Environment variable access
 */

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Reads an environment variable from `env`, falling back to `process.env`.
 * Empty strings count as unset.
 *
 * @param key The environment variable name
 * @returns The environment variable value or undefined if not found
 */
export function getEnvVar(key: string, env?: Environment): string | undefined {
	const source = env ?? (typeof process !== 'undefined' ? process.env : undefined);
	const value = source?.[key];
	return value === '' ? undefined : value;
}
