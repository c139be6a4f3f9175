import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'matcache';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('resolver') -> returns a debugger for 'matcache:resolver'
 *
 * Usage:
 * const log = createLogger('invert');
 * log('Inverting %dx%d matrix', rows, columns);
 * const errorLog = log.extend('error'); // Creates 'matcache:invert:error'
 * errorLog('Inversion failed: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'holder', 'resolver')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable matcache debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'matcache:*')
 *   Examples:
 *   - 'matcache:*' - all logs
 *   - 'matcache:resolver' - cache hit/miss notices only
 *   - 'matcache:*,-matcache:holder' - all except holder state changes
 * @param logFn - Optional custom log function. Defaults to debug's stderr writer.
 *
 * @example
 * ```typescript
 * import { enableLogging } from 'matcache';
 *
 * enableLogging('matcache:resolver', console.log.bind(console));
 * ```
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/**
 * Disable all matcache debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without 'matcache:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
