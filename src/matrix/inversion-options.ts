/**
 * Inversion options: defaults, environment overrides and validation.
 */

import { createLogger } from '../common/logger.js';
import { InvalidOptionsError } from '../common/errors.js';
import { getEnvVar, type Environment } from '../util/environment.js';

const log = createLogger('options');

export type InversionMethod = 'lu' | 'svd';

export const INVERSION_METHODS: readonly InversionMethod[] = ['lu', 'svd'];

export interface InversionOptions {
	/** Decomposition used to invert: LU (default) or singular value decomposition */
	method: InversionMethod;
	/** Reciprocal condition estimates below this are treated as singular */
	tolerance: number;
}

export const DEFAULT_INVERSION_OPTIONS: Readonly<InversionOptions> = Object.freeze({
	method: 'lu',
	tolerance: Number.EPSILON,
});

export const ENV_METHOD = 'MATCACHE_METHOD';
export const ENV_TOLERANCE = 'MATCACHE_TOLERANCE';

export function isInversionMethod(value: unknown): value is InversionMethod {
	return INVERSION_METHODS.some(method => method === value);
}

/**
 * Builds the effective options. Later sources win:
 * defaults, then `MATCACHE_METHOD` / `MATCACHE_TOLERANCE`, then `overrides`.
 *
 * @param overrides Explicit options from the caller
 * @param env Environment to read instead of `process.env`
 * @throws InvalidOptionsError for an unknown method or a negative/non-finite tolerance
 */
export function resolveInversionOptions(
	overrides?: Partial<InversionOptions>,
	env?: Environment
): Readonly<InversionOptions> {
	const resolved: InversionOptions = { ...DEFAULT_INVERSION_OPTIONS };

	const envMethod = getEnvVar(ENV_METHOD, env);
	if (envMethod !== undefined) {
		resolved.method = parseMethod(envMethod.trim().toLowerCase(), ENV_METHOD);
	}

	const envTolerance = getEnvVar(ENV_TOLERANCE, env);
	if (envTolerance !== undefined) {
		resolved.tolerance = parseTolerance(Number(envTolerance), ENV_TOLERANCE);
	}

	if (overrides?.method !== undefined) {
		resolved.method = parseMethod(overrides.method, 'method');
	}
	if (overrides?.tolerance !== undefined) {
		resolved.tolerance = parseTolerance(overrides.tolerance, 'tolerance');
	}

	log('Resolved inversion options: %j', resolved);
	return Object.freeze(resolved);
}

function parseMethod(value: unknown, source: string): InversionMethod {
	if (!isInversionMethod(value)) {
		throw new InvalidOptionsError(`Invalid ${source}: ${String(value)} (expected one of ${INVERSION_METHODS.join(', ')})`);
	}
	return value;
}

function parseTolerance(value: number, source: string): number {
	if (!Number.isFinite(value) || value < 0) {
		throw new InvalidOptionsError(`Invalid ${source}: ${value} (expected a finite number >= 0)`);
	}
	return value;
}
