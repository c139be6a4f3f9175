import type { CachedValue } from '../util/cached.js';
import type { Matrix } from '../matrix/matrix.js';
import { defaultInverter, type Inverter } from '../matrix/invert.js';
import { resolveInversionOptions, type InversionOptions } from '../matrix/inversion-options.js';
import { emitNotice } from './notices.js';

export const CACHE_HIT_MESSAGE = 'A previously stored inverse has been retrieved from cache.';
export const CACHE_MISS_MESSAGE = 'No stored inverse; computed and cached a new one.';

/** Wording of the notices emitted by {@link resolveDerived}. */
export interface ResolutionMessages {
	label: string;
	hit: string;
	miss: string;
}

export interface ResolveInverseOptions extends Partial<InversionOptions> {
	/** Routine used on a cache miss. Defaults to the ml-matrix backed `invert`. */
	inverter?: Inverter;
}

const INVERSE_MESSAGES: ResolutionMessages = {
	label: 'inverse',
	hit: CACHE_HIT_MESSAGE,
	miss: CACHE_MISS_MESSAGE,
};

/**
 * Read-through resolution over any {@link CachedValue}: returns the stored
 * derived value, or computes it from the base, stores it and returns it.
 *
 * Nothing is stored when `compute` throws, so the next call computes again.
 */
export function resolveDerived<TBase, TDerived>(
	holder: CachedValue<TBase, TDerived>,
	compute: (base: TBase) => TDerived,
	messages: ResolutionMessages = defaultMessages('derived value')
): TDerived {
	const cached = holder.getDerived();
	if (cached !== undefined) {
		emitNotice({ kind: 'hit', message: messages.hit, version: holder.version, label: messages.label });
		return cached;
	}

	holder.setDerived(compute(holder.getBase()));
	const stored = holder.getDerived();
	if (stored === undefined) {
		throw new TypeError(`Computed ${messages.label} is undefined and cannot be cached`);
	}
	emitNotice({ kind: 'miss', message: messages.miss, version: holder.version, label: messages.label });
	return stored;
}

/**
 * Returns the inverse of the holder's matrix, computing it only when no
 * inverse is cached. Options are only read on a miss.
 *
 * @throws InvalidMatrixError from the inverter when the base is not invertible; the cache stays empty
 * @throws InvalidOptionsError when `options` are malformed
 */
export function resolveInverse(holder: CachedValue<Matrix, Matrix>, options: ResolveInverseOptions = {}): Matrix {
	const { inverter = defaultInverter, ...overrides } = options;
	return resolveDerived(
		holder,
		base => inverter(base, resolveInversionOptions(overrides)),
		INVERSE_MESSAGES
	);
}

function defaultMessages(label: string): ResolutionMessages {
	return {
		label,
		hit: `Retrieved ${label} from cache.`,
		miss: `Computed ${label} and stored it.`,
	};
}
