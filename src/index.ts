/**
 * matcache - memoized matrix inversion
 *
 * A holder keeps a matrix and its lazily computed inverse; replacing the
 * matrix discards the inverse.
 */

// Holders
export { CachedValue } from './util/cached.js';
export { CachedMatrix } from './cache/cached-matrix.js';

// Resolution
export { resolveInverse, resolveDerived, CACHE_HIT_MESSAGE, CACHE_MISS_MESSAGE } from './cache/resolver.js';
export type { ResolveInverseOptions, ResolutionMessages } from './cache/resolver.js';
export { onResolution } from './cache/notices.js';
export type { ResolutionNotice, ResolutionKind, ResolutionListener } from './cache/notices.js';

// Matrices and inversion
export {
	EMPTY_MATRIX,
	dimensions,
	isSquare,
	isRectangular,
	isEmpty,
	freezeMatrix,
	identity,
	matricesEqual,
	multiply,
	formatMatrix,
	parseMatrix,
	toMatrix,
} from './matrix/matrix.js';
export type { Matrix, Dimensions } from './matrix/matrix.js';
export { invert, defaultInverter } from './matrix/invert.js';
export type { Inverter } from './matrix/invert.js';
export {
	resolveInversionOptions,
	isInversionMethod,
	DEFAULT_INVERSION_OPTIONS,
	INVERSION_METHODS,
	ENV_METHOD,
	ENV_TOLERANCE,
} from './matrix/inversion-options.js';
export type { InversionOptions, InversionMethod } from './matrix/inversion-options.js';

// Errors and status codes
export { StatusCode } from './common/types.js';
export { MatcacheError, InvalidMatrixError, InvalidOptionsError, unwrapError, formatErrorChain } from './common/errors.js';
export type { ErrorInfo } from './common/errors.js';

// Logging
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
