import { createLogger } from '../common/logger.js';
import { CachedValue } from '../util/cached.js';
import { dimensions, EMPTY_MATRIX, freezeMatrix, type Matrix } from '../matrix/matrix.js';

const log = createLogger('holder');

/**
 * Holds a matrix and its cached inverse.
 *
 * Both matrices are stored as frozen copies, so a caller that keeps a
 * reference to the array it passed in cannot change what is cached.
 * Squareness is not checked here; inversion rejects bad shapes.
 *
 * @example
 * ```typescript
 * const holder = new CachedMatrix([[2, 0], [0, 2]]);
 * resolveInverse(holder); // computes
 * resolveInverse(holder); // cache hit
 * holder.setBase([[1, 0], [0, 1]]); // inverse discarded
 * ```
 */
export class CachedMatrix extends CachedValue<Matrix, Matrix> {
	constructor(initial: Matrix = EMPTY_MATRIX) {
		super(initial);
	}

	override setBase(value: Matrix): void {
		super.setBase(value);
		const { rows, columns } = dimensions(this.getBase());
		log('Base replaced with %dx%d matrix (version %d), cached inverse discarded', rows, columns, this.version);
	}

	override setDerived(value: Matrix | undefined): void {
		super.setDerived(value);
		log(value === undefined ? 'Cached inverse cleared' : 'Cached inverse stored (version %d)', this.version);
	}

	protected override adoptBase(value: Matrix): Matrix {
		return freezeMatrix(value);
	}

	protected override adoptDerived(value: Matrix): Matrix {
		return freezeMatrix(value);
	}
}
