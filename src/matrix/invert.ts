/**
 * Matrix inversion backed by ml-matrix.
 *
 * This is the only place that touches the linear-algebra library. It checks
 * shape and conditioning up front so callers get an InvalidMatrixError rather
 * than a pseudo-inverse or a matrix of infinities.
 */

import { LuDecomposition, Matrix as MlMatrix, SingularValueDecomposition } from 'ml-matrix';
import { createLogger } from '../common/logger.js';
import { InvalidMatrixError, MatcacheError } from '../common/errors.js';
import { dimensions, freezeMatrix, isRectangular, type Matrix } from './matrix.js';
import { resolveInversionOptions, type InversionOptions } from './inversion-options.js';

const log = createLogger('invert');
const errorLog = log.extend('error');

/** Signature of an inversion routine. Thrown errors propagate to the resolver's caller. */
export type Inverter = (matrix: Matrix, options: Readonly<InversionOptions>) => Matrix;

/**
 * Inverts a square, non-singular matrix.
 *
 * @param options Partial options are completed by {@link resolveInversionOptions}
 * @throws InvalidMatrixError if the matrix is empty, ragged, non-finite, non-square or singular
 * @throws InvalidOptionsError if the options are malformed
 */
export function invert(matrix: Matrix, options?: Partial<InversionOptions>): Matrix {
	return invertWithOptions(matrix, resolveInversionOptions(options));
}

/** The default {@link Inverter}: takes options that are already resolved. */
export const defaultInverter: Inverter = (matrix, options) => invertWithOptions(matrix, options);

function invertWithOptions(matrix: Matrix, resolved: Readonly<InversionOptions>): Matrix {
	assertInvertible(matrix);

	const { rows } = dimensions(matrix);
	log('Inverting %dx%d matrix (method: %s, tolerance: %g)', rows, rows, resolved.method, resolved.tolerance);

	try {
		const source = new MlMatrix(matrix.map(row => [...row]));
		const result = resolved.method === 'svd'
			? invertSvd(source, resolved.tolerance)
			: invertLu(source, resolved.tolerance);
		return toFrozen(result);
	} catch (e) {
		if (e instanceof MatcacheError) throw e;
		errorLog('ml-matrix failed to invert %dx%d matrix: %O', rows, rows, e);
		throw new InvalidMatrixError(
			`Matrix could not be inverted: ${e instanceof Error ? e.message : String(e)}`,
			rows,
			rows,
			e instanceof Error ? e : undefined
		);
	}
}

function assertInvertible(matrix: Matrix): void {
	const { rows, columns } = dimensions(matrix);
	if (rows === 0 || columns === 0) {
		throw new InvalidMatrixError('Cannot invert an empty matrix', rows, columns);
	}
	if (!isRectangular(matrix)) {
		throw new InvalidMatrixError('Matrix rows have differing lengths', rows, columns);
	}
	if (rows !== columns) {
		throw new InvalidMatrixError(`Matrix is not square (${rows}x${columns})`, rows, columns);
	}
	if (!matrix.every(row => row.every(Number.isFinite))) {
		throw new InvalidMatrixError('Matrix contains non-finite entries', rows, columns);
	}
}

function invertLu(source: MlMatrix, tolerance: number): MlMatrix {
	const lu = new LuDecomposition(source);
	const upper = lu.upperTriangularMatrix;
	const pivots: number[] = [];
	for (let i = 0; i < upper.rows; i++) {
		pivots.push(Math.abs(upper.get(i, i)));
	}
	if (lu.isSingular() || reciprocalCondition(pivots) < tolerance) {
		throw singular(source.rows);
	}
	return lu.solve(MlMatrix.eye(source.rows));
}

function invertSvd(source: MlMatrix, tolerance: number): MlMatrix {
	const svd = new SingularValueDecomposition(source);
	// rank drops for zero singular values whatever the tolerance
	if (svd.rank < source.rows || reciprocalCondition(svd.diagonal.map(Math.abs)) < tolerance) {
		throw singular(source.rows);
	}
	return svd.inverse();
}

/** Smallest over largest magnitude; 0 when every value is 0 or any is not finite. */
function reciprocalCondition(magnitudes: number[]): number {
	const largest = Math.max(...magnitudes);
	if (largest === 0) return 0;
	const ratio = Math.min(...magnitudes) / largest;
	return Number.isFinite(ratio) ? ratio : 0;
}

function singular(size: number): InvalidMatrixError {
	return new InvalidMatrixError(`Matrix is singular (${size}x${size})`, size, size);
}

function toFrozen(result: MlMatrix): Matrix {
	// ml-matrix can produce -0; store +0
	return freezeMatrix(result.to2DArray().map(row => row.map(value => (value === 0 ? 0 : value))));
}
