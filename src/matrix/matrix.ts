import { InvalidMatrixError } from '../common/errors.js';

/** Row-major 2-D numeric matrix. Stored matrices are frozen, so they are never mutated in place. */
export type Matrix = ReadonlyArray<ReadonlyArray<number>>;

export interface Dimensions {
	rows: number;
	columns: number;
}

/** 0x0 placeholder used as the default base of a holder. */
export const EMPTY_MATRIX: Matrix = Object.freeze([]);

/**
 * Row count and the column count of the first row. A ragged matrix reports
 * its first row's width; use {@link isRectangular} to detect raggedness.
 */
export function dimensions(matrix: Matrix): Dimensions {
	return { rows: matrix.length, columns: matrix[0]?.length ?? 0 };
}

export function isRectangular(matrix: Matrix): boolean {
	const { columns } = dimensions(matrix);
	return matrix.every(row => row.length === columns);
}

export function isSquare(matrix: Matrix): boolean {
	return isRectangular(matrix) && matrix.length === dimensions(matrix).columns;
}

export function isEmpty(matrix: Matrix): boolean {
	const { rows, columns } = dimensions(matrix);
	return rows === 0 || columns === 0;
}

/** Deep-copies `matrix` and freezes every row and the outer array. */
export function freezeMatrix(matrix: Matrix): Matrix {
	if (Object.isFrozen(matrix) && matrix.every(row => Object.isFrozen(row))) {
		return matrix;
	}
	return Object.freeze(matrix.map(row => Object.freeze([...row])));
}

export function identity(size: number): Matrix {
	const rows: number[][] = [];
	for (let i = 0; i < size; i++) {
		const row = new Array<number>(size).fill(0);
		row[i] = 1;
		rows.push(row);
	}
	return freezeMatrix(rows);
}

/**
 * Element-wise comparison. Shapes must match exactly; entries may differ by
 * at most `tolerance`.
 */
export function matricesEqual(a: Matrix, b: Matrix, tolerance = 0): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		const rowA = a[i];
		const rowB = b[i];
		if (rowA.length !== rowB.length) return false;
		for (let j = 0; j < rowA.length; j++) {
			if (Math.abs(rowA[j] - rowB[j]) > tolerance) return false;
		}
	}
	return true;
}

/** Plain matrix product. Used to check an inverse against its base. */
export function multiply(a: Matrix, b: Matrix): Matrix {
	const { rows, columns: inner } = dimensions(a);
	const { rows: innerB, columns } = dimensions(b);
	if (inner !== innerB) {
		throw new InvalidMatrixError(`Cannot multiply ${rows}x${inner} by ${innerB}x${columns}`, rows, inner);
	}
	const result: number[][] = [];
	for (let i = 0; i < rows; i++) {
		const row = new Array<number>(columns).fill(0);
		for (let k = 0; k < inner; k++) {
			const aik = a[i][k];
			for (let j = 0; j < columns; j++) {
				row[j] += aik * b[k][j];
			}
		}
		result.push(row);
	}
	return freezeMatrix(result);
}

/**
 * Renders one line per row, entries fixed to `digits` decimals and
 * right-aligned. An empty matrix renders as `[]`.
 */
export function formatMatrix(matrix: Matrix, digits = 4): string {
	if (isEmpty(matrix)) return '[]';
	const cells = matrix.map(row => row.map(value => normalizeZero(value).toFixed(digits)));
	const width = Math.max(...cells.flat().map(cell => cell.length));
	return cells.map(row => row.map(cell => cell.padStart(width)).join(' ')).join('\n');
}

function normalizeZero(value: number): number {
	// -0 prints as "-0.0000"
	return Object.is(value, -0) ? 0 : value;
}

/**
 * Parses a JSON array of numeric arrays. Shape is not checked beyond that;
 * squareness is the inverter's concern.
 */
export function parseMatrix(text: string): Matrix {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (e) {
		throw new InvalidMatrixError('Matrix is not valid JSON', undefined, undefined, e instanceof Error ? e : undefined);
	}
	return toMatrix(parsed);
}

/** Narrows an unknown value to a Matrix, or throws. */
export function toMatrix(value: unknown): Matrix {
	if (!Array.isArray(value)) {
		throw new InvalidMatrixError('Matrix must be an array of rows');
	}
	const rows: number[][] = [];
	for (const [i, row] of value.entries()) {
		if (!Array.isArray(row)) {
			throw new InvalidMatrixError(`Row ${i} is not an array`);
		}
		const parsedRow: number[] = [];
		for (const [j, entry] of row.entries()) {
			if (typeof entry !== 'number') {
				throw new InvalidMatrixError(`Entry [${i}][${j}] is not a number`);
			}
			parsedRow.push(entry);
		}
		rows.push(parsedRow);
	}
	return freezeMatrix(rows);
}
