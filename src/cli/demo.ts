/**
 * Usage demonstration: build a holder, resolve its inverse twice, report
 * what happened on each call.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { CachedMatrix } from '../cache/cached-matrix.js';
import { resolveInverse } from '../cache/resolver.js';
import { onResolution, type ResolutionNotice } from '../cache/notices.js';
import { formatMatrix, freezeMatrix, type Matrix } from '../matrix/matrix.js';
import type { InversionOptions } from '../matrix/inversion-options.js';
import { MatcacheError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';

export const DEFAULT_DEMO_SIZE = 4;
export const DEFAULT_DEMO_SEED = 1;

export interface DemoOptions extends Partial<InversionOptions> {
	/** Matrix to invert; a seeded random matrix when omitted */
	matrix?: Matrix;
	size?: number;
	seed?: number;
	/** How many times to resolve (default 2) */
	repeat?: number;
}

export interface DemoRun {
	notice: ResolutionNotice;
	inverse: Matrix;
}

export interface DemoResult {
	base: Matrix;
	runs: DemoRun[];
}

export function runDemo(options: DemoOptions = {}): DemoResult {
	const { matrix, size = DEFAULT_DEMO_SIZE, seed = DEFAULT_DEMO_SEED, repeat = 2, ...inversion } = options;
	const holder = new CachedMatrix(matrix ?? randomMatrix(size, seed));

	const notices: ResolutionNotice[] = [];
	const unsubscribe = onResolution(notice => notices.push(notice));
	const runs: DemoRun[] = [];
	try {
		for (let i = 0; i < repeat; i++) {
			const inverse = resolveInverse(holder, inversion);
			const notice = notices.shift();
			if (!notice) {
				throw new MatcacheError(`Resolution ${i + 1} emitted no notice`, StatusCode.ERROR);
			}
			runs.push({ notice, inverse });
		}
	} finally {
		unsubscribe();
	}

	return { base: holder.getBase(), runs };
}

/** Uniform [0, 1) entries from a mulberry32 generator seeded with `seed`. */
export function randomMatrix(size: number, seed: number): Matrix {
	let state = seed >>> 0;
	const next = (): number => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};

	const rows: number[][] = [];
	for (let i = 0; i < size; i++) {
		const row: number[] = [];
		for (let j = 0; j < size; j++) {
			row.push(next());
		}
		rows.push(row);
	}
	return freezeMatrix(rows);
}

export function renderDemoJson(result: DemoResult): string {
	return JSON.stringify({
		base: result.base,
		runs: result.runs.map(run => ({ kind: run.notice.kind, message: run.notice.message, inverse: run.inverse })),
	}, null, 2);
}

export function renderDemoTable(result: DemoResult, digits = 4): string {
	const table = new Table({ head: [chalk.cyan('Call'), chalk.cyan('Source'), chalk.cyan('Inverse')] });
	result.runs.forEach((run, index) => {
		const source = run.notice.kind === 'hit' ? chalk.green('cache') : chalk.yellow('computed');
		table.push([String(index + 1), source, formatMatrix(run.inverse, digits)]);
	});

	const lines = [
		chalk.bold('Matrix:'),
		formatMatrix(result.base, digits),
		'',
		...result.runs.map((run, index) => chalk.gray(`${index + 1}: ${run.notice.message}`)),
		table.toString(),
	];
	return lines.join('\n');
}
