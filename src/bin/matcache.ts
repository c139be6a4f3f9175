#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs/promises';
import { runDemo, renderDemoJson, renderDemoTable, DEFAULT_DEMO_SEED, DEFAULT_DEMO_SIZE } from '../cli/demo.js';
import { parseMatrix } from '../matrix/matrix.js';
import { formatErrorChain, InvalidOptionsError } from '../common/errors.js';
import { enableLogging } from '../common/logger.js';
import { isInversionMethod, type InversionMethod } from '../matrix/inversion-options.js';

interface CliOptions {
	matrix?: string;
	file?: string;
	method?: string;
	tolerance?: string;
	size: string;
	seed: string;
	json?: boolean;
	verbose?: boolean;
}

const program = new Command();

program
	.name('matcache')
	.description('Invert a matrix twice through a cached holder and show where each result came from')
	.version('0.1.0')
	.option('-m, --matrix <json>', 'matrix as a JSON array of rows, e.g. [[2,0],[0,2]]')
	.option('-f, --file <path>', 'read the matrix JSON from a file')
	.option('--method <method>', 'inversion method: lu or svd')
	.option('--tolerance <n>', 'reciprocal condition threshold below which a matrix is singular')
	.option('--size <n>', 'size of the random matrix used when none is given', String(DEFAULT_DEMO_SIZE))
	.option('--seed <n>', 'seed for the random matrix', String(DEFAULT_DEMO_SEED))
	.option('-j, --json', 'output results as JSON')
	.option('-v, --verbose', 'enable matcache:* debug logging')
	.action(async (options: CliOptions) => {
		try {
			if (options.verbose) {
				enableLogging();
			}

			const text = options.file ? await fs.readFile(options.file, 'utf8') : options.matrix;
			const result = runDemo({
				matrix: text !== undefined ? parseMatrix(text) : undefined,
				size: parseInteger(options.size, 'size'),
				seed: parseInteger(options.seed, 'seed'),
				method: parseMethod(options.method),
				tolerance: options.tolerance !== undefined ? Number(options.tolerance) : undefined,
			});

			console.log(options.json ? renderDemoJson(result) : renderDemoTable(result));
		} catch (error) {
			console.error(chalk.red('Error:'), formatErrorChain(error));
			process.exit(1);
		}
	});

function parseMethod(value: string | undefined): InversionMethod | undefined {
	if (value === undefined) return undefined;
	if (!isInversionMethod(value)) {
		throw new InvalidOptionsError(`Invalid method: ${value} (expected one of lu, svd)`);
	}
	return value;
}

function parseInteger(value: string, name: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 0) {
		throw new InvalidOptionsError(`Invalid ${name}: ${value}`);
	}
	return parsed;
}

await program.parseAsync(process.argv);
