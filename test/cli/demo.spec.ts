import { expect } from 'chai';
import { randomMatrix, renderDemoJson, renderDemoTable, runDemo } from '../../src/cli/demo.js';
import { identity, matricesEqual, multiply } from '../../src/matrix/matrix.js';
import { CACHE_HIT_MESSAGE, CACHE_MISS_MESSAGE } from '../../src/cache/resolver.js';
import { InvalidMatrixError } from '../../src/common/errors.js';

describe('Demo', () => {
	it('computes on the first call and reuses on the second', () => {
		const result = runDemo({ matrix: [[2, 0], [0, 2]] });

		expect(result.base).to.deep.equal([[2, 0], [0, 2]]);
		expect(result.runs.map(run => run.notice.kind)).to.deep.equal(['miss', 'hit']);
		expect(result.runs[0].inverse).to.deep.equal([[0.5, 0], [0, 0.5]]);
		expect(result.runs[1].inverse).to.equal(result.runs[0].inverse);
	});

	it('inverts a seeded random matrix by default', () => {
		const result = runDemo();

		expect(result.base).to.have.lengthOf(4);
		expect(result.base).to.deep.equal(randomMatrix(4, 1));
		const product = multiply(result.base, result.runs[0].inverse);
		expect(matricesEqual(product, identity(4), 1e-8)).to.be.true;
	});

	it('honours the repeat count', () => {
		const result = runDemo({ matrix: [[4]], repeat: 3 });
		expect(result.runs).to.have.lengthOf(3);
		expect(result.runs.map(run => run.notice.kind)).to.deep.equal(['miss', 'hit', 'hit']);
	});

	it('propagates inversion failures', () => {
		expect(() => runDemo({ matrix: [[1, 2], [2, 4]] })).to.throw(InvalidMatrixError);
	});

	it('generates reproducible random matrices in [0, 1)', () => {
		const a = randomMatrix(3, 7);
		expect(a).to.deep.equal(randomMatrix(3, 7));
		expect(a).to.not.deep.equal(randomMatrix(3, 8));
		expect(a.flat().every(value => value >= 0 && value < 1)).to.be.true;
	});

	it('renders JSON output', () => {
		const result = runDemo({ matrix: [[2, 0], [0, 2]] });
		expect(JSON.parse(renderDemoJson(result))).to.deep.equal({
			base: [[2, 0], [0, 2]],
			runs: [
				{ kind: 'miss', message: CACHE_MISS_MESSAGE, inverse: [[0.5, 0], [0, 0.5]] },
				{ kind: 'hit', message: CACHE_HIT_MESSAGE, inverse: [[0.5, 0], [0, 0.5]] },
			],
		});
	});

	it('renders the base matrix and both notices in table output', () => {
		const lines = renderDemoTable(runDemo({ matrix: [[2, 0], [0, 2]] })).split('\n');
		expect(lines[1]).to.equal('2.0000 0.0000');
		expect(lines[2]).to.equal('0.0000 2.0000');
		expect(lines.some(line => line.includes(CACHE_MISS_MESSAGE))).to.be.true;
		expect(lines.some(line => line.includes(CACHE_HIT_MESSAGE))).to.be.true;
	});
});
