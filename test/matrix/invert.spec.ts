import { expect } from 'chai';
import { defaultInverter, invert } from '../../src/matrix/invert.js';
import { identity, matricesEqual, multiply } from '../../src/matrix/matrix.js';
import { InvalidMatrixError, InvalidOptionsError } from '../../src/common/errors.js';
import { StatusCode } from '../../src/common/types.js';

describe('invert', () => {
	it('inverts a diagonal matrix exactly', () => {
		expect(invert([[2, 0], [0, 2]])).to.deep.equal([[0.5, 0], [0, 0.5]]);
	});

	it('inverts a general matrix with LU', () => {
		const inverse = invert([[4, 7], [2, 6]]);
		expect(matricesEqual(inverse, [[0.6, -0.7], [-0.2, 0.4]], 1e-12)).to.be.true;
	});

	it('inverts with SVD', () => {
		const base = [[1, 2, 0], [0, 1, 3], [4, 0, 1]];
		const inverse = invert(base, { method: 'svd' });
		expect(matricesEqual(multiply(base, inverse), identity(3), 1e-10)).to.be.true;
	});

	it('returns a frozen matrix', () => {
		const inverse = invert([[2]]);
		expect(inverse).to.deep.equal([[0.5]]);
		expect(Object.isFrozen(inverse)).to.be.true;
	});

	it('rejects a singular matrix', () => {
		expect(() => invert([[1, 2], [2, 4]])).to.throw(InvalidMatrixError, 'Matrix is singular (2x2)');
	});

	it('rejects a zero matrix with SVD', () => {
		expect(() => invert([[0, 0], [0, 0]], { method: 'svd' })).to.throw(InvalidMatrixError);
	});

	it('rejects singular matrices with SVD when the tolerance is zero', () => {
		expect(() => invert([[0, 0], [0, 0]], { method: 'svd', tolerance: 0 })).to.throw(InvalidMatrixError, 'Matrix is singular (2x2)');
		expect(() => invert([[1, 2], [2, 4]], { method: 'svd', tolerance: 0 })).to.throw(InvalidMatrixError, 'Matrix is singular (2x2)');
	});

	it('rejects singular matrices with LU when the tolerance is zero', () => {
		expect(() => invert([[1, 2], [2, 4]], { tolerance: 0 })).to.throw(InvalidMatrixError, 'Matrix is singular (2x2)');
	});

	it('applies the tolerance to nearly singular matrices', () => {
		const base = [[1, 0], [0, 1e-10]];
		expect(() => invert(base, { tolerance: 1e-8 })).to.throw(InvalidMatrixError, 'Matrix is singular (2x2)');
		expect(matricesEqual(invert(base), [[1, 0], [0, 1e10]], 1e-3)).to.be.true;
	});

	it('rejects non-square matrices with their shape', () => {
		let caught: unknown;
		try {
			invert([[1, 2, 3], [4, 5, 6]]);
		} catch (e) {
			caught = e;
		}
		expect(caught).to.be.instanceOf(InvalidMatrixError);
		if (caught instanceof InvalidMatrixError) {
			expect(caught.message).to.equal('Matrix is not square (2x3)');
			expect(caught.rows).to.equal(2);
			expect(caught.columns).to.equal(3);
			expect(caught.code).to.equal(StatusCode.MISMATCH);
		}
	});

	it('rejects empty, ragged and non-finite input', () => {
		expect(() => invert([])).to.throw(InvalidMatrixError, 'Cannot invert an empty matrix');
		expect(() => invert([[]])).to.throw(InvalidMatrixError, 'Cannot invert an empty matrix');
		expect(() => invert([[1, 2], [3]])).to.throw(InvalidMatrixError, 'Matrix rows have differing lengths');
		expect(() => invert([[1, NaN], [0, 1]])).to.throw(InvalidMatrixError, 'Matrix contains non-finite entries');
		expect(() => invert([[1, Infinity], [0, 1]])).to.throw(InvalidMatrixError, 'Matrix contains non-finite entries');
	});

	it('rejects malformed options before inverting', () => {
		expect(() => invert([[1]], { tolerance: -1 })).to.throw(InvalidOptionsError);
		expect(() => invert([[1]], { tolerance: Number.NaN })).to.throw(InvalidOptionsError);
	});

	describe('defaultInverter', () => {
		const saved = process.env.MATCACHE_METHOD;

		afterEach(() => {
			if (saved === undefined) {
				delete process.env.MATCACHE_METHOD;
			} else {
				process.env.MATCACHE_METHOD = saved;
			}
		});

		it('uses the options it is given without reading the environment again', () => {
			process.env.MATCACHE_METHOD = 'qr';
			expect(() => invert([[2]])).to.throw(InvalidOptionsError);
			expect(defaultInverter([[2]], { method: 'lu', tolerance: Number.EPSILON })).to.deep.equal([[0.5]]);
		});
	});
});
