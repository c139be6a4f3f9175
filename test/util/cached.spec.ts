import { expect } from 'chai';
import { CachedValue } from '../../src/util/cached.js';

describe('CachedValue', () => {
	it('starts with the initial base and no derived value', () => {
		const cached = new CachedValue<string, number>('abc');
		expect(cached.getBase()).to.equal('abc');
		expect(cached.getDerived()).to.be.undefined;
		expect(cached.hasDerived).to.be.false;
		expect(cached.version).to.equal(0);
	});

	it('stores and returns a derived value', () => {
		const cached = new CachedValue<string, number>('abc');
		cached.setDerived(3);
		expect(cached.getDerived()).to.equal(3);
		expect(cached.hasDerived).to.be.true;
	});

	it('keeps a falsy derived value as present', () => {
		const cached = new CachedValue<string, number>('');
		cached.setDerived(0);
		expect(cached.hasDerived).to.be.true;
		expect(cached.getDerived()).to.equal(0);
	});

	it('clears the derived value when the base is replaced', () => {
		const cached = new CachedValue<string, number>('abc');
		cached.setDerived(3);
		cached.setBase('hello');
		expect(cached.getBase()).to.equal('hello');
		expect(cached.getDerived()).to.be.undefined;
		expect(cached.version).to.equal(1);
	});

	it('clears the derived value when the same base is set again', () => {
		const cached = new CachedValue<string, number>('abc');
		cached.setDerived(3);
		cached.setBase('abc');
		expect(cached.hasDerived).to.be.false;
	});

	it('clears the derived value via setDerived(undefined) and clearDerived', () => {
		const cached = new CachedValue<string, number>('abc');
		cached.setDerived(3);
		cached.setDerived(undefined);
		expect(cached.hasDerived).to.be.false;

		cached.setDerived(4);
		cached.clearDerived();
		expect(cached.getDerived()).to.be.undefined;
		expect(cached.version).to.equal(0);
	});

	it('does not check the derived value against the base', () => {
		const cached = new CachedValue<string, number>('abc');
		cached.setDerived(99);
		expect(cached.getDerived()).to.equal(99);
	});
});
