/**
 * A source value plus a derived value that is computed elsewhere and stored
 * here. Replacing the source discards the derived value.
 */
export class CachedValue<TBase, TDerived> {
	private base: TBase;
	private derived: TDerived | undefined;
	private baseVersion = 0;

	constructor(initial: TBase) {
		this.base = this.adoptBase(initial);
	}

	/** Replaces the base value and clears the derived value in the same step. */
	setBase(value: TBase): void {
		this.base = this.adoptBase(value);
		this.derived = undefined;
		this.baseVersion++;
	}

	getBase(): TBase {
		return this.base;
	}

	/**
	 * Stores a derived value without checking it against the base.
	 * Passing `undefined` clears it.
	 */
	setDerived(value: TDerived | undefined): void {
		this.derived = value === undefined ? undefined : this.adoptDerived(value);
	}

	getDerived(): TDerived | undefined {
		return this.derived;
	}

	get hasDerived(): boolean {
		return this.derived !== undefined;
	}

	clearDerived(): void {
		this.derived = undefined;
	}

	/** Number of times the base has been replaced since construction. */
	get version(): number {
		return this.baseVersion;
	}

	/** Hook for subclasses to copy or freeze an incoming base value. */
	protected adoptBase(value: TBase): TBase {
		return value;
	}

	/** Hook for subclasses to copy or freeze an incoming derived value. */
	protected adoptDerived(value: TDerived): TDerived {
		return value;
	}
}
