/**
 * Domain-agnostic wrapper around decimal.js-light.
 *
 * Position sizes and notionals are compared and summed with exact decimal
 * arithmetic. Domain code reaches this through `shared/decimal`, never by
 * importing decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if the number is not finite or the string is not numeric
	 * @example LibDecimal.from("123.45")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (!NUMERIC.test(trimmed)) {
			throw new Error(`LibDecimal.from: not a number "${value}"`);
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	/**
	 * Non-throwing variant of `from`; returns null for unparseable input and
	 * for exponents decimal.js-light cannot represent.
	 */
	static tryFrom(value: string | number): LibDecimal | null {
		try {
			return LibDecimal.from(value);
		} catch {
			return null;
		}
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	/** Sum of all values; zero for an empty list. */
	static sum(values: Iterable<LibDecimal>): LibDecimal {
		let total = LibDecimal.zero();
		for (const value of values) {
			total = total.add(value);
		}
		return total;
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	// ── Comparison ─────────────────────────────────────────────────

	/** -1 if this < other, 0 if equal, 1 if this > other */
	cmp(other: LibDecimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		if (c < 0) return -1;
		return c > 0 ? 1 : 0;
	}

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	/** -1, 0 or 1 by sign. */
	sign(): -1 | 0 | 1 {
		if (this.isZero()) return 0;
		return this.isNegative() ? -1 : 1;
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation with trailing zeros removed.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/** Serialized form in JSON output (journal lines, log fields). */
	toJSON(): string {
		return this.toString();
	}

	/** @example LibDecimal.from("1.23456").toFixed(2) // "1.23" */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}
}
