/**
 * Decimal — safe financial math wrapper over decimal.js-light.
 *
 * Prices, sizes, balances and PnL are Decimal everywhere in the engine.
 * Domain code never imports decimal.js-light directly.
 */
import * as decimalLight from "decimal.js-light";

const DecimalLight = decimalLight.default;
type DecimalLight = InstanceType<typeof DecimalLight>;

DecimalLight.set({ precision: 40 });

export class Decimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error if value is not finite (for numbers), empty or not numeric (for strings)
	 * @example Decimal.from("100.5")
	 */
	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return new Decimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		return new Decimal(new DecimalLight(trimmed));
	}

	/** Parses a venue-supplied numeric string, returning null instead of throwing. */
	static parse(value: string): Decimal | null {
		try {
			return Decimal.from(value);
		} catch {
			return null;
		}
	}

	static zero(): Decimal {
		return ZERO;
	}

	static one(): Decimal {
		return ONE;
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw.plus(other.raw));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw.minus(other.raw));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.raw.times(other.raw));
	}

	neg(): Decimal {
		return new Decimal(this.raw.negated());
	}

	abs(): Decimal {
		return new Decimal(this.raw.absoluteValue());
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: Decimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: Decimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: Decimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: Decimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: Decimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	toNumber(): number {
		return this.raw.toNumber();
	}

	toString(): string {
		return this.raw.toString();
	}

	/** Fixed-point string with `places` decimals, rounding half up. */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toJSON(): string {
		return this.toString();
	}
}

const ZERO = Decimal.from(0);
const ONE = Decimal.from(1);
