/**
 * Decimal — fixed-point arithmetic for prices, quantities, balances and PnL.
 *
 * Immutable, 18 fractional digits, backed by BigInt. Exchange filters (tick
 * size, step size) are applied through `floorToStep` / `roundToStep` so order
 * quantities and trigger prices never pick up binary floating-point noise.
 */

const DIGITS = 18;
const UNIT = 10n ** BigInt(DIGITS);
const NUMERIC = /^([-+]?)(\d*)(?:\.(\d*))?$/;

export class Decimal {
	/** Value scaled by 10^18. */
	private readonly units: bigint;

	private constructor(units: bigint) {
		this.units = units;
	}

	// ── Construction ───────────────────────────────────────────────

	static from(value: string | number | Decimal): Decimal {
		if (value instanceof Decimal) return value;
		if (typeof value === "string") return Decimal.parse(value);
		if (!Number.isFinite(value)) {
			throw new Error(`Decimal.from: invalid number ${value}`);
		}
		// String(1e-7) is "1e-7"; toFixed spells it out
		const text = String(value);
		return Decimal.parse(/e/i.test(text) ? value.toFixed(DIGITS) : text);
	}

	static zero(): Decimal {
		return new Decimal(0n);
	}

	/** Sum a list of values; empty list sums to zero. */
	static sum(values: readonly (Decimal | number)[]): Decimal {
		return new Decimal(values.reduce((acc: bigint, v) => acc + Decimal.from(v).units, 0n));
	}

	/** The smaller of two values; `a` on a tie. */
	static min(a: Decimal, b: Decimal): Decimal {
		return b.lt(a) ? b : a;
	}

	private static parse(input: string): Decimal {
		const text = input.trim();
		if (text === "") throw new Error("Decimal.from: empty string");

		const match = NUMERIC.exec(text);
		const whole = match?.[2] ?? "";
		const fraction = match?.[3] ?? "";
		if (!match || whole + fraction === "") {
			throw new Error(`Decimal.from: invalid numeric string "${input}"`);
		}

		const units = BigInt(whole || "0") * UNIT + BigInt(fraction.slice(0, DIGITS).padEnd(DIGITS, "0"));
		return new Decimal(match[1] === "-" ? -units : units);
	}

	// ── Arithmetic ─────────────────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.units + other.units);
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.units - other.units);
	}

	mul(other: Decimal): Decimal {
		return new Decimal((this.units * other.units) / UNIT);
	}

	/** Truncated toward zero at 18 digits. */
	div(other: Decimal): Decimal {
		if (other.units === 0n) throw new Error("Decimal.div: division by zero");
		return new Decimal((this.units * UNIT) / other.units);
	}

	neg(): Decimal {
		return new Decimal(-this.units);
	}

	abs(): Decimal {
		return this.units < 0n ? this.neg() : this;
	}

	// ── Exchange filters ───────────────────────────────────────────

	/**
	 * Largest multiple of `step` that is <= this value (toward -infinity).
	 * A non-positive step returns the value unchanged.
	 */
	floorToStep(step: Decimal): Decimal {
		if (step.units <= 0n) return this;
		const remainder = this.units % step.units;
		const adjust = remainder < 0n ? remainder + step.units : remainder;
		return new Decimal(this.units - adjust);
	}

	/** Nearest multiple of `step`, halves rounded away from zero. */
	roundToStep(step: Decimal): Decimal {
		if (step.units <= 0n) return this;
		if (this.units < 0n) return this.neg().roundToStep(step).neg();
		const steps = (this.units + step.units / 2n) / step.units;
		return new Decimal(steps * step.units);
	}

	// ── Comparison ─────────────────────────────────────────────────

	private cmp(other: Decimal): number {
		if (this.units === other.units) return 0;
		return this.units < other.units ? -1 : 1;
	}

	eq(other: Decimal): boolean {
		return this.cmp(other) === 0;
	}

	gt(other: Decimal): boolean {
		return this.cmp(other) > 0;
	}

	gte(other: Decimal): boolean {
		return this.cmp(other) >= 0;
	}

	lt(other: Decimal): boolean {
		return this.cmp(other) < 0;
	}

	lte(other: Decimal): boolean {
		return this.cmp(other) <= 0;
	}

	isZero(): boolean {
		return this.units === 0n;
	}

	isPositive(): boolean {
		return this.units > 0n;
	}

	// ── Output ─────────────────────────────────────────────────────

	toNumber(): number {
		return Number(this.toString());
	}

	toString(): string {
		const { sign, whole, fraction } = this.digits();
		const trimmed = fraction.replace(/0+$/, "");
		return trimmed === "" ? `${sign}${whole}` : `${sign}${whole}.${trimmed}`;
	}

	/** Truncates to `places` digits. */
	toFixed(places: number): string {
		const { sign, whole, fraction } = this.digits();
		if (places <= 0) return `${sign}${whole}`;
		return `${sign}${whole}.${fraction.slice(0, places).padEnd(places, "0")}`;
	}

	toJSON(): string {
		return this.toString();
	}

	private digits(): { sign: string; whole: string; fraction: string } {
		const magnitude = this.units < 0n ? -this.units : this.units;
		return {
			sign: this.units < 0n ? "-" : "",
			whole: (magnitude / UNIT).toString(),
			fraction: (magnitude % UNIT).toString().padStart(DIGITS, "0"),
		};
	}
}

/** Floor a plain number to a step size; returns a number. */
export function floorToStep(value: number, step: number): number {
	return Decimal.from(value).floorToStep(Decimal.from(step)).toNumber();
}

/** Round a plain number to the nearest tick; returns a number. */
export function roundToTick(value: number, tick: number): number {
	return Decimal.from(value).roundToStep(Decimal.from(tick)).toNumber();
}
