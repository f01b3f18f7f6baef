// Fixed-point decimal arithmetic on bigint. No floating point anywhere.

const DECIMAL_TEXT = /^(-)?(\d+)(?:\.(\d+))?$/;

export class DecimalParseError extends Error {
  constructor(readonly text: string) {
    super(`invalid decimal literal '${text}'`);
    this.name = "DecimalParseError";
  }
}

function pow10(n: number): bigint {
  return 10n ** BigInt(n);
}

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

/**
 * Exact decimal: `unscaled × 10^-scale`. Instances are immutable.
 */
export class Decimal {
  private constructor(readonly unscaled: bigint, readonly scale: number) {}

  static readonly ZERO = new Decimal(0n, 0);

  static of(unscaled: bigint, scale = 0): Decimal {
    if (!Number.isSafeInteger(scale) || scale < 0) {
      throw new RangeError(`decimal scale must be a non-negative integer, got ${scale}`);
    }
    return new Decimal(unscaled, scale);
  }

  static parse(text: string): Decimal {
    const m = DECIMAL_TEXT.exec(text.trim());
    if (!m) throw new DecimalParseError(text);
    const [, sign, whole, frac = ""] = m;
    const unscaled = BigInt(whole + frac);
    return new Decimal(sign ? -unscaled : unscaled, frac.length);
  }

  static isDecimalText(text: string): boolean {
    return DECIMAL_TEXT.test(text.trim());
  }

  static fromInteger(n: bigint | number): Decimal {
    return new Decimal(BigInt(n), 0);
  }

  // =========================================================================
  // Arithmetic (exact)
  // =========================================================================

  add(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(this.at(scale) + other.at(scale), scale);
  }

  sub(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(this.at(scale) - other.at(scale), scale);
  }

  mul(other: Decimal): Decimal {
    return new Decimal(this.unscaled * other.unscaled, this.scale + other.scale);
  }

  neg(): Decimal {
    return new Decimal(-this.unscaled, this.scale);
  }

  /**
   * Change the scale. Dropped digits round half to even.
   */
  rescale(scale: number): Decimal {
    if (scale === this.scale) return this;
    if (scale > this.scale) {
      return new Decimal(this.unscaled * pow10(scale - this.scale), scale);
    }

    const divisor = pow10(this.scale - scale);
    let q = this.unscaled / divisor;
    const r = abs(this.unscaled % divisor);
    const twice = r * 2n;
    const away = twice > divisor || (twice === divisor && q % 2n !== 0n);
    if (away) q += this.unscaled < 0n ? -1n : 1n;
    return new Decimal(q, scale);
  }

  // =========================================================================
  // Inspection
  // =========================================================================

  compare(other: Decimal): -1 | 0 | 1 {
    const scale = Math.max(this.scale, other.scale);
    const a = this.at(scale);
    const b = other.at(scale);
    return a < b ? -1 : a > b ? 1 : 0;
  }

  equals(other: Decimal): boolean {
    return this.compare(other) === 0;
  }

  isZero(): boolean {
    return this.unscaled === 0n;
  }

  isInteger(): boolean {
    return this.unscaled % pow10(this.scale) === 0n;
  }

  /** Digits left of the point, ignoring sign and leading zeros. */
  integerDigits(): number {
    const whole = abs(this.unscaled) / pow10(this.scale);
    return whole === 0n ? 0 : whole.toString().length;
  }

  /**
   * Whether the value fits `Decimal(precision, scale)` once rounded to `scale`.
   */
  fits(precision: number, scale: number): boolean {
    return this.rescale(scale).integerDigits() <= precision - scale;
  }

  /** Integral value; throws when there is a fractional part. */
  toBigInt(): bigint {
    if (!this.isInteger()) throw new RangeError(`${this.toString()} is not an integer`);
    return this.unscaled / pow10(this.scale);
  }

  toString(): string {
    const digits = abs(this.unscaled).toString().padStart(this.scale + 1, "0");
    const sign = this.unscaled < 0n ? "-" : "";
    if (this.scale === 0) return sign + digits;
    const cut = digits.length - this.scale;
    return `${sign}${digits.slice(0, cut)}.${digits.slice(cut)}`;
  }

  toJSON(): string {
    return this.toString();
  }

  private at(scale: number): bigint {
    return this.unscaled * pow10(scale - this.scale);
  }
}

/**
 * Precision and scale a literal is written with: fractional digits give the
 * scale, integral digits (without leading zeros) plus the scale the precision.
 */
export function literalShape(text: string): { precision: number; scale: number } {
  const d = Decimal.parse(text);
  return { precision: Math.max(1, d.integerDigits() + d.scale), scale: d.scale };
}

/** Decimal digits needed for the largest magnitude in `[min, max]`. */
export function digitsForRange(min: bigint, max: bigint): number {
  const m = abs(min) > abs(max) ? abs(min) : abs(max);
  return m === 0n ? 1 : m.toString().length;
}
