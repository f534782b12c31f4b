/**
 * Exact rational numbers over bigint, always kept normalized:
 * gcd(num, den) = 1 and den > 0.
 */

function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}

export class Rational {
  readonly num: bigint;
  readonly den: bigint;

  private constructor(num: bigint, den: bigint) {
    this.num = num;
    this.den = den;
  }

  static of(num: bigint, den: bigint = 1n): Rational {
    if (den === 0n) {
      throw new RangeError("Rational with zero denominator");
    }
    if (den < 0n) {
      num = -num;
      den = -den;
    }
    const g = gcd(num, den);
    return g > 1n ? new Rational(num / g, den / g) : new Rational(num, den);
  }

  static fromInt(n: number | bigint): Rational {
    return Rational.of(BigInt(n));
  }

  /**
   * Parse a decimal literal such as `42`, `-1.25` or `6.02e23` exactly.
   * Returns null when the text is not a decimal number.
   */
  static parse(text: string): Rational | null {
    const m = /^([+-]?)(\d+)(?:\.(\d+))?(?:[eE]([+-]?\d+))?$/.exec(text.trim());
    if (!m) return null;
    const [, sign, intPart, fracPart = "", expPart = "0"] = m;
    let num = BigInt(intPart + fracPart);
    let den = 10n ** BigInt(fracPart.length);
    const exp = parseInt(expPart, 10);
    if (exp >= 0) {
      num *= 10n ** BigInt(exp);
    } else {
      den *= 10n ** BigInt(-exp);
    }
    return Rational.of(sign === "-" ? -num : num, den);
  }

  isInteger(): boolean {
    return this.den === 1n;
  }

  isZero(): boolean {
    return this.num === 0n;
  }

  add(o: Rational): Rational {
    return Rational.of(this.num * o.den + o.num * this.den, this.den * o.den);
  }

  sub(o: Rational): Rational {
    return Rational.of(this.num * o.den - o.num * this.den, this.den * o.den);
  }

  mul(o: Rational): Rational {
    return Rational.of(this.num * o.num, this.den * o.den);
  }

  /** Caller checks for a zero divisor. */
  div(o: Rational): Rational {
    return Rational.of(this.num * o.den, this.den * o.num);
  }

  /** Remainder of truncated division, sign follows the dividend. */
  mod(o: Rational): Rational {
    const q = (this.num * o.den) / (this.den * o.num);
    return this.sub(o.mul(Rational.of(q)));
  }

  neg(): Rational {
    return Rational.of(-this.num, this.den);
  }

  abs(): Rational {
    return this.num < 0n ? this.neg() : this;
  }

  floor(): Rational {
    const q = this.num / this.den;
    return Rational.of(this.num < 0n && q * this.den !== this.num ? q - 1n : q);
  }

  ceil(): Rational {
    return this.neg().floor().neg();
  }

  compare(o: Rational): number {
    const l = this.num * o.den;
    const r = o.num * this.den;
    return l < r ? -1 : l > r ? 1 : 0;
  }

  equals(o: Rational): boolean {
    return this.num === o.num && this.den === o.den;
  }

  toNumber(): number {
    if (this.den === 1n) return Number(this.num);
    const text = this.toString();
    if (!text.includes("/")) return Number(text);
    const [n, d] = [Number(this.num), Number(this.den)];
    if (Number.isFinite(n) && Number.isFinite(d)) return n / d;
    // Both parts beyond the double range; divide in bigint at a fixed scale.
    return Number((this.num * 10n ** 20n) / this.den) / 1e20;
  }

  /** Integers and terminating decimals print in decimal form, anything else as `n/d`. */
  toString(): string {
    if (this.den === 1n) return this.num.toString();
    let d = this.den;
    let twos = 0;
    let fives = 0;
    while (d % 2n === 0n) { d /= 2n; twos++; }
    while (d % 5n === 0n) { d /= 5n; fives++; }
    if (d !== 1n) return `${this.num}/${this.den}`;
    const digits = Math.max(twos, fives);
    const scaled = (this.num * 10n ** BigInt(digits)) / this.den;
    const negative = scaled < 0n;
    const abs = (negative ? -scaled : scaled).toString().padStart(digits + 1, "0");
    const intPart = abs.slice(0, abs.length - digits);
    const fracPart = abs.slice(abs.length - digits);
    return `${negative ? "-" : ""}${intPart}.${fracPart}`;
  }
}
