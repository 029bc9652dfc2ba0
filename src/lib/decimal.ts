const DECIMAL_RE = /^([+-]?)(?:(\d+)(?:\.(\d*))?|\.(\d+))(?:[eE]([+-]?\d+))?$/;

/**
 * Base-10 value that remembers how it was written.
 *
 * `coefficient * 10^exponent`, with the exponent taken from the number of
 * fractional digits in the source text, so "1.20" and "1.2" stay distinct.
 */
export class ExactDecimal {
  private constructor(
    readonly negative: boolean,
    readonly coefficient: bigint,
    readonly exponent: number
  ) {}

  static parse(text: string): ExactDecimal | null {
    const m = DECIMAL_RE.exec(text.trim());
    if (!m) return null;
    const [, sign, intPart, fracAfterInt, fracOnly, exp] = m;
    const whole = intPart ?? "";
    const frac = fracAfterInt ?? fracOnly ?? "";
    const exponent = Number(exp ?? "0") - frac.length;
    if (!Number.isSafeInteger(exponent)) return null;
    return new ExactDecimal(sign === "-", BigInt(`${whole}${frac}` || "0"), exponent);
  }

  /** Scientific-string form: plain notation unless the value is very large or very small. */
  toString(): string {
    const digits = this.coefficient.toString();
    const adjusted = this.exponent + digits.length - 1;
    const sign = this.negative ? "-" : "";

    if (this.exponent <= 0 && adjusted >= -6) {
      if (this.exponent === 0) return sign + digits;
      const point = digits.length + this.exponent;
      if (point > 0) return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
      return `${sign}0.${"0".repeat(-point)}${digits}`;
    }

    const mantissa = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
    return `${sign}${mantissa}E${adjusted >= 0 ? "+" : ""}${adjusted}`;
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toJSON(): string {
    return this.toString();
  }
}
