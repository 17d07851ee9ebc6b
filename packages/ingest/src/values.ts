const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/**
 * Exact decimal number: `unscaled × 10^-scale`.
 */
export class DecimalValue {
  constructor(
    readonly unscaled: bigint,
    readonly scale: number,
  ) {
    if (!Number.isInteger(scale) || scale < 0) {
      throw new RangeError(`Invalid decimal scale: ${scale}`);
    }
  }

  /**
   * Parses `-12.340`, `7`, `.5`. Returns undefined for anything else.
   */
  static parse(text: string): DecimalValue | undefined {
    const match = DECIMAL_PATTERN.exec(text.trim());
    if (!match) {
      return undefined;
    }
    const [, sign, whole = "", fraction = ""] = match;
    if (whole.length === 0 && fraction.length === 0) {
      return undefined;
    }
    const digits = BigInt(`${whole}${fraction}` || "0");
    return new DecimalValue(sign === "-" ? -digits : digits, fraction.length);
  }

  static fromNumber(value: number): DecimalValue | undefined {
    if (!Number.isFinite(value)) {
      return undefined;
    }
    // Exponent notation for very large/small magnitudes is not a plain decimal.
    const plain =
      Math.abs(value) >= 1e21 ? undefined : DecimalValue.parse(String(value));
    if (plain) {
      return plain;
    }
    return DecimalValue.parse(value.toFixed(20));
  }

  /**
   * Unscaled value at `targetScale`, rounding half away from zero when digits
   * are dropped.
   */
  rescale(targetScale: number): bigint {
    if (targetScale >= this.scale) {
      return this.unscaled * pow10(targetScale - this.scale);
    }
    const divisor = pow10(this.scale - targetScale);
    const quotient = this.unscaled / divisor;
    const remainder = this.unscaled % divisor;
    const doubled = (remainder < 0n ? -remainder : remainder) * 2n;
    if (doubled >= divisor) {
      return this.unscaled < 0n ? quotient - 1n : quotient + 1n;
    }
    return quotient;
  }

  toString(): string {
    const negative = this.unscaled < 0n;
    const digits = (negative ? -this.unscaled : this.unscaled)
      .toString()
      .padStart(this.scale + 1, "0");
    const whole = digits.slice(0, digits.length - this.scale);
    const fraction = digits.slice(digits.length - this.scale);
    const body = this.scale > 0 ? `${whole}.${fraction}` : whole;
    return negative ? `-${body}` : body;
  }
}

export interface TimeDeltaParts {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  milliseconds?: number;
  microseconds?: number;
}

const MICROS_PER_MILLI = 1_000n;
const MICROS_PER_SECOND = 1_000_000n;
const MICROS_PER_MINUTE = 60n * MICROS_PER_SECOND;
const MICROS_PER_HOUR = 60n * MICROS_PER_MINUTE;
const MICROS_PER_DAY = 24n * MICROS_PER_HOUR;

/**
 * Day-time duration with microsecond resolution.
 */
export class TimeDelta {
  constructor(readonly microseconds: bigint) {}

  static of(parts: TimeDeltaParts): TimeDelta {
    const whole = (n: number | undefined) => BigInt(Math.trunc(n ?? 0));
    return new TimeDelta(
      whole(parts.days) * MICROS_PER_DAY +
        whole(parts.hours) * MICROS_PER_HOUR +
        whole(parts.minutes) * MICROS_PER_MINUTE +
        whole(parts.seconds) * MICROS_PER_SECOND +
        whole(parts.milliseconds) * MICROS_PER_MILLI +
        whole(parts.microseconds),
    );
  }

  toString(): string {
    return `${this.microseconds}us`;
  }
}
