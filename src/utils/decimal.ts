import { ValidationError } from './errors';

/**
 * Exact fixed-point decimal: the value is `units / 10^scale`.
 * Money never goes through binary floating point.
 */
export interface FixedDecimal {
  readonly units: bigint;
  readonly scale: number;
}

export type DecimalInput = string | number;

const PLAIN_DECIMAL = /^([+-])?(\d+)(?:\.(\d+))?$/;

export const ZERO: FixedDecimal = { units: 0n, scale: 0 };

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

export function isDecimalInput(value: unknown): value is DecimalInput {
  return typeof value === 'string' || typeof value === 'number';
}

/**
 * Parses plain decimal notation ("12", "-0.5", "3.250"). Numbers are read
 * through their shortest string form, so 0.1 parses as exactly 0.1.
 * Exponent notation, NaN and Infinity are rejected.
 */
export function parseDecimal(value: DecimalInput, field = 'value'): FixedDecimal {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new ValidationError([`${field} must be a finite number`]);
  }

  const text = (typeof value === 'number' ? String(value) : value).trim();
  const match = PLAIN_DECIMAL.exec(text);
  if (!match) {
    throw new ValidationError([`${field} must be a decimal number`]);
  }

  const [, sign, integerPart, fractionPart = ''] = match;
  const magnitude = BigInt(`${integerPart}${fractionPart}`);
  return {
    units: sign === '-' ? -magnitude : magnitude,
    scale: fractionPart.length,
  };
}

export function tryParseDecimal(value: DecimalInput): FixedDecimal | null {
  try {
    return parseDecimal(value);
  } catch (error) {
    if (error instanceof ValidationError) {
      return null;
    }
    throw error;
  }
}

function rescale(value: FixedDecimal, scale: number): FixedDecimal {
  if (scale === value.scale) {
    return value;
  }
  return { units: value.units * pow10(scale - value.scale), scale };
}

export function addDecimals(a: FixedDecimal, b: FixedDecimal): FixedDecimal {
  const scale = Math.max(a.scale, b.scale);
  return { units: rescale(a, scale).units + rescale(b, scale).units, scale };
}

export function sumDecimals(values: Iterable<FixedDecimal>): FixedDecimal {
  let total = ZERO;
  for (const value of values) {
    total = addDecimals(total, value);
  }
  return total;
}

function negateDecimal(value: FixedDecimal): FixedDecimal {
  return { units: -value.units, scale: value.scale };
}

export function subtractDecimals(a: FixedDecimal, b: FixedDecimal): FixedDecimal {
  return addDecimals(a, negateDecimal(b));
}

export function multiplyDecimals(a: FixedDecimal, b: FixedDecimal): FixedDecimal {
  return { units: a.units * b.units, scale: a.scale + b.scale };
}

/** Divides by 10^places without losing digits (percent → fraction is `shift(x, 2)`). */
export function shiftDecimal(value: FixedDecimal, places: number): FixedDecimal {
  return { units: value.units, scale: value.scale + places };
}

export function compareDecimals(a: FixedDecimal, b: FixedDecimal): number {
  const scale = Math.max(a.scale, b.scale);
  const left = rescale(a, scale).units;
  const right = rescale(b, scale).units;
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export function isNegative(value: FixedDecimal): boolean {
  return value.units < 0n;
}

/** Round half to even ("banker's rounding") to a fixed number of places. */
export function roundHalfEven(value: FixedDecimal, places: number): FixedDecimal {
  if (value.scale <= places) {
    return rescale(value, places);
  }

  const divisor = pow10(value.scale - places);
  const negative = value.units < 0n;
  const magnitude = negative ? -value.units : value.units;
  let quotient = magnitude / divisor;
  const twiceRemainder = (magnitude % divisor) * 2n;

  if (twiceRemainder > divisor || (twiceRemainder === divisor && quotient % 2n === 1n)) {
    quotient += 1n;
  }

  return { units: negative ? -quotient : quotient, scale: places };
}

export function formatDecimal(value: FixedDecimal): string {
  const negative = value.units < 0n;
  const digits = (negative ? -value.units : value.units).toString().padStart(value.scale + 1, '0');
  const sign = negative ? '-' : '';
  if (value.scale === 0) {
    return `${sign}${digits}`;
  }
  const integerPart = digits.slice(0, digits.length - value.scale);
  const fractionPart = digits.slice(digits.length - value.scale);
  return `${sign}${integerPart}.${fractionPart}`;
}

/** Drops trailing fractional zeros: "21.000" → "21", "0.50" → "0.5". */
export function normalizeDecimal(value: FixedDecimal): FixedDecimal {
  let { units, scale } = value;
  while (scale > 0 && units % 10n === 0n) {
    units /= 10n;
    scale -= 1;
  }
  return { units, scale };
}

/**
 * Exact value with at least `minScale` fraction digits and no trailing zeros
 * beyond them: 605.0000 → "605.00", 0.0450 → "0.045".
 */
export function formatExact(value: FixedDecimal, minScale = 2): string {
  const normalized = normalizeDecimal(value);
  return formatDecimal(normalized.scale < minScale ? rescale(normalized, minScale) : normalized);
}

/** Rounded half-even to cents, for amounts that must be payable. */
export function formatMoney(value: FixedDecimal): string {
  return formatDecimal(roundHalfEven(value, 2));
}
