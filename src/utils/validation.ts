import type { FixedDecimal } from './decimal';
import { isDecimalInput, isNegative, tryParseDecimal } from './decimal';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export function validateEmail(email: string): boolean {
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  return emailRegex.test(email);
}

/** Strict YYYY-MM-DD that names a real calendar day. */
export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

export function todayIsoDate(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

/** Ids are PostgreSQL `integer` (int4) columns. */
export const MAX_ID = 2147483647;

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= MAX_ID;
}

/** Integer ids arrive as numbers from JSON bodies and as strings from paths and queries. */
export function parseIdentifier(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return NaN;
}

/** Trimmed text, or null for anything empty or not a string. */
export function optionalText(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function requiredText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function checkLength(errors: string[], field: string, value: string | null, max: number): void {
  if (value !== null && value.length > max) {
    errors.push(`${field} must be at most ${max} characters`);
  }
}

/** Checks a non-negative decimal field; returns the parsed value when it passes. */
export function checkAmount(errors: string[], field: string, value: unknown, required: boolean): FixedDecimal | null {
  if (value === undefined) {
    if (required) {
      errors.push(`${field} is required`);
    }
    return null;
  }
  const parsed = isDecimalInput(value) ? tryParseDecimal(value) : null;
  if (parsed === null) {
    errors.push(`${field} must be a decimal number`);
    return null;
  }
  if (isNegative(parsed)) {
    errors.push(`${field} cannot be negative`);
    return null;
  }
  return parsed;
}
