import { ValidationError } from './errors.js';

// ============================================================================
// Value checks
// ============================================================================

const HEX_PATTERN = /^[0-9A-Fa-f]+$/;
const LINE_BREAK = /[\r\n]/;

/**
 * Validate a fixed-length hex string
 * @returns The value in uppercase
 */
export function hexString(field: string, value: string, length: number): string {
  if (value.length !== length) {
    throw new ValidationError(field, `must be ${length} hex characters`, value);
  }
  if (!HEX_PATTERN.test(value)) {
    throw new ValidationError(field, 'must be valid hex', value);
  }
  return value.toUpperCase();
}

/**
 * Validate an integer against inclusive bounds
 * @param max - Upper bound, unbounded when omitted
 */
export function rangedInt(field: string, value: number, min: number, max?: number): number {
  if (!Number.isInteger(value)) {
    throw new ValidationError(field, 'must be an integer', value);
  }
  if (value < min || (max !== undefined && value > max)) {
    const range = max === undefined ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ValidationError(field, `must be ${range}`, value);
  }
  return value;
}

/**
 * Validate membership of a closed set. Never coerces.
 */
export function oneOf<T extends string | number>(
  field: string,
  value: unknown,
  allowed: readonly T[]
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(field, `must be one of ${allowed.join(', ')}`, value);
  }
  return match;
}

export interface TextRules {
  minLength?: number;
  /** Exact length */
  length?: number;
  prefix?: string;
}

/**
 * Validate a free-text value. Line breaks are never allowed.
 */
export function text(field: string, value: string, rules: TextRules = {}): string {
  if (LINE_BREAK.test(value)) {
    throw new ValidationError(field, 'must not contain line breaks', value);
  }
  if (rules.length !== undefined && value.length !== rules.length) {
    const unit = rules.length === 1 ? 'character' : 'characters';
    throw new ValidationError(field, `must be exactly ${rules.length} ${unit}`, value);
  }
  if (rules.minLength !== undefined && value.length < rules.minLength) {
    throw new ValidationError(field, 'must not be empty', value);
  }
  if (rules.prefix !== undefined && !value.startsWith(rules.prefix)) {
    throw new ValidationError(field, `must start with '${rules.prefix}'`, value);
  }
  return value;
}

/**
 * Reject a missing value
 */
export function required<T>(field: string, value: T | undefined): T {
  if (value === undefined) {
    throw new ValidationError(field, 'is required');
  }
  return value;
}

/**
 * Apply a check only when a value is present
 */
export function optional<T, R>(value: T | undefined, check: (value: T) => R): R | undefined {
  return value === undefined ? undefined : check(value);
}

/**
 * Throw a RangeError for an index outside a list of the given length
 */
export function checkIndex(index: number, length: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new RangeError(`Index ${index} out of range (0-${length - 1})`);
  }
}

// ============================================================================
// Line emission
// ============================================================================

/**
 * How a field is written: every time, or only when it differs from its default
 */
export type EmitPolicy = 'always' | 'omit-if-default';

export type EmitRule<T> =
  | { policy: 'always' }
  | { policy: 'omit-if-default'; default: T | undefined };

export const ALWAYS = { policy: 'always' } as const;

export function omitIfDefault<T>(defaultValue: T | undefined): EmitRule<T> {
  return { policy: 'omit-if-default', default: defaultValue };
}

/** Rule for optional fields with no default: written whenever set */
export const WHEN_SET = omitIfDefault<never>(undefined);

/**
 * Render a value the way config.txt expects it
 */
export function formatValue(value: string | number | boolean): string {
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }
  return String(value);
}

/**
 * Append `key=value` to lines according to the field's rule.
 * Absent values are never written.
 */
export function emit<T extends string | number | boolean>(
  lines: string[],
  key: string,
  value: T | undefined,
  rule: EmitRule<T>,
  format: (value: T) => string = formatValue
): void {
  if (value === undefined) {
    return;
  }
  if (rule.policy === 'omit-if-default' && value === rule.default) {
    return;
  }
  lines.push(`${key}=${format(value)}`);
}
