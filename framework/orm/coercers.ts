/**
 * Built-in Coercers
 *
 * Converters for the primitive attribute types. Coercion is lenient about
 * values that are very likely correct ("true" for a bool, "1" for an integer)
 * but never guesses when a guess could corrupt data.
 */

import { ValidationError } from './errors.ts';
import type { PrimitiveType } from './types.ts';

export type Coercer = (key: string, value: unknown) => unknown;

export type CoercerRegistry = Readonly<Record<PrimitiveType, Coercer>>;

/**
 * Where the bool coercer looks up its vocabulary: the input value, or the
 * lower-cased attribute key as older releases did.
 */
export type BoolCoercionSource = 'value' | 'key';

export interface CoercerOptions {
  boolCoercion?: BoolCoercionSource;
}

const TRUTHY = new Set(['yes', 'true', 'y', 't']);
const FALSY = new Set(['no', 'false', 'n', 'f']);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const FLOAT_WORDS: Record<string, number> = {
  inf: Infinity,
  '+inf': Infinity,
  '-inf': -Infinity,
  infinity: Infinity,
  '+infinity': Infinity,
  '-infinity': -Infinity,
  nan: NaN,
  '+nan': NaN,
  '-nan': NaN,
};
const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})([T ]\d{2}:\d{2}(:\d{2}(\.\d{1,6})?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Describe the runtime type of a value for error messages
 */
export function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

function incompatible(key: string, value: unknown, expected: string): ValidationError {
  return new ValidationError(
    `The value of key ${key} is of type ${typeName(value)}, expected ${expected} compatible`,
    key
  );
}

function coerceBool(source: BoolCoercionSource): Coercer {
  return (key, value) => {
    if (typeof value === 'boolean') {
      return value;
    }

    if (typeof value === 'string') {
      const word = (source === 'key' ? key : value).toLowerCase();
      if (TRUTHY.has(word)) return true;
      if (FALSY.has(word)) return false;
    }

    throw incompatible(key, value, 'bool');
  };
}

function coerceString(key: string, value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }

  throw incompatible(key, value, 'string');
}

function coerceInteger(key: string, value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }

  if (typeof value === 'bigint') {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (INTEGER_PATTERN.test(trimmed)) {
      const n = Number(trimmed);
      if (Number.isSafeInteger(n)) return n;
    }
  }

  throw incompatible(key, value, 'integer');
}

function coerceFloat(key: string, value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim().toLowerCase();
    if (FLOAT_PATTERN.test(trimmed)) {
      return Number(trimmed);
    }
    if (trimmed in FLOAT_WORDS) {
      return FLOAT_WORDS[trimmed];
    }
  }

  throw incompatible(key, value, 'float');
}

function fromEpochSeconds(seconds: number): Date | null {
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * `Date` rolls impossible days over into the next month; reject them instead
 */
function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function coerceDatetime(key: string, value: unknown): Date {
  if (value instanceof Date) {
    if (!Number.isNaN(value.getTime())) return value;
  } else if (typeof value === 'number') {
    const date = fromEpochSeconds(value);
    if (date) return date;
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    if (INTEGER_PATTERN.test(trimmed)) {
      const date = fromEpochSeconds(Number(trimmed));
      if (date) return date;
    } else {
      const match = ISO_DATE_PATTERN.exec(trimmed);
      if (match && isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
        const date = new Date(trimmed);
        if (!Number.isNaN(date.getTime())) return date;
      }
    }
  }

  throw incompatible(key, value, 'datetime');
}

/**
 * Build the coercer table. The result is frozen; build it once at startup and
 * hand it to the type validator.
 */
export function createCoercerRegistry(options: CoercerOptions = {}): CoercerRegistry {
  return Object.freeze({
    bool: coerceBool(options.boolCoercion ?? 'value'),
    string: coerceString,
    integer: coerceInteger,
    float: coerceFloat,
    datetime: coerceDatetime,
  });
}
