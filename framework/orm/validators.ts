/**
 * Field Validators
 *
 * Custom validators run after type coercion. A validator receives the coerced
 * value (and optionally the key) and returns the value to keep, possibly
 * transformed. It may be async, and it rejects a value by throwing a
 * ValidationError.
 */

import { ValidationError } from './errors.ts';

export type UnaryValidatorHandler = (value: unknown) => unknown;
export type BinaryValidatorHandler = (value: unknown, key: string) => unknown;
export type ValidatorHandler = UnaryValidatorHandler | BinaryValidatorHandler;

/** Uniform shape every registered handler is normalized to */
export type Validator = (value: unknown, key: string) => Promise<unknown>;

/** A single key, several keys, or null/undefined for every key */
export type ValidatorTarget = string | readonly string[] | null | undefined;

/**
 * Wrap a sync or async function so that it always returns a promise
 */
export function toAsync<A extends unknown[], R>(
  fn: (...args: A) => R | Promise<R>
): (...args: A) => Promise<R> {
  return async (...args: A) => await fn(...args);
}

function isUnary(handler: ValidatorHandler): handler is UnaryValidatorHandler {
  return handler.length <= 1;
}

/**
 * Normalize a one or two parameter, sync or async handler to `Validator`.
 * One parameter handlers are never passed the key.
 */
export function normalizeValidator(handler: ValidatorHandler): Validator {
  if (isUnary(handler)) {
    const unary = handler;
    return toAsync((value: unknown, _key: string) => unary(value));
  }
  const binary = handler;
  return toAsync((value: unknown, key: string) => binary(value, key));
}

/**
 * Expand a validator target to the keys it covers; null stands for every key
 */
export function targetKeys(target: ValidatorTarget): (string | null)[] {
  if (target === null || target === undefined) return [null];
  if (typeof target === 'string') return [target];
  return [...target];
}

/**
 * Ordered per-key validator chains plus a wildcard chain that runs first
 */
export class ValidatorChain {
  private wildcard: Validator[] = [];
  private byKey = new Map<string, Validator[]>();

  /**
   * Append a handler to every targeted chain
   */
  add(target: ValidatorTarget, handler: ValidatorHandler): void {
    const validator = normalizeValidator(handler);
    for (const key of targetKeys(target)) {
      if (key === null) {
        this.wildcard.push(validator);
        continue;
      }
      const chain = this.byKey.get(key);
      if (chain) {
        chain.push(validator);
      } else {
        this.byKey.set(key, [validator]);
      }
    }
  }

  /**
   * Whether any handler is registered
   */
  get isEmpty(): boolean {
    return this.wildcard.length === 0 && this.byKey.size === 0;
  }

  /**
   * Number of handlers that will run for a key
   */
  count(key: string): number {
    return this.wildcard.length + (this.byKey.get(key)?.length ?? 0);
  }

  /**
   * Run the wildcard chain then the key chain, threading the value through
   */
  async run(key: string, value: unknown): Promise<unknown> {
    let current = value;
    for (const validator of this.wildcard) {
      current = await validator(current, key);
    }
    for (const validator of this.byKey.get(key) ?? []) {
      current = await validator(current, key);
    }
    return current;
  }
}

function reject(message: string, key: string): never {
  throw new ValidationError(message, key);
}

/**
 * Built-in validators. Each passes the value through unchanged or throws.
 */
export const validators = {
  /**
   * Validate minimum length
   */
  minLength(min: number): BinaryValidatorHandler {
    return (value, key) => {
      if (typeof value === 'string' && value.length < min) {
        reject(`${key} must be at least ${min} characters`, key);
      }
      if (Array.isArray(value) && value.length < min) {
        reject(`${key} must have at least ${min} items`, key);
      }
      return value;
    };
  },

  /**
   * Validate maximum length
   */
  maxLength(max: number): BinaryValidatorHandler {
    return (value, key) => {
      if (typeof value === 'string' && value.length > max) {
        reject(`${key} must be at most ${max} characters`, key);
      }
      if (Array.isArray(value) && value.length > max) {
        reject(`${key} must have at most ${max} items`, key);
      }
      return value;
    };
  },

  min(min: number): BinaryValidatorHandler {
    return (value, key) => {
      if (typeof value === 'number' && value < min) {
        reject(`${key} must be at least ${min}`, key);
      }
      return value;
    };
  },

  max(max: number): BinaryValidatorHandler {
    return (value, key) => {
      if (typeof value === 'number' && value > max) {
        reject(`${key} must be at most ${max}`, key);
      }
      return value;
    };
  },

  email(): BinaryValidatorHandler {
    const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
    return (value, key) => {
      if (typeof value === 'string' && !emailRegex.test(value)) {
        reject(`${key} must be a valid email address`, key);
      }
      return value;
    };
  },

  url(): BinaryValidatorHandler {
    return (value, key) => {
      if (typeof value === 'string' && !URL.canParse(value)) {
        reject(`${key} must be a valid URL`, key);
      }
      return value;
    };
  },

  uuid(): BinaryValidatorHandler {
    const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
    return (value, key) => {
      if (typeof value === 'string' && !uuidRegex.test(value)) {
        reject(`${key} must be a valid UUID`, key);
      }
      return value;
    };
  },

  /**
   * Validate against regex pattern
   */
  pattern(regex: RegExp, message?: string): BinaryValidatorHandler {
    return (value, key) => {
      if (typeof value === 'string' && !regex.test(value)) {
        reject(message ?? `${key} format is invalid`, key);
      }
      return value;
    };
  },

  /**
   * Validate value is one of allowed values
   */
  oneOf<T>(allowed: readonly T[]): BinaryValidatorHandler {
    return (value, key) => {
      if (!allowed.some((candidate) => Object.is(candidate, value))) {
        reject(`${key} must be one of: ${allowed.join(', ')}`, key);
      }
      return value;
    };
  },

  /**
   * Custom predicate; `{field}` in the message is replaced with the key
   */
  custom(fn: (value: unknown) => boolean | Promise<boolean>, message: string): BinaryValidatorHandler {
    return async (value, key) => {
      if (!(await fn(value))) {
        reject(message.replace('{field}', key), key);
      }
      return value;
    };
  },
};
