/**
 * Type Validator Tests
 *
 * Tests for the recursive type expression validator.
 */

import { expect, test } from 'vitest';
import { createCoercerRegistry } from '../../framework/orm/coercers.ts';
import { ConfigurationError, ValidationError } from '../../framework/orm/errors.ts';
import { TypeValidator, isPlainObject } from '../../framework/orm/type_validator.ts';
import { t, type TypeExpr } from '../../framework/orm/types.ts';

const validator = new TypeValidator(createCoercerRegistry());

const Upper = {
  validate(value: unknown): string {
    if (typeof value !== 'string') {
      throw new ValidationError('expected a string', 'upper');
    }
    return value.toUpperCase();
  },
};

// any / primitives

test('any - returns the value unchanged', async () => {
  const value = { nested: [1, 2] };
  expect(await validator.validateValue(t.any(), value, 'x')).toBe(value);
});

test('primitive - dispatches to the coercer', async () => {
  expect(await validator.validateValue(t.integer(), '12', 'count')).toBe(12);
});

// optional / union

test('optional - null and undefined return null', async () => {
  expect(await validator.validateValue(t.optional(t.integer()), null, 'n')).toBe(null);
  expect(await validator.validateValue(t.optional(t.integer()), undefined, 'n')).toBe(null);
});

test('optional - present values are validated against the inner type', async () => {
  expect(await validator.validateValue(t.optional(t.integer()), '5', 'n')).toBe(5);
});

test('optional - flattens an inner union', () => {
  expect(t.optional(t.union(t.integer(), t.string()))).toEqual({
    kind: 'union',
    types: [t.integer(), t.string()],
    nullable: true,
  });
});

test('union - the first member in declared order wins', async () => {
  expect(await validator.validateValue(t.union(t.integer(), t.string()), '7', 'n')).toBe(7);
  expect(await validator.validateValue(t.union(t.string(), t.integer()), '7', 'n')).toBe('7');
});

test('union - falls through to later members', async () => {
  expect(await validator.validateValue(t.union(t.integer(), t.string()), 'abc', 'n')).toBe('abc');
});

test('union - rethrows the error from the last member', async () => {
  await expect(
    validator.validateValue(t.union(t.integer(), t.bool()), 'abc', 'n')
  ).rejects.toThrow('The value of key n is of type string, expected bool compatible');
});

test('union - stops trying members after the first success', async () => {
  const calls: string[] = [];
  const Failing = {
    validate(): never {
      calls.push('failing');
      throw new ValidationError('no', 'k');
    },
  };
  const Passing = {
    validate(): string {
      calls.push('passing');
      return 'ok';
    },
  };
  const Never = {
    validate(): string {
      calls.push('never');
      return 'unreachable';
    },
  };

  const type = t.union(t.custom(Failing), t.custom(Passing), t.custom(Never));
  expect(await validator.validateValue(type, 'v', 'k')).toBe('ok');
  expect(calls).toEqual(['failing', 'passing']);
});

test('union - propagates errors that are not validation errors', async () => {
  const Broken = {
    validate(): never {
      throw new Error('boom');
    },
  };
  await expect(
    validator.validateValue(t.union(t.custom(Broken), t.string()), 'v', 'k')
  ).rejects.toThrow('boom');
});

test('union - an empty union is a configuration error', async () => {
  await expect(validator.validateValue(t.union(), 'v', 'k')).rejects.toThrow(
    new ConfigurationError('Union for key k was empty')
  );
});

test('union - an optional union without members rejects present values', async () => {
  const type: TypeExpr = { kind: 'union', types: [], nullable: true };
  expect(await validator.validateValue(type, null, 'k')).toBe(null);
  await expect(validator.validateValue(type, 1, 'k')).rejects.toBeInstanceOf(ConfigurationError);
});

// list

test('list - coerces every element in place', async () => {
  const input = ['1', '2'];
  const result = await validator.validateValue(t.list(t.integer()), input, 'ids');
  expect(result).toBe(input);
  expect(result).toEqual([1, 2]);
});

test('list - accepts a set and converts it to an array', async () => {
  const result = await validator.validateValue(t.list(t.integer()), new Set(['3', '4']), 'ids');
  expect(result).toEqual([3, 4]);
});

test('list - rejects other values', async () => {
  await expect(validator.validateValue(t.list(t.integer()), 'abc', 'ids')).rejects.toThrow(
    'The key ids is not of a list type'
  );
});

test('list - element errors name the index', async () => {
  await expect(
    validator.validateValue(t.list(t.integer()), ['1', 'x'], 'ids')
  ).rejects.toMatchObject({ keyName: 'ids[1]' });
});

test('list - leaves earlier elements coerced when a later one fails', async () => {
  const input = ['1', 'x'];
  await expect(validator.validateValue(t.list(t.integer()), input, 'ids')).rejects.toThrow(
    ValidationError
  );
  expect(input).toEqual([1, 'x']);
});

// set

test('set - collects coerced elements into a new set', async () => {
  const result = await validator.validateValue(t.set(t.integer()), ['1', '01', '2'], 'tags');
  expect(result).toEqual(new Set([1, 2]));
});

test('set - accepts a set', async () => {
  const result = await validator.validateValue(t.set(t.string()), new Set([1, true]), 'tags');
  expect(result).toEqual(new Set(['1', 'true']));
});

test('set - rejects other values', async () => {
  await expect(validator.validateValue(t.set(t.integer()), { a: 1 }, 'tags')).rejects.toThrow(
    'The key tags is not of a set or list type'
  );
});

// dict

test('dict - validates plain object values', async () => {
  const result = await validator.validateValue(t.dict(t.string(), t.integer()), { a: '1' }, 'm');
  expect(result).toEqual({ a: 1 });
});

test('dict - keeps property names that coerce to the same text', async () => {
  const result = await validator.validateValue(
    t.dict(t.integer(), t.string()),
    { '1': 5, '2': true },
    'm'
  );
  expect(result).toEqual({ '1': '5', '2': 'true' });
});

test('dict - re-keys entries whose key coerces to a different value', async () => {
  const input: Record<string, unknown> = { a: 1, b: 2 };
  const result = await validator.validateValue(t.dict(t.custom(Upper), t.any()), input, 'm');
  expect(result).toBe(input);
  expect(Object.keys(input)).toEqual(['A', 'B']);
  expect(input).toEqual({ A: 1, B: 2 });
});

test('dict - re-keys Map entries', async () => {
  const input = new Map<unknown, unknown>([
    ['1', 'x'],
    ['2', 'y'],
  ]);
  await validator.validateValue(t.dict(t.integer(), t.string()), input, 'm');
  expect(Array.from(input.entries())).toEqual([
    [1, 'x'],
    [2, 'y'],
  ]);
});

test('dict - entry errors name the entry', async () => {
  await expect(
    validator.validateValue(t.dict(t.string(), t.integer()), { a: 'x' }, 'm')
  ).rejects.toMatchObject({ keyName: "m['a']" });
});

test('dict - rejects keys that cannot be property names', async () => {
  const ToObject = { validate: () => ({}) };
  await expect(
    validator.validateValue(t.dict(t.custom(ToObject), t.any()), { a: 1 }, 'm')
  ).rejects.toMatchObject({ keyName: "m['a']" });
});

test('dict - rejects non-mappings', async () => {
  await expect(validator.validateValue(t.dict(t.string(), t.any()), [1], 'm')).rejects.toThrow(
    'The key m is not of a dict type'
  );
});

test('dict - wrong type argument count is a configuration error', async () => {
  const type: TypeExpr = { kind: 'dict', args: [t.string()] };
  await expect(validator.validateValue(type, {}, 'm')).rejects.toThrow(
    new ConfigurationError('Unknown dict type count for m: expected 2, got 1')
  );
});

// custom

test('custom - calls a one parameter hook', async () => {
  expect(await validator.validateValue(t.custom(Upper), 'abc', 'code')).toBe('ABC');
});

test('custom - passes the key to a two parameter async hook', async () => {
  const Tagged = {
    async validate(value: unknown, key: string): Promise<string> {
      return `${key}=${String(value)}`;
    },
  };
  expect(await validator.validateValue(t.custom(Tagged), 5, 'size')).toBe('size=5');
});

test('custom - classes with a static hook work as types', async () => {
  class Email {
    constructor(readonly address: string) {}

    static validate(value: unknown, key: string): Email {
      if (typeof value !== 'string' || !value.includes('@')) {
        throw new ValidationError(`${key} must be an email address`, key);
      }
      return new Email(value);
    }
  }

  const type = t.custom(Email);
  expect(type.name).toBe('Email');
  expect(await validator.validateValue(type, 'ada@example.com', 'email')).toEqual(
    new Email('ada@example.com')
  );
  await expect(validator.validateValue(type, 'nope', 'email')).rejects.toThrow(
    'email must be an email address'
  );
});

test('custom - a type without a hook is a configuration error', async () => {
  const type: TypeExpr = { kind: 'custom', name: 'Broken', target: {} };
  await expect(validator.validateValue(type, 1, 'x')).rejects.toThrow(
    new ConfigurationError(
      'The type parameter for x (Broken) does not have a validate hook and is not a recognised built-in type'
    )
  );
});

// unsupported shapes

test('unsupported expression shapes are a configuration error', async () => {
  const type: TypeExpr = JSON.parse('{"kind":"tuple"}');
  await expect(validator.validateValue(type, 1, 'x')).rejects.toThrow(
    new ConfigurationError('Unsupported type expression used by key x: {"kind":"tuple"}')
  );
});

// nesting

test('nested expressions are validated recursively', async () => {
  const type = t.list(t.dict(t.string(), t.optional(t.integer())));
  const result = await validator.validateValue(type, [{ a: '1', b: null }], 'rows');
  expect(result).toEqual([{ a: 1, b: null }]);
});

test('isPlainObject - only accepts plain objects', () => {
  expect(isPlainObject({})).toBe(true);
  expect(isPlainObject(Object.create(null))).toBe(true);
  expect(isPlainObject(new Map())).toBe(false);
  expect(isPlainObject([])).toBe(false);
  expect(isPlainObject(null)).toBe(false);
});
