/**
 * Schema Tests
 *
 * Tests for the schema builder and type expression helpers.
 */

import { expect, test } from 'vitest';
import { ConfigurationError } from '../../framework/orm/errors.ts';
import { defineSchema, isMagicDefault, magicDefault } from '../../framework/orm/schema.ts';
import { describeType, isOptional, isValidatable, t } from '../../framework/orm/types.ts';

test('defineSchema - keeps attributes in declaration order', () => {
  const schema = defineSchema('User')
    .field('name', t.string())
    .field('age', t.integer())
    .field('tags', t.set(t.string()))
    .build();

  expect(Array.from(schema.attributes().keys())).toEqual(['name', 'age', 'tags']);
  expect(schema.typeOf('age')).toEqual(t.integer());
  expect(schema.typeOf('missing')).toBe(undefined);
});

test('defineSchema - default applies to the last declared field', () => {
  const schema = defineSchema('User')
    .field('name', t.string())
    .field('role', t.string())
    .default('member')
    .build();

  expect(schema.defaults()).toEqual(new Map([['role', { kind: 'literal', value: 'member' }]]));
});

test('defineSchema - magic defaults are stored as factories', () => {
  const factory = () => 'generated';
  const schema = defineSchema('User').field('id', t.string()).default(magicDefault(factory)).build();

  expect(schema.defaults().get('id')).toEqual({ kind: 'magic', factory });
});

test('defineSchema - default before any field is a configuration error', () => {
  expect(() => defineSchema('User').default(1)).toThrow(
    new ConfigurationError('default() called before any field() in schema User')
  );
});

test('defineSchema - rejects empty names', () => {
  expect(() => defineSchema('User').field('', t.string())).toThrow(ConfigurationError);
});

test('defineSchema - rejects names with the reserved prefix', () => {
  expect(() => defineSchema('User').field('_internal', t.string())).toThrow(
    "Attribute _internal of schema User starts with the reserved prefix '_'"
  );
});

test('defineSchema - rejects duplicate names', () => {
  expect(() => defineSchema('User').field('a', t.string()).field('a', t.integer())).toThrow(
    'Attribute a is declared twice in schema User'
  );
});

test('defineSchema - accepts a custom reserved prefix', () => {
  const schema = defineSchema('User', { reservedPrefix: '$' }).field('_id', t.string()).build();

  expect(schema.reservedPrefix).toBe('$');
  expect(schema.isReserved('$meta')).toBe(true);
  expect(schema.isReserved('_id')).toBe(false);
});

test('defineSchema - ignored names are removed from attributes and defaults', () => {
  const schema = defineSchema('Record')
    .field('name', t.string())
    .field('table_name', t.string())
    .default('records')
    .ignore('table_name')
    .build();

  expect(schema.attributes().has('table_name')).toBe(false);
  expect(schema.defaults().has('table_name')).toBe(false);
  expect(schema.ignored.has('table_name')).toBe(true);
});

test('defineSchema - built schemas are not affected by later builder calls', () => {
  const builder = defineSchema('User').field('name', t.string());
  const schema = builder.build();
  builder.field('age', t.integer());

  expect(schema.attributes().has('age')).toBe(false);
});

test('Schema.attributes - returns a copy', () => {
  const schema = defineSchema('User').field('name', t.string()).build();
  schema.attributes().delete('name');
  expect(schema.attributes().has('name')).toBe(true);
});

test('Schema.validators - records registrations in order', () => {
  const first = (value: unknown) => value;
  const second = (value: unknown, key: string) => key;
  const schema = defineSchema('User')
    .field('name', t.string())
    .validates(null, first)
    .validates(['name'], second)
    .build();

  expect(schema.validators).toEqual([
    { target: null, handler: first },
    { target: ['name'], handler: second },
  ]);
});

test('isMagicDefault - recognises marked factories only', () => {
  expect(isMagicDefault(magicDefault(() => 1))).toBe(true);
  expect(isMagicDefault(() => 1)).toBe(false);
  expect(isMagicDefault({ factory: () => 1 })).toBe(false);
  expect(isMagicDefault(null)).toBe(false);
});

test('isOptional - true for nullable unions', () => {
  expect(isOptional(t.optional(t.string()))).toBe(true);
  expect(isOptional(t.union(t.string(), t.integer()))).toBe(false);
  expect(isOptional(t.string())).toBe(false);
});

test('isValidatable - requires a callable validate', () => {
  expect(isValidatable({ validate: () => 1 })).toBe(true);
  expect(isValidatable({ validate: 1 })).toBe(false);
  expect(isValidatable({})).toBe(false);
});

test('describeType - renders nested expressions', () => {
  const Money = { validate: (value: unknown) => value };
  expect(describeType(t.optional(t.list(t.integer())))).toBe('optional<list<integer>>');
  expect(describeType(t.dict(t.string(), t.union(t.float(), t.bool())))).toBe(
    'dict<string, float | bool>'
  );
  expect(describeType(t.set(t.custom(Money, 'Money')))).toBe('set<Money>');
  expect(describeType(t.any())).toBe('any');
});
