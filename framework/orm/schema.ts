/**
 * Schema Definition
 *
 * A schema is declared once per model type and shared, read-only, by every
 * instance of that type.
 *
 * ```ts
 * const UserSchema = defineSchema('User')
 *   .field('name', t.string())
 *   .field('age', t.integer()).default(18)
 *   .field('createdAt', t.datetime()).default(magicDefault(() => new Date()))
 *   .validates('name', validators.minLength(2))
 *   .build();
 * ```
 */

import { getConfig } from '../config/config.ts';
import { ConfigurationError } from './errors.ts';
import type { Model } from './model.ts';
import type { TypeExpr } from './types.ts';
import type { ValidatorHandler, ValidatorTarget } from './validators.ts';

const MAGIC_DEFAULT = Symbol('magicDefault');

/**
 * Deferred default, computed once per instance when the model is constructed
 */
export interface MagicDefault<T = unknown> {
  readonly [MAGIC_DEFAULT]: true;
  readonly factory: (model: Model) => T;
}

export type FieldDefault =
  | { kind: 'literal'; value: unknown }
  | { kind: 'magic'; factory: (model: Model) => unknown };

export interface ValidatorRegistration {
  target: ValidatorTarget;
  handler: ValidatorHandler;
}

export interface SchemaOptions {
  /** Attribute names starting with this are never part of the schema */
  reservedPrefix?: string;
}

/**
 * Mark a factory as a magic default. It receives the model being constructed.
 */
export function magicDefault<T>(factory: (model: Model) => T): MagicDefault<T> {
  return { [MAGIC_DEFAULT]: true, factory };
}

export function isMagicDefault(value: unknown): value is MagicDefault {
  return typeof value === 'object' && value !== null && MAGIC_DEFAULT in value;
}

/**
 * Immutable attribute declarations for a model type
 */
export class Schema {
  private readonly types: ReadonlyMap<string, TypeExpr>;
  private readonly fieldDefaults: ReadonlyMap<string, FieldDefault>;
  readonly validators: readonly ValidatorRegistration[];
  readonly ignored: ReadonlySet<string>;

  constructor(
    readonly name: string,
    readonly reservedPrefix: string,
    types: Map<string, TypeExpr>,
    defaults: Map<string, FieldDefault>,
    validators: ValidatorRegistration[],
    ignored: Set<string>
  ) {
    this.types = new Map(types);
    this.fieldDefaults = new Map(defaults);
    this.validators = Object.freeze([...validators]);
    this.ignored = new Set(ignored);
  }

  /**
   * Copy of every attribute name and its type expression, in declaration order
   */
  attributes(): Map<string, TypeExpr> {
    return new Map(this.types);
  }

  /**
   * Copy of the declared defaults
   */
  defaults(): Map<string, FieldDefault> {
    return new Map(this.fieldDefaults);
  }

  typeOf(key: string): TypeExpr | undefined {
    return this.types.get(key);
  }

  isReserved(key: string): boolean {
    return this.reservedPrefix !== '' && key.startsWith(this.reservedPrefix);
  }
}

/**
 * Fluent builder for a Schema
 */
export class SchemaBuilder {
  private readonly types = new Map<string, TypeExpr>();
  private readonly defaults = new Map<string, FieldDefault>();
  private readonly registrations: ValidatorRegistration[] = [];
  private readonly ignored = new Set<string>();
  private readonly reservedPrefix: string;
  private lastField: string | null = null;

  constructor(
    private readonly name: string,
    options: SchemaOptions = {}
  ) {
    this.reservedPrefix = options.reservedPrefix ?? getConfig().orm().reservedPrefix;
  }

  /**
   * Declare an attribute
   */
  field(name: string, type: TypeExpr): this {
    if (name === '') {
      throw new ConfigurationError(`Schema ${this.name} declares an attribute with an empty name`);
    }
    if (this.reservedPrefix !== '' && name.startsWith(this.reservedPrefix)) {
      throw new ConfigurationError(
        `Attribute ${name} of schema ${this.name} starts with the reserved prefix '${this.reservedPrefix}'`
      );
    }
    if (this.types.has(name)) {
      throw new ConfigurationError(`Attribute ${name} is declared twice in schema ${this.name}`);
    }

    this.types.set(name, type);
    this.lastField = name;
    return this;
  }

  /**
   * Set the default of the most recently declared attribute. Pass a
   * `magicDefault(...)` to compute it per instance.
   */
  default(value: unknown): this {
    if (this.lastField === null) {
      throw new ConfigurationError(`default() called before any field() in schema ${this.name}`);
    }

    this.defaults.set(
      this.lastField,
      isMagicDefault(value)
        ? { kind: 'magic', factory: value.factory }
        : { kind: 'literal', value }
    );
    return this;
  }

  /**
   * Register a validator on every instance of the model
   */
  validates(target: ValidatorTarget, handler: ValidatorHandler): this {
    this.registrations.push({ target, handler });
    return this;
  }

  /**
   * Exclude an attribute from schema enforcement and defaulting
   */
  ignore(name: string): this {
    this.ignored.add(name);
    return this;
  }

  build(): Schema {
    const types = new Map(this.types);
    const defaults = new Map(this.defaults);
    for (const name of this.ignored) {
      types.delete(name);
      defaults.delete(name);
    }
    return new Schema(
      this.name,
      this.reservedPrefix,
      types,
      defaults,
      this.registrations,
      this.ignored
    );
  }
}

/**
 * Start declaring a schema
 */
export function defineSchema(name = 'Model', options: SchemaOptions = {}): SchemaBuilder {
  return new SchemaBuilder(name, options);
}
