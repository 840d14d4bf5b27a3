/**
 * Model Definition
 *
 * Base class for models whose attributes are declared by a Schema. A model
 * holds raw values until `validate()` coerces them against the schema and runs
 * the registered validators.
 *
 * ```ts
 * class User extends Model {
 *   constructor(values: Record<string, unknown> = {}) {
 *     super(UserSchema, values);
 *   }
 * }
 *
 * const user = new User({ name: 'Ada', age: '36' });
 * await user.validate(); // { name: 'Ada', age: 36, ... }
 * ```
 */

import type { Logger } from '../telemetry/logger.ts';
import { getLogger } from '../telemetry/logger.ts';
import { withSpan } from '../telemetry/otel.ts';
import { AttributeError, ValidationError } from './errors.ts';
import type { Schema } from './schema.ts';
import { getTypeValidator, isPlainObject, type TypeValidator } from './type_validator.ts';
import { isOptional, type TypeExpr } from './types.ts';
import { ValidatorChain, type ValidatorHandler, type ValidatorTarget } from './validators.ts';

export interface ModelOptions {
  /** Validator used for type expressions (default: the shared one) */
  typeValidator?: TypeValidator;
  logger?: Logger;
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return Object.is(a, b);
}

/**
 * Literal container and date defaults are copied per instance. Validation
 * coerces containers in place.
 */
function copyDefault(value: unknown): unknown {
  if (
    Array.isArray(value) ||
    isPlainObject(value) ||
    value instanceof Map ||
    value instanceof Set ||
    value instanceof Date
  ) {
    return structuredClone(value);
  }
  return value;
}

/**
 * Base Model class
 */
export class Model {
  readonly schema: Schema;

  private readonly attributeTypes: Map<string, TypeExpr>;
  private readonly defaultValues = new Map<string, unknown>();
  private readonly values = new Map<string, unknown>();
  private readonly plain = new Map<string, unknown>();
  private readonly ignored = new Set<string>();
  private readonly chain = new ValidatorChain();
  private readonly typeValidator: TypeValidator;
  private readonly logger: Logger;

  /**
   * Store the initial values without validating them. Keys starting with the
   * reserved prefix are dropped.
   */
  constructor(schema: Schema, values: Record<string, unknown> = {}, options: ModelOptions = {}) {
    this.schema = schema;
    this.typeValidator = options.typeValidator ?? getTypeValidator();
    this.logger = options.logger ?? getLogger().child({ component: 'orm', model: schema.name });

    for (const [key, value] of Object.entries(values)) {
      if (!schema.isReserved(key)) {
        this.values.set(key, value);
      }
    }

    for (const { target, handler } of schema.validators) {
      this.chain.add(target, handler);
    }

    this.attributeTypes = schema.attributes();
    for (const [key, fieldDefault] of schema.defaults()) {
      this.defaultValues.set(
        key,
        fieldDefault.kind === 'magic' ? fieldDefault.factory(this) : copyDefault(fieldDefault.value)
      );
    }

    for (const key of schema.ignored) {
      this.ignoreAttribute(key);
    }
  }

  /**
   * Copy of every enforced attribute and its type expression
   */
  attributes(): Map<string, TypeExpr> {
    return new Map(this.attributeTypes);
  }

  /**
   * Copy of the current (raw or validated) values
   */
  items(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }

  /**
   * Read an attribute: ignored value, then item, then default
   */
  get(key: string): unknown {
    if (this.plain.has(key)) {
      return this.plain.get(key);
    }
    if (this.values.has(key)) {
      return this.values.get(key);
    }
    if (this.defaultValues.has(key)) {
      return this.defaultValues.get(key);
    }
    throw new AttributeError(key);
  }

  set(key: string, value: unknown): void {
    if (this.schema.isReserved(key)) {
      throw new ValidationError(
        `Key ${key} cannot start with the reserved prefix '${this.schema.reservedPrefix}'`,
        key
      );
    }
    if (this.ignored.has(key)) {
      this.plain.set(key, value);
      return;
    }
    this.values.set(key, value);
  }

  has(key: string): boolean {
    return this.values.has(key) || this.plain.has(key);
  }

  remove(key: string): void {
    if (this.plain.delete(key) || this.values.delete(key)) {
      return;
    }
    throw new AttributeError(key);
  }

  /**
   * True when the key has no value and will fall back to its default
   */
  isDefault(key: string): boolean {
    return !this.values.has(key) && this.defaultValues.has(key);
  }

  isIgnored(key: string): boolean {
    return this.ignored.has(key);
  }

  /**
   * Stop enforcing and defaulting an attribute. An existing value is kept
   * but never validated again.
   */
  ignoreAttribute(key: string): void {
    this.defaultValues.delete(key);
    this.attributeTypes.delete(key);

    if (this.values.has(key)) {
      this.plain.set(key, this.values.get(key));
      this.values.delete(key);
    }

    this.ignored.add(key);
  }

  /**
   * Add a custom validator. `target` is a key, a list of keys, or null for
   * every key. The handler takes `(value)` or `(value, key)`, may be async,
   * and returns the value to keep.
   */
  addValidator(target: ValidatorTarget, handler: ValidatorHandler): void {
    this.chain.add(target, handler);
  }

  /**
   * Validate the values against the schema and return them, filling in
   * defaults. Throws a ValidationError on the first invalid attribute.
   */
  async validate(): Promise<Record<string, unknown>> {
    return await withSpan(
      'orm.model.validate',
      async (span) => {
        try {
          const result = await this.run();
          span.setAttribute('orm.validated_keys', Object.keys(result).length);
          this.logger.debug('Model validated', { keys: Object.keys(result).length });
          return result;
        } catch (error) {
          if (error instanceof ValidationError) {
            this.logger.warn('Model validation failed', {
              key: error.keyName,
              reason: error.message,
            });
          }
          throw error;
        }
      },
      { attributes: { 'orm.model': this.schema.name } }
    );
  }

  private async run(): Promise<Record<string, unknown>> {
    for (const key of this.values.keys()) {
      if (!this.attributeTypes.has(key)) {
        throw new ValidationError(
          `Key ${key} has been added to the model contents, but is not in the schema`,
          key
        );
      }
    }

    const all = new Map(this.values);
    for (const [key, type] of this.attributeTypes) {
      if (!all.has(key)) {
        if (this.defaultValues.has(key)) {
          all.set(key, this.defaultValues.get(key));
        } else if (isOptional(type)) {
          all.set(key, null);
          continue;
        } else {
          throw new ValidationError(
            `Key ${key} is not optional and was not found in the models contents`,
            key
          );
        }
      }

      const value = await this.typeValidator.validateValue(type, all.get(key), key);
      all.set(key, value);
      this.values.set(key, value);
    }

    if (!this.chain.isEmpty) {
      for (const [key, value] of all) {
        const result = await this.chain.run(key, value);
        all.set(key, result);
        this.values.set(key, result);
      }
    }

    return Object.fromEntries(all);
  }

  /**
   * Same schema and equal values
   */
  equals(other: Model): boolean {
    if (this.schema !== other.schema || this.values.size !== other.values.size) {
      return false;
    }
    for (const [key, value] of this.values) {
      if (!other.values.has(key) || !valuesEqual(value, other.values.get(key))) {
        return false;
      }
    }
    return true;
  }

  /**
   * Convert to plain object
   */
  toJSON(): Record<string, unknown> {
    return this.items();
  }
}
