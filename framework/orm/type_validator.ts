/**
 * Type Expression Validator
 *
 * Walks a type expression and coerces a single value against it. Containers
 * are coerced in place as they are walked, so a failure part way through
 * leaves the value partially coerced.
 */

import type { CoercerRegistry } from './coercers.ts';
import { createCoercerRegistry } from './coercers.ts';
import { ConfigurationError, ValidationError } from './errors.ts';
import { isValidatable } from './types.ts';
import type { CustomType, DictType, ListType, SetType, TypeExpr, UnionType } from './types.ts';

/**
 * Check for a plain `{}` style object usable as a string-keyed mapping
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Recursive coercing validator bound to a coercer registry
 */
export class TypeValidator {
  constructor(private readonly coercers: CoercerRegistry) {}

  /**
   * Validate `value` against `type`, returning the coerced value
   */
  async validateValue(type: TypeExpr, value: unknown, key: string): Promise<unknown> {
    switch (type.kind) {
      case 'any':
        return value;
      case 'primitive': {
        const coercer = this.coercers[type.name];
        if (!coercer) {
          throw new ConfigurationError(`No coercer is registered for ${type.name} (key ${key})`);
        }
        return coercer(key, value);
      }
      case 'custom':
        return await this.validateCustom(type, value, key);
      case 'union':
        return await this.validateUnion(type, value, key);
      case 'list':
        return await this.validateList(type, value, key);
      case 'set':
        return await this.validateSet(type, value, key);
      case 'dict':
        return await this.validateDict(type, value, key);
      default:
        throw new ConfigurationError(
          `Unsupported type expression used by key ${key}: ${JSON.stringify(type)}`
        );
    }
  }

  private async validateCustom(type: CustomType, value: unknown, key: string): Promise<unknown> {
    const target = type.target;
    if (!isValidatable(target)) {
      throw new ConfigurationError(
        `The type parameter for ${key} (${type.name}) does not have a validate hook ` +
          'and is not a recognised built-in type'
      );
    }
    return await target.validate(value, key);
  }

  private async validateUnion(type: UnionType, value: unknown, key: string): Promise<unknown> {
    if (type.nullable && isAbsent(value)) {
      return null;
    }

    let lastError: ValidationError | ConfigurationError | undefined;
    for (const member of type.types) {
      try {
        return await this.validateValue(member, value, key);
      } catch (error) {
        if (error instanceof ValidationError || error instanceof ConfigurationError) {
          lastError = error;
          continue;
        }
        throw error;
      }
    }

    if (lastError) {
      throw lastError;
    }
    throw new ConfigurationError(`Union for key ${key} was empty`);
  }

  private async validateList(type: ListType, value: unknown, key: string): Promise<unknown[]> {
    let list: unknown[];
    if (Array.isArray(value)) {
      list = value;
    } else if (value instanceof Set) {
      list = Array.from(value);
    } else {
      throw new ValidationError(`The key ${key} is not of a list type`, key);
    }

    for (let index = 0; index < list.length; index++) {
      list[index] = await this.validateValue(type.element, list[index], `${key}[${index}]`);
    }
    return list;
  }

  private async validateSet(type: SetType, value: unknown, key: string): Promise<Set<unknown>> {
    if (!Array.isArray(value) && !(value instanceof Set)) {
      throw new ValidationError(`The key ${key} is not of a set or list type`, key);
    }

    const result = new Set<unknown>();
    let index = 0;
    for (const element of value) {
      result.add(await this.validateValue(type.element, element, `${key}[${index}]`));
      index++;
    }
    return result;
  }

  private async validateDict(type: DictType, value: unknown, key: string): Promise<unknown> {
    if (type.args.length !== 2) {
      throw new ConfigurationError(
        `Unknown dict type count for ${key}: expected 2, got ${type.args.length}`
      );
    }
    const [keyType, valueType] = type.args;

    if (value instanceof Map) {
      for (const entryKey of Array.from(value.keys())) {
        const entryName = `${key}['${String(entryKey)}']`;
        const entryValue = await this.validateValue(valueType, value.get(entryKey), entryName);
        const newKey = await this.validateValue(keyType, entryKey, entryName);
        if (!Object.is(newKey, entryKey)) {
          value.delete(entryKey);
        }
        value.set(newKey, entryValue);
      }
      return value;
    }

    if (isPlainObject(value)) {
      for (const entryKey of Object.keys(value)) {
        const entryName = `${key}['${entryKey}']`;
        const entryValue = await this.validateValue(valueType, value[entryKey], entryName);
        const newKey = await this.validateValue(keyType, entryKey, entryName);
        if (typeof newKey !== 'string' && typeof newKey !== 'number') {
          throw new ValidationError(
            `The key ${entryName} was coerced to a ${typeof newKey}, which cannot be used as a property name`,
            entryName
          );
        }
        const propertyName = String(newKey);
        if (propertyName !== entryKey) {
          delete value[entryKey];
        }
        value[propertyName] = entryValue;
      }
      return value;
    }

    throw new ValidationError(`The key ${key} is not of a dict type`, key);
  }
}

let defaultValidator: TypeValidator | null = null;

/**
 * Get the shared validator built from the default coercer registry
 */
export function getTypeValidator(): TypeValidator {
  if (!defaultValidator) {
    defaultValidator = new TypeValidator(createCoercerRegistry());
  }
  return defaultValidator;
}

/**
 * Replace the shared validator, e.g. after loading configuration
 */
export function setTypeValidator(validator: TypeValidator): void {
  defaultValidator = validator;
}
