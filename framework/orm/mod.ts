/**
 * Domain/Data Layer (ORM)
 *
 * Model validation: schemas of typed attributes, coercion of raw values to
 * those types, and custom validator chains. Persistence belongs to the
 * database driver, which receives the mapping returned by `Model.validate()`.
 */

export { Model, type ModelOptions } from './model.ts';
export {
  Schema,
  SchemaBuilder,
  defineSchema,
  magicDefault,
  isMagicDefault,
  type FieldDefault,
  type MagicDefault,
  type SchemaOptions,
  type ValidatorRegistration,
} from './schema.ts';
export {
  t,
  isOptional,
  isValidatable,
  describeType,
  type TypeExpr,
  type PrimitiveType,
  type Validatable,
  type AnyType,
  type PrimitiveTypeExpr,
  type UnionType,
  type ListType,
  type SetType,
  type DictType,
  type CustomType,
} from './types.ts';
export {
  createCoercerRegistry,
  typeName,
  type Coercer,
  type CoercerRegistry,
  type CoercerOptions,
  type BoolCoercionSource,
} from './coercers.ts';
export { TypeValidator, getTypeValidator, setTypeValidator, isPlainObject } from './type_validator.ts';
export {
  ValidatorChain,
  validators,
  normalizeValidator,
  toAsync,
  targetKeys,
  type Validator,
  type ValidatorHandler,
  type UnaryValidatorHandler,
  type BinaryValidatorHandler,
  type ValidatorTarget,
} from './validators.ts';
export { ModelError, ValidationError, ConfigurationError, AttributeError } from './errors.ts';
