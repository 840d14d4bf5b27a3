/**
 * Model Errors
 *
 * Error types raised while building schemas and validating models.
 */

/**
 * Base class for every error raised by the ORM layer
 */
export class ModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when model data fails validation. Callers are expected to catch it
 * and report `keyName` back to whoever supplied the data.
 */
export class ValidationError extends ModelError {
  constructor(
    message: string,
    public readonly keyName: string
  ) {
    super(message);
  }
}

/**
 * Raised when the schema itself is malformed: an unsupported type expression,
 * a custom type without a validate hook, an empty union or a dict with the
 * wrong number of type arguments.
 */
export class ConfigurationError extends ModelError {}

/**
 * Raised when reading or removing an attribute that has neither a value nor a default
 */
export class AttributeError extends ModelError {
  constructor(public readonly keyName: string) {
    super(`The attribute '${keyName}' is not present on this model object.`);
  }
}
