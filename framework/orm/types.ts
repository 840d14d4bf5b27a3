/**
 * Type Expressions
 *
 * Declarative descriptors for the shape an attribute is expected to have.
 * Build them with the `t` helpers:
 *
 * ```ts
 * t.optional(t.list(t.integer()))
 * t.dict(t.string(), t.union(t.integer(), t.string()))
 * t.custom(EmailAddress)
 * ```
 *
 * @module
 */

export type PrimitiveType = 'bool' | 'string' | 'integer' | 'float' | 'datetime';

/**
 * Capability implemented by custom types that validate their own values.
 * The hook may take the value alone or the value and the key, and may be async.
 */
export interface Validatable<T = unknown> {
  validate(value: unknown, key: string): T | Promise<T>;
}

export interface AnyType {
  kind: 'any';
}

export interface PrimitiveTypeExpr {
  kind: 'primitive';
  name: PrimitiveType;
}

export interface UnionType {
  kind: 'union';
  types: readonly TypeExpr[];
  /** Whether null/undefined is an accepted member */
  nullable: boolean;
}

export interface ListType {
  kind: 'list';
  element: TypeExpr;
}

export interface SetType {
  kind: 'set';
  element: TypeExpr;
}

export interface DictType {
  kind: 'dict';
  /** Key type followed by value type */
  args: readonly TypeExpr[];
}

export interface CustomType {
  kind: 'custom';
  name: string;
  target: object;
}

export type TypeExpr =
  | AnyType
  | PrimitiveTypeExpr
  | UnionType
  | ListType
  | SetType
  | DictType
  | CustomType;

function primitive(name: PrimitiveType): PrimitiveTypeExpr {
  return { kind: 'primitive', name };
}

function nameOf(target: object): string {
  if (typeof target === 'function' && target.name) {
    return target.name;
  }
  return target.constructor?.name ?? 'anonymous';
}

/**
 * Type expression builders
 */
export const t = {
  any(): AnyType {
    return { kind: 'any' };
  },

  bool(): PrimitiveTypeExpr {
    return primitive('bool');
  },

  string(): PrimitiveTypeExpr {
    return primitive('string');
  },

  integer(): PrimitiveTypeExpr {
    return primitive('integer');
  },

  float(): PrimitiveTypeExpr {
    return primitive('float');
  },

  datetime(): PrimitiveTypeExpr {
    return primitive('datetime');
  },

  /**
   * Accepts null/undefined as well as `inner`. Optional unions are flattened.
   */
  optional(inner: TypeExpr): UnionType {
    if (inner.kind === 'union') {
      return { kind: 'union', types: inner.types, nullable: true };
    }
    return { kind: 'union', types: [inner], nullable: true };
  },

  /**
   * Members are tried in the order given; the first to validate wins.
   */
  union(...types: TypeExpr[]): UnionType {
    return { kind: 'union', types, nullable: false };
  },

  list(element: TypeExpr): ListType {
    return { kind: 'list', element };
  },

  set(element: TypeExpr): SetType {
    return { kind: 'set', element };
  },

  dict(key: TypeExpr, value: TypeExpr): DictType {
    return { kind: 'dict', args: [key, value] };
  },

  custom(target: Validatable, name?: string): CustomType {
    return { kind: 'custom', name: name ?? nameOf(target), target };
  },
};

/**
 * True when the expression accepts an absent value
 */
export function isOptional(type: TypeExpr): boolean {
  return type.kind === 'union' && type.nullable;
}

/**
 * Check whether a custom type target exposes a callable validate hook
 */
export function isValidatable(target: object): target is Validatable {
  return 'validate' in target && typeof target.validate === 'function';
}

/**
 * Render a type expression for error messages and logs
 */
export function describeType(type: TypeExpr): string {
  switch (type.kind) {
    case 'any':
      return 'any';
    case 'primitive':
      return type.name;
    case 'union': {
      const members = type.types.map(describeType);
      if (type.nullable) {
        return members.length === 1 ? `optional<${members[0]}>` : `optional<${members.join(' | ')}>`;
      }
      return members.join(' | ');
    }
    case 'list':
      return `list<${describeType(type.element)}>`;
    case 'set':
      return `set<${describeType(type.element)}>`;
    case 'dict':
      return `dict<${type.args.map(describeType).join(', ')}>`;
    case 'custom':
      return type.name;
  }
}
