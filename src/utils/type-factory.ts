/**
 * Atomic type factory
 *
 * Every atomic type is created once per canonical string and shared from
 * then on. Instances are frozen, so sharing them across analyses is safe.
 */

import type {
  AtomicType,
  AtomicTypeKind,
  ClassRefType,
  GenericArrayType,
  LiteralValue,
  ScalarKind,
  ScalarType,
  SelfKind,
  SelfLikeType,
  TypeId,
} from '../types/atomic.js';
import { isClassName, isTypeKind } from '../types/atomic.js';
import { InvalidClassNameError, TypeEngineError } from '../errors.js';

// One process-wide table: a canonical string names exactly one instance
const table = new Map<TypeId, AtomicType>();

function intern<K extends AtomicTypeKind>(
  kind: K,
  id: TypeId,
  create: () => Extract<AtomicType, { kind: K }>
): Extract<AtomicType, { kind: K }> {
  const existing = table.get(id);
  if (existing !== undefined) {
    if (isTypeKind(existing, kind)) {
      return existing;
    }
    throw new TypeEngineError(`Type '${id}' is already a ${existing.kind} type, not a ${kind} type`);
  }
  const created = create();
  Object.freeze(created);
  table.set(id, created);
  return created;
}

function prefix(nullable: boolean): string {
  return nullable ? '?' : '';
}

/**
 * Number of distinct atomic types created so far
 */
export function internedTypeCount(): number {
  return table.size;
}

function scalar(kind: ScalarKind, nullable = false): ScalarType {
  // null and mixed already admit null: `?null` is `null`, `?mixed` is `mixed`
  const isNullable = nullable && kind !== 'null' && kind !== 'mixed';
  const id = `${prefix(isNullable)}${kind}`;
  return intern('scalar', id, () => ({ kind: 'scalar', id, nullable: isNullable, scalar: kind }));
}

/**
 * Reference to a class. The name must be a plain class name: keywords and
 * `?` or `[]` decorations are rejected.
 */
function classRef(name: string, nullable = false): ClassRefType {
  if (!isClassName(name)) {
    throw new InvalidClassNameError(name);
  }
  const id = `${prefix(nullable)}${name}`;
  return intern('class', id, () => ({ kind: 'class', id, nullable, name }));
}

function genericArrayOf(element: AtomicType, nullable = false): GenericArrayType {
  const inner = element.nullable ? nonNullable(element) : element;
  const id = `${prefix(nullable)}${inner.id}[]`;
  return intern('generic', id, () => ({ kind: 'generic', id, nullable, element: inner }));
}

function selfLike(kind: SelfKind, nullable = false): SelfLikeType {
  const id = `${prefix(nullable)}${kind === 'this' ? '$this' : kind}`;
  return intern('self', id, () => ({ kind: 'self', id, nullable, self: kind }));
}

function withNullability(type: AtomicType, nullable: boolean): AtomicType {
  if (type.nullable === nullable) {
    return type;
  }
  switch (type.kind) {
    case 'scalar':
      return scalar(type.scalar, nullable);
    case 'class':
      return classRef(type.name, nullable);
    case 'generic':
      return genericArrayOf(type.element, nullable);
    case 'self':
      return selfLike(type.self, nullable);
  }
}

function nonNullable(type: AtomicType): AtomicType {
  return withNullability(type, false);
}

/**
 * Map a runtime value to the type it has.
 * Integral numbers are `int`, including values written as `1.0`.
 */
function fromLiteralValue(value: LiteralValue): AtomicType {
  if (value === null || value === undefined) {
    return scalar('null');
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? scalar('int') : scalar('float');
  }
  if (typeof value === 'bigint') {
    return scalar('int');
  }
  if (typeof value === 'string') {
    return scalar('string');
  }
  if (typeof value === 'boolean') {
    return scalar('bool');
  }
  if (typeof value === 'function') {
    return scalar('callable');
  }
  if (Array.isArray(value)) {
    return scalar('array');
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) {
    return classRef('\\stdClass');
  }
  // The prototype chain may not lead to a constructor at all
  const ctor: unknown = Reflect.get(value, 'constructor');
  const ctorName: unknown = typeof ctor === 'function' ? Reflect.get(ctor, 'name') : undefined;
  if (typeof ctorName === 'string' && isClassName(`\\${ctorName}`)) {
    return classRef(`\\${ctorName}`);
  }
  return classRef('\\stdClass');
}

/**
 * Atomic type factory object
 */
export const Types = {
  // Scalar singletons
  int: scalar('int'),
  float: scalar('float'),
  string: scalar('string'),
  bool: scalar('bool'),
  array: scalar('array'),
  null: scalar('null'),
  mixed: scalar('mixed'),
  none: scalar('none'),
  callable: scalar('callable'),
  object: scalar('object'),
  resource: scalar('resource'),
  void: scalar('void'),

  // Context-relative singletons
  self: selfLike('self'),
  static: selfLike('static'),
  this: selfLike('this'),

  scalar,
  classRef,
  genericArrayOf,
  selfLike,

  /** `?T` */
  nullable(type: AtomicType): AtomicType {
    return withNullability(type, true);
  },

  /** `T` for `?T` */
  nonNullable,

  fromLiteralValue,
};
