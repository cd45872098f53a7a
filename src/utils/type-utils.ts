/**
 * Atomic type utilities for type checking and manipulation
 */

import type { AtomicType, GenericArrayType, ScalarKind, SelfKind } from '../types/atomic.js';
import { isTypeKind } from '../types/atomic.js';
import type { ClassHierarchy } from '../types/hierarchy.js';
import { EMPTY_CLASS_HIERARCHY } from '../types/hierarchy.js';
import { Types } from './type-factory.js';

export { isTypeKind };

/**
 * Check if a type is a native (non-class) type
 */
export function isScalar(type: AtomicType): boolean {
  return type.kind === 'scalar';
}

/**
 * Check if a type is a native type of the given kind, ignoring nullability
 */
export function isScalarKind(type: AtomicType, scalar: ScalarKind): boolean {
  return type.kind === 'scalar' && type.scalar === scalar;
}

/**
 * Check if a type is `T[]`
 */
export function isGeneric(type: AtomicType): type is GenericArrayType {
  return isTypeKind(type, 'generic');
}

/**
 * Check if a type refers to the enclosing class (`self`, `static`, `$this`)
 */
export function isSelfLike(type: AtomicType): boolean {
  return type.kind === 'self';
}

/**
 * Check if a type admits null
 */
export function isNullable(type: AtomicType): boolean {
  return type.nullable || isScalarKind(type, 'null') || isScalarKind(type, 'mixed');
}

/**
 * `T[]` for `T`; `?T` becomes `?T[]`, a nullable array of `T`
 */
export function asGenericType(type: AtomicType): GenericArrayType {
  return Types.genericArrayOf(type, type.nullable);
}

/**
 * `T` for `T[]`, null for anything else
 */
export function genericElementType(type: AtomicType): AtomicType | null {
  return isGeneric(type) ? type.element : null;
}

// `$this` is narrower than `static`, which is narrower than `self`
const SELF_RANK: Readonly<Record<SelfKind, number>> = {
  this: 0,
  static: 1,
  self: 2,
};

/**
 * Check if a value of type `source` may be used where `target` is expected.
 *
 * Nullability is ignored on both sides; null-safety is reported separately
 * from type mismatches. Numeric widening is handled at the union level.
 */
export function canCastTo(
  source: AtomicType,
  target: AtomicType,
  hierarchy: ClassHierarchy = EMPTY_CLASS_HIERARCHY
): boolean {
  if (source === target || source.id === target.id) {
    return true;
  }

  const s = Types.nonNullable(source);
  const t = Types.nonNullable(target);
  if (s === t) {
    return true;
  }

  // Unknown types never produce an error
  if (isScalarKind(s, 'none') || isScalarKind(t, 'none')) {
    return true;
  }

  if (isScalarKind(s, 'null')) {
    return target.nullable;
  }

  switch (s.kind) {
    case 'class':
      return t.kind === 'class' && hierarchy.isSubclassOf(s.name, t.name);

    case 'generic':
      if (isScalarKind(t, 'array')) return true;
      return t.kind === 'generic' && canCastTo(s.element, t.element, hierarchy);

    case 'scalar':
      // An untyped array may hold elements of any type
      return s.scalar === 'array' && t.kind === 'generic';

    case 'self':
      return t.kind === 'self' && SELF_RANK[s.self] <= SELF_RANK[t.self];
  }
}
