/**
 * Type model exports
 */

export type {
  TypeId,
  ScalarKind,
  SelfKind,
  BaseAtomicType,
  ScalarType,
  ClassRefType,
  GenericArrayType,
  SelfLikeType,
  AtomicType,
  AtomicTypeKind,
  LiteralValue,
} from './atomic.js';

export { SCALAR_KINDS, SELF_KINDS, SCALAR_ALIASES, isTypeKind, isClassName } from './atomic.js';

export { QualifiedName } from './qualified-name.js';

export type { ClassHierarchy } from './hierarchy.js';
export { EMPTY_CLASS_HIERARCHY, createClassHierarchy } from './hierarchy.js';
