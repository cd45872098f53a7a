/**
 * Utils module exports
 */

export { Types, internedTypeCount } from './type-factory.js';
export {
  isTypeKind,
  isScalar,
  isScalarKind,
  isGeneric,
  isSelfLike,
  isNullable,
  asGenericType,
  genericElementType,
  canCastTo,
} from './type-utils.js';
export { naturalCompare } from './natural-compare.js';
