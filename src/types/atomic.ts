/**
 * Atomic type definitions
 *
 * An atomic type is one concrete alternative of a union type: a native
 * scalar, a reference to a class, an array of some element type, or one of
 * the context-relative `self` / `static` / `$this` types.
 */

/** Canonical string form of an atomic type, e.g. `?int[]` */
export type TypeId = string;

/**
 * Native (non-class) type keywords
 */
export const SCALAR_KINDS = [
  'int',
  'float',
  'string',
  'bool',
  'array',
  'null',
  'mixed',
  'none',
  'callable',
  'object',
  'resource',
  'void',
] as const;

export type ScalarKind = (typeof SCALAR_KINDS)[number];

/**
 * Context-relative type keywords, resolved by the caller against the
 * enclosing class
 */
export const SELF_KINDS = ['self', 'static', 'this'] as const;

export type SelfKind = (typeof SELF_KINDS)[number];

/**
 * Base interface for all atomic types
 */
export interface BaseAtomicType {
  readonly kind: string;
  /** Canonical string form; equal ids mean the same type */
  readonly id: TypeId;
  /** Written with a `?` prefix */
  readonly nullable: boolean;
}

export interface ScalarType extends BaseAtomicType {
  readonly kind: 'scalar';
  readonly scalar: ScalarKind;
}

export interface ClassRefType extends BaseAtomicType {
  readonly kind: 'class';
  /** Class name as written, including any leading namespace separator */
  readonly name: string;
}

/**
 * `T[]`. The element is never nullable: `?T[]` is a nullable array of `T`.
 */
export interface GenericArrayType extends BaseAtomicType {
  readonly kind: 'generic';
  readonly element: AtomicType;
}

export interface SelfLikeType extends BaseAtomicType {
  readonly kind: 'self';
  readonly self: SelfKind;
}

export type AtomicType = ScalarType | ClassRefType | GenericArrayType | SelfLikeType;

export type AtomicTypeKind = AtomicType['kind'];

/**
 * Values that can be mapped directly to an atomic type without going
 * through the inference visitor
 */
export type LiteralValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | object;

/**
 * Check if a type is of a specific kind
 */
export function isTypeKind<K extends AtomicTypeKind>(
  type: AtomicType,
  kind: K
): type is Extract<AtomicType, { kind: K }> {
  return type.kind === kind;
}

/** Alternate spellings of scalar keywords accepted on input */
export const SCALAR_ALIASES: ReadonlyMap<string, ScalarKind> = new Map<string, ScalarKind>([
  ['integer', 'int'],
  ['double', 'float'],
  ['boolean', 'bool'],
  ['callback', 'callable'],
]);

const IDENTIFIER = '[A-Za-z_\\x80-\\uffff][A-Za-z0-9_\\x80-\\uffff]*';
const CLASS_NAME_PATTERN = new RegExp(`^\\\\?${IDENTIFIER}(?:\\\\${IDENTIFIER})*$`);

const RESERVED_NAMES: ReadonlySet<string> = new Set<string>([
  ...SCALAR_KINDS,
  ...SCALAR_ALIASES.keys(),
  'self',
  'static',
]);

/**
 * Check if a string can name a class: a possibly qualified identifier that
 * is not a type keyword
 */
export function isClassName(name: string): boolean {
  return CLASS_NAME_PATTERN.test(name) && !RESERVED_NAMES.has(name.toLowerCase());
}
