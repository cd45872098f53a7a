/**
 * Union types
 *
 * The type of an expression is the set of atomic types its value may have.
 * A union is built up by repeated insertion while an expression is being
 * inferred and is then only queried.
 *
 * The empty union means "unknown" and is compatible with everything.
 */

import type { AtomicType, LiteralValue, TypeId } from '../types/atomic.js';
import type { ClassHierarchy } from '../types/hierarchy.js';
import { EMPTY_CLASS_HIERARCHY } from '../types/hierarchy.js';
import type { ParseError } from '../parser/index.js';
import { parseTypeString } from '../parser/index.js';
import { EmptyUnionTypeError } from '../errors.js';
import { Types } from '../utils/type-factory.js';
import {
  asGenericType,
  canCastTo as canCastAtomicTo,
  isGeneric,
  isScalar,
  isScalarKind,
  isSelfLike,
} from '../utils/type-utils.js';
import { naturalCompare } from '../utils/natural-compare.js';

export interface CastOptions {
  /** Answers class-to-class compatibility (default: no relationships) */
  hierarchy?: ClassHierarchy;
}

const DEFAULT_CAST_OPTIONS: Required<CastOptions> = {
  hierarchy: EMPTY_CLASS_HIERARCHY,
};

export interface UnionParseResult {
  type: UnionType;
  errors: ParseError[];
}

/**
 * Infers the type of a syntax node. Implemented by the AST visitor.
 */
export interface NodeTypeVisitor<TNode extends object, TContext> {
  /** Distinguishes syntax nodes from literal values */
  isNode(value: unknown): value is TNode;
  visit(context: TContext, node: TNode): UnionType;
}

export class UnionType implements Iterable<AtomicType> {
  /** Members keyed by canonical string, in insertion order */
  private readonly members = new Map<TypeId, AtomicType>();

  constructor(types: Iterable<AtomicType> = []) {
    for (const type of types) {
      this.addType(type);
    }
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  static empty(): UnionType {
    return new UnionType();
  }

  static fromTypeList(types: Iterable<AtomicType>): UnionType {
    return new UnionType(types);
  }

  /**
   * Parse a `|`-delimited type string. Segments that cannot be parsed
   * become `none`; use `parse` to see why.
   */
  static fromString(typeString: string | null | undefined): UnionType {
    if (typeString === null || typeString === undefined) {
      return new UnionType();
    }
    return UnionType.parse(typeString).type;
  }

  /**
   * Parse a `|`-delimited type string, reporting malformed segments
   */
  static parse(typeString: string): UnionParseResult {
    const { types, errors } = parseTypeString(typeString);
    return { type: new UnionType(types), errors };
  }

  /**
   * The type of a literal value or, for a syntax node, whatever the
   * inference visitor says it is
   */
  static fromLiteralOrNode<TNode extends object, TContext>(
    context: TContext,
    value: TNode | LiteralValue,
    visitor: NodeTypeVisitor<TNode, TContext>
  ): UnionType {
    if (visitor.isNode(value)) {
      return visitor.visit(context, value);
    }
    if (value === null || value === undefined) {
      return new UnionType();
    }
    return new UnionType([Types.fromLiteralValue(value)]);
  }

  static unserialize(serialized: string): UnionType {
    return UnionType.fromString(serialized);
  }

  // ==========================================================================
  // Building
  // ==========================================================================

  /**
   * Add a type; adding a type already present does nothing
   */
  addType(type: AtomicType): void {
    if (!this.members.has(type.id)) {
      this.members.set(type.id, type);
    }
  }

  addUnionType(other: UnionType): void {
    for (const type of other) {
      this.addType(type);
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * First type added. Only meaningful when `count() === 1`.
   */
  head(): AtomicType {
    for (const type of this.members.values()) {
      return type;
    }
    throw new EmptyUnionTypeError();
  }

  hasType(type: AtomicType): boolean {
    return this.members.has(type.id);
  }

  hasAnyType(types: Iterable<AtomicType>): boolean {
    for (const type of types) {
      if (this.hasType(type)) return true;
    }
    return false;
  }

  /**
   * True if this union is exactly the given type and nothing else
   */
  isType(type: AtomicType): boolean {
    return this.members.size === 1 && this.hasType(type);
  }

  /**
   * True if both unions hold the same set of types
   */
  isEqualTo(other: UnionType): boolean {
    return this.serialize() === other.serialize();
  }

  count(): number {
    return this.members.size;
  }

  isEmpty(): boolean {
    return this.members.size === 0;
  }

  /**
   * True if any member refers to the enclosing class
   */
  hasSelfType(): boolean {
    return this.types().some(isSelfLike);
  }

  /**
   * True if this union is a single native type
   */
  isScalar(): boolean {
    return this.members.size === 1 && isScalar(this.head());
  }

  /** Members in insertion order */
  types(): readonly AtomicType[] {
    return [...this.members.values()];
  }

  [Symbol.iterator](): Iterator<AtomicType> {
    return this.members.values();
  }

  // ==========================================================================
  // Cast compatibility
  // ==========================================================================

  /**
   * Check if a value of this type may be used where `target` is expected.
   *
   * Deliberately permissive: unknown, null and mixed types are compatible
   * with everything, and int widens to float but not the other way round.
   */
  canCastTo(target: UnionType, options: CastOptions = {}): boolean {
    const { hierarchy } = { ...DEFAULT_CAST_OPTIONS, ...options };

    if (this.isEqualTo(target)) {
      return true;
    }

    if (this.isEmpty() || target.isEmpty()) {
      return true;
    }

    if (this.isType(Types.null) || target.isType(Types.null)) {
      return true;
    }

    if (this.hasType(Types.mixed) || target.hasType(Types.mixed)) {
      return true;
    }

    if (this.isType(Types.int) && target.isType(Types.float)) {
      return true;
    }

    for (const sourceType of this.members.values()) {
      for (const targetType of target.members.values()) {
        if (canCastAtomicTo(sourceType, targetType, hierarchy)) {
          return true;
        }
      }
    }

    return false;
  }

  // ==========================================================================
  // Generic array projection
  // ==========================================================================

  /**
   * Element types of the array members: `int[]|string|bool[]` gives
   * `int|bool`. An untyped array (or mixed) may hold anything, giving `mixed`.
   */
  genericTypes(): UnionType {
    const anything = this.types().some(
      (type) => isScalarKind(type, 'array') || isScalarKind(type, 'mixed')
    );
    if (anything) {
      return new UnionType([Types.mixed]);
    }

    const result = new UnionType();
    for (const type of this.members.values()) {
      if (isGeneric(type)) {
        result.addType(type.element);
      }
    }
    return result;
  }

  /**
   * An array of each alternative: `int|float` gives `int[]|float[]`
   */
  asGenericTypes(): UnionType {
    return new UnionType(this.types().map(asGenericType));
  }

  /**
   * Members that are not arrays of some type: `int[]|string|bool[]` gives
   * `string`
   */
  nonGenericTypes(): UnionType {
    return new UnionType(this.types().filter((type) => !isGeneric(type)));
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  /**
   * Canonical form: member names in natural order joined by `|`
   */
  serialize(): string {
    return [...this.members.keys()].sort(naturalCompare).join('|');
  }

  toString(): string {
    return this.serialize();
  }
}
