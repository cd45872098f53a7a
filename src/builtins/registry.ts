/**
 * Builtin type registry
 *
 * Read-only tables of property types for builtin classes and signatures
 * for builtin functions. Class names are case-insensitive; function names
 * are matched exactly as written.
 */

import type { QualifiedName } from '../types/qualified-name.js';
import { UnionType } from '../union/union-type.js';
import { BuiltinLookupError, BuiltinTableError } from '../errors.js';
import type { FunctionSignature } from './schema.js';
import { builtinTablesSchema } from './schema.js';

export class BuiltinRegistry {
  private constructor(
    /** Lowercased class name → property name → type string */
    private readonly classes: ReadonlyMap<string, ReadonlyMap<string, string>>,
    /** Qualified function name → signature */
    private readonly functions: ReadonlyMap<string, FunctionSignature>
  ) {}

  /**
   * Validate and index raw tables (typically parsed JSON).
   * Throws BuiltinTableError listing every problem found.
   */
  static fromTables(raw: unknown): BuiltinRegistry {
    const result = builtinTablesSchema.safeParse(raw);
    if (!result.success) {
      throw new BuiltinTableError(
        result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        }))
      );
    }

    const classes = new Map<string, ReadonlyMap<string, string>>();
    for (const [className, entry] of Object.entries(result.data.classes)) {
      classes.set(className.toLowerCase(), new Map(Object.entries(entry.properties)));
    }

    const functions = new Map<string, FunctionSignature>();
    for (const [name, signature] of Object.entries(result.data.functions)) {
      if (signature !== null) {
        functions.set(name, signature);
      }
    }

    return new BuiltinRegistry(classes, functions);
  }

  static empty(): BuiltinRegistry {
    return new BuiltinRegistry(new Map(), new Map());
  }

  // ==========================================================================
  // Classes
  // ==========================================================================

  classExists(className: string): boolean {
    return this.classes.has(className.toLowerCase());
  }

  propertyExists(className: string, propertyName: string): boolean {
    return this.classes.get(className.toLowerCase())?.has(propertyName) ?? false;
  }

  /**
   * Declared type of a builtin class property.
   * The caller must have checked `propertyExists` first.
   */
  classPropertyType(className: string, propertyName: string): UnionType {
    const properties = this.classes.get(className.toLowerCase());
    if (properties === undefined) {
      throw new BuiltinLookupError('class', className);
    }
    const typeName = properties.get(propertyName);
    if (typeName === undefined) {
      throw new BuiltinLookupError('property', `${className}::$${propertyName}`);
    }
    return UnionType.fromString(typeName);
  }

  // ==========================================================================
  // Functions
  // ==========================================================================

  /**
   * True if the function has a non-empty signature
   */
  signatureExists(qualifiedName: QualifiedName): boolean {
    return this.functions.has(qualifiedName.toString());
  }

  /**
   * Parameter name → declared type, in declaration order. Empty when the
   * function is unknown.
   */
  functionParameterTypes(qualifiedName: QualifiedName): ReadonlyMap<string, UnionType> {
    const signature = this.functions.get(qualifiedName.toString());
    const parameterTypes = new Map<string, UnionType>();
    if (signature === undefined) {
      return parameterTypes;
    }
    for (const [name, typeName] of signature.parameters) {
      parameterTypes.set(name, UnionType.fromString(typeName));
    }
    return parameterTypes;
  }

  /**
   * Declared return type. The caller must have checked `signatureExists`
   * first.
   */
  functionReturnType(qualifiedName: QualifiedName): UnionType {
    const signature = this.functions.get(qualifiedName.toString());
    if (signature === undefined) {
      throw new BuiltinLookupError('function', qualifiedName.toString());
    }
    return UnionType.fromString(signature.returnType);
  }

  /** Number of functions with a known signature */
  get functionCount(): number {
    return this.functions.size;
  }

  /** Number of builtin classes */
  get classCount(): number {
    return this.classes.size;
  }
}
