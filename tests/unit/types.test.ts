/**
 * Tests for the atomic type factory and type utilities
 */

import { describe, it, expect } from 'vitest';
import {
  Types,
  internedTypeCount,
  isScalar,
  isGeneric,
  isSelfLike,
  isNullable,
  asGenericType,
  genericElementType,
  canCastTo,
} from '../../src/utils/index.js';
import { parseType } from '../../src/parser/index.js';
import { QualifiedName, createClassHierarchy, isTypeKind } from '../../src/types/index.js';
import { InvalidClassNameError } from '../../src/errors.js';

describe('Type Factory', () => {
  describe('interning', () => {
    it('should return the same instance for the same canonical string', () => {
      expect(Types.scalar('int')).toBe(Types.int);
      expect(Types.classRef('\\App\\User')).toBe(Types.classRef('\\App\\User'));
      expect(Types.genericArrayOf(Types.int)).toBe(Types.genericArrayOf(Types.int));
      expect(Types.selfLike('this')).toBe(Types.this);
    });

    it('should not create a new entry when a type is requested again', () => {
      Types.classRef('\\Interned\\Once');
      const before = internedTypeCount();
      Types.classRef('\\Interned\\Once');
      expect(internedTypeCount()).toBe(before);
    });

    it('should freeze instances', () => {
      expect(Object.isFrozen(Types.int)).toBe(true);
      expect(Object.isFrozen(Types.classRef('\\Frozen'))).toBe(true);
    });

    it('should refuse class references named like other types', () => {
      for (const name of ['int', 'Integer', 'self', 'STATIC', '$this', '?Foo', 'Foo[]', 'Foo Bar', '']) {
        expect(() => Types.classRef(name), name).toThrow(InvalidClassNameError);
      }
      expect(Types.scalar('int').kind).toBe('scalar');
      expect(parseType('int')).toBe(Types.int);
    });

    it('should accept qualified class names that contain a keyword', () => {
      expect(Types.classRef('\\int').id).toBe('\\int');
      expect(Types.classRef('App\\Static').kind).toBe('class');
    });
  });

  describe('canonical strings', () => {
    it('should prefix nullable types with ?', () => {
      expect(Types.nullable(Types.int).id).toBe('?int');
      expect(Types.nullable(Types.classRef('\\Foo')).id).toBe('?\\Foo');
      expect(Types.nullable(Types.self).id).toBe('?self');
    });

    it('should write $this for the this type', () => {
      expect(Types.this.id).toBe('$this');
    });

    it('should suffix generic arrays with []', () => {
      const nested = Types.genericArrayOf(Types.genericArrayOf(Types.string));
      expect(nested.id).toBe('string[][]');
      expect(nested.element.id).toBe('string[]');
    });

    it('should treat null and mixed as already nullable', () => {
      expect(Types.nullable(Types.null)).toBe(Types.null);
      expect(Types.nullable(Types.mixed)).toBe(Types.mixed);
    });

    it('should move nullability out of array elements', () => {
      const type = Types.genericArrayOf(Types.nullable(Types.int));
      expect(type.id).toBe('int[]');
      expect(type.element).toBe(Types.int);
    });

    it('should strip nullability', () => {
      expect(Types.nonNullable(Types.nullable(Types.float))).toBe(Types.float);
      expect(Types.nonNullable(Types.float)).toBe(Types.float);
    });
  });

  describe('fromLiteralValue', () => {
    it('should map numbers by integrality', () => {
      expect(Types.fromLiteralValue(42)).toBe(Types.int);
      expect(Types.fromLiteralValue(1.5)).toBe(Types.float);
      expect(Types.fromLiteralValue(1.0)).toBe(Types.int);
      expect(Types.fromLiteralValue(Number.NaN)).toBe(Types.float);
      expect(Types.fromLiteralValue(10n)).toBe(Types.int);
    });

    it('should map primitive values', () => {
      expect(Types.fromLiteralValue('hello')).toBe(Types.string);
      expect(Types.fromLiteralValue(false)).toBe(Types.bool);
      expect(Types.fromLiteralValue(null)).toBe(Types.null);
      expect(Types.fromLiteralValue(undefined)).toBe(Types.null);
    });

    it('should map arrays and callables', () => {
      expect(Types.fromLiteralValue([1, 2, 3])).toBe(Types.array);
      expect(Types.fromLiteralValue(() => 1)).toBe(Types.callable);
    });

    it('should map objects to class references', () => {
      class Invoice {}
      expect(Types.fromLiteralValue({ a: 1 }).id).toBe('\\stdClass');
      expect(Types.fromLiteralValue(Object.create(null)).id).toBe('\\stdClass');
      expect(Types.fromLiteralValue(new Invoice()).id).toBe('\\Invoice');
      expect(Types.fromLiteralValue(new Date(0)).id).toBe('\\Date');
    });

    it('should fall back to stdClass when there is no usable constructor', () => {
      expect(Types.fromLiteralValue(Object.create(Object.create(null))).id).toBe('\\stdClass');
      expect(Types.fromLiteralValue(Object.create({ constructor: 5 })).id).toBe('\\stdClass');

      class Numbered {}
      Object.defineProperty(Numbered, 'name', { value: 42 });
      expect(Types.fromLiteralValue(new Numbered()).id).toBe('\\stdClass');

      class Unnamed {}
      Object.defineProperty(Unnamed, 'name', { value: '' });
      expect(Types.fromLiteralValue(new Unnamed()).id).toBe('\\stdClass');
    });
  });
});

describe('Type Utilities', () => {
  describe('predicates', () => {
    it('should classify variants', () => {
      expect(isScalar(Types.int)).toBe(true);
      expect(isScalar(Types.array)).toBe(true);
      expect(isScalar(Types.classRef('\\Foo'))).toBe(false);
      expect(isGeneric(Types.genericArrayOf(Types.int))).toBe(true);
      expect(isGeneric(Types.array)).toBe(false);
      expect(isSelfLike(Types.static)).toBe(true);
      expect(isSelfLike(Types.classRef('self_made'))).toBe(false);
    });

    it('should narrow by kind', () => {
      const type = parseType('int[]');
      expect(isTypeKind(type, 'generic')).toBe(true);
      expect(isTypeKind(type, 'scalar')).toBe(false);
      if (isTypeKind(type, 'generic')) {
        expect(type.element).toBe(Types.int);
      }
    });

    it('should report nullability', () => {
      expect(isNullable(Types.nullable(Types.int))).toBe(true);
      expect(isNullable(Types.null)).toBe(true);
      expect(isNullable(Types.mixed)).toBe(true);
      expect(isNullable(Types.int)).toBe(false);
    });
  });

  describe('asGenericType', () => {
    it('should wrap a type in one array level', () => {
      expect(asGenericType(Types.int).id).toBe('int[]');
      expect(asGenericType(parseType('int[]')).id).toBe('int[][]');
    });

    it('should keep nullability on the outside', () => {
      const type = asGenericType(Types.nullable(Types.int));
      expect(type.id).toBe('?int[]');
      expect(type.element).toBe(Types.int);
    });

    it('should unwrap element types', () => {
      expect(genericElementType(parseType('bool[]'))).toBe(Types.bool);
      expect(genericElementType(Types.bool)).toBeNull();
    });
  });

  describe('canCastTo', () => {
    it('should allow identical types', () => {
      expect(canCastTo(Types.int, Types.int)).toBe(true);
      expect(canCastTo(Types.classRef('\\Foo'), Types.classRef('\\Foo'))).toBe(true);
    });

    it('should not widen numbers between atomic types', () => {
      expect(canCastTo(Types.int, Types.float)).toBe(false);
      expect(canCastTo(Types.float, Types.int)).toBe(false);
    });

    it('should ignore nullability', () => {
      expect(canCastTo(Types.nullable(Types.int), Types.int)).toBe(true);
      expect(canCastTo(Types.int, Types.nullable(Types.int))).toBe(true);
    });

    it('should allow null into nullable types only', () => {
      expect(canCastTo(Types.null, Types.nullable(Types.classRef('\\Foo')))).toBe(true);
      expect(canCastTo(Types.null, Types.classRef('\\Foo'))).toBe(false);
    });

    it('should treat the unknown type as compatible', () => {
      expect(canCastTo(Types.none, Types.int)).toBe(true);
      expect(canCastTo(Types.string, Types.none)).toBe(true);
    });

    it('should consult the class hierarchy', () => {
      const hierarchy = createClassHierarchy({
        '\\App\\Admin': ['\\App\\User'],
        '\\App\\User': ['\\JsonSerializable'],
      });
      const admin = Types.classRef('\\App\\Admin');
      const serializable = Types.classRef('\\JsonSerializable');

      expect(canCastTo(admin, serializable, hierarchy)).toBe(true);
      expect(canCastTo(serializable, admin, hierarchy)).toBe(false);
      expect(canCastTo(admin, serializable)).toBe(false);
      expect(canCastTo(Types.classRef('App\\admin'), Types.classRef('\\app\\user'), hierarchy)).toBe(true);
    });

    it('should relate typed and untyped arrays', () => {
      expect(canCastTo(parseType('int[]'), Types.array)).toBe(true);
      expect(canCastTo(Types.array, parseType('int[]'))).toBe(true);
      expect(canCastTo(parseType('int[]'), parseType('string[]'))).toBe(false);
    });

    it('should compare array elements covariantly', () => {
      const hierarchy = createClassHierarchy({ '\\Admin': ['\\User'] });
      expect(canCastTo(parseType('\\Admin[]'), parseType('\\User[]'), hierarchy)).toBe(true);
      expect(canCastTo(parseType('\\User[]'), parseType('\\Admin[]'), hierarchy)).toBe(false);
    });

    it('should widen self-like types from $this to self', () => {
      expect(canCastTo(Types.this, Types.static)).toBe(true);
      expect(canCastTo(Types.static, Types.self)).toBe(true);
      expect(canCastTo(Types.self, Types.this)).toBe(false);
      expect(canCastTo(Types.self, Types.classRef('\\Foo'))).toBe(false);
    });
  });
});

describe('QualifiedName', () => {
  it('should keep the name verbatim', () => {
    expect(QualifiedName.fromString('\\App\\fn').toString()).toBe('\\App\\fn');
  });

  it('should build names from parts', () => {
    const name = QualifiedName.fromParts('App\\Model', 'User');
    expect(name.toString()).toBe('\\App\\Model\\User');
    expect(name.namespace).toBe('\\App\\Model');
    expect(name.name).toBe('User');
  });

  it('should place unnamespaced names in the global namespace', () => {
    const name = QualifiedName.fromParts('', 'strlen');
    expect(name.toString()).toBe('\\strlen');
    expect(name.namespace).toBe('\\');
    expect(name.name).toBe('strlen');
  });

  it('should compare by exact string', () => {
    expect(QualifiedName.fromString('\\strlen').equals(QualifiedName.fromParts('\\', 'strlen'))).toBe(true);
    expect(QualifiedName.fromString('\\strlen').equals(QualifiedName.fromString('\\STRLEN'))).toBe(false);
  });

  it('should reject empty names', () => {
    expect(() => QualifiedName.fromString('')).toThrow('Qualified name must not be empty');
  });
});
