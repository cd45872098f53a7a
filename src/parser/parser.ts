/**
 * Type string parser
 *
 * Parses the textual form of union types used in builtin tables, doc
 * comments and diagnostics:
 *
 *   union := type ("|" type)*
 *   type  := "?"? base ("[]")*
 *   base  := scalar-keyword | "self" | "static" | "$this" | class-name
 *
 * Parsing never throws. A segment that cannot be parsed becomes the unknown
 * type `none` and is reported in `errors`.
 */

import type { AtomicType, ScalarKind } from '../types/atomic.js';
import { SCALAR_ALIASES, SCALAR_KINDS, isClassName } from '../types/atomic.js';
import { Types } from '../utils/type-factory.js';

export interface ParseError {
  message: string;
  /** The offending segment, as written */
  segment: string;
  /** Offset of the segment in the parsed string */
  offset: number;
}

export interface AtomicParseResult {
  /** The parsed type, or `none` when it could not be parsed */
  type: AtomicType;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface TypeListParseResult {
  /** One type per `|`-separated segment, in source order */
  types: AtomicType[];
  errors: ParseError[];
}

const SCALAR_KEYWORDS: ReadonlySet<string> = new Set<string>(SCALAR_KINDS);

const ARRAY_SUFFIX = '[]';

function isScalarKind(name: string): name is ScalarKind {
  return SCALAR_KEYWORDS.has(name);
}

function parseBase(base: string): AtomicType | null {
  const lower = base.toLowerCase();
  const alias = SCALAR_ALIASES.get(lower);
  if (alias !== undefined) {
    return Types.scalar(alias);
  }
  if (isScalarKind(lower)) {
    return Types.scalar(lower);
  }
  if (lower === 'self') {
    return Types.self;
  }
  if (lower === 'static') {
    return Types.static;
  }
  if (base === '$this') {
    return Types.this;
  }
  if (isClassName(base)) {
    return Types.classRef(base);
  }
  return null;
}

function failure(message: string, segment: string, offset: number): AtomicParseResult {
  return { type: Types.none, errors: [{ message, segment, offset }] };
}

/**
 * Parse a single type name (no `|`)
 */
export function parseAtomicType(text: string, offset = 0): AtomicParseResult {
  let rest = text.trim();
  if (rest.length === 0) {
    return failure('Empty type name', text, offset);
  }

  const nullable = rest.startsWith('?');
  if (nullable) {
    rest = rest.slice(1);
  }

  let depth = 0;
  while (rest.endsWith(ARRAY_SUFFIX)) {
    rest = rest.slice(0, -ARRAY_SUFFIX.length);
    depth++;
  }

  if (rest.length === 0) {
    return failure('Missing type name', text, offset);
  }

  const base = parseBase(rest);
  if (base === null) {
    return failure(`Invalid type name '${rest}'`, text, offset);
  }

  let type = base;
  for (let i = 0; i < depth; i++) {
    type = Types.genericArrayOf(type);
  }

  return { type: nullable ? Types.nullable(type) : type, errors: [] };
}

/**
 * Parse a `|`-delimited type string such as `int|string|null|\Foo`.
 * The empty string has no types.
 */
export function parseTypeString(text: string): TypeListParseResult {
  if (text.trim().length === 0) {
    return { types: [], errors: [] };
  }

  const types: AtomicType[] = [];
  const errors: ParseError[] = [];

  let offset = 0;
  for (const segment of text.split('|')) {
    const result = parseAtomicType(segment, offset);
    types.push(result.type);
    errors.push(...result.errors);
    offset += segment.length + 1;
  }

  return { types, errors };
}

/**
 * Parse a single type name, discarding errors
 */
export function parseType(text: string): AtomicType {
  return parseAtomicType(text).type;
}
