/**
 * Parser module exports
 */

export { parseAtomicType, parseTypeString, parseType } from './parser.js';
export type { ParseError, AtomicParseResult, TypeListParseResult } from './parser.js';
