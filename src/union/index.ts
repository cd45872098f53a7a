/**
 * Union type exports
 */

export { UnionType } from './union-type.js';
export type { CastOptions, NodeTypeVisitor, UnionParseResult } from './union-type.js';
