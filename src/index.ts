/**
 * php-union-types - union types and cast compatibility for PHP analysis
 */

export * from './types/index.js';

// Re-export utils (with namespace: predicate names overlap UnionType methods)
export * as Utils from './utils/index.js';
export { Types } from './utils/index.js';

export * from './parser/index.js';

export * from './union/index.js';

export * from './builtins/index.js';

export * from './output/index.js';

export * from './errors.js';
