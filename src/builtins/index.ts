/**
 * Builtin registry exports
 */

export { BuiltinRegistry } from './registry.js';
export {
  initializeBuiltinRegistry,
  builtinRegistry,
  isBuiltinRegistryInitialized,
  resetBuiltinRegistry,
} from './global.js';
export { builtinTablesSchema } from './schema.js';
export type { BuiltinTables, BuiltinTablesInput, FunctionSignature } from './schema.js';
