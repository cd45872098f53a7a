/**
 * Process-wide builtin registry
 *
 * The registry is built once at startup and shared read-only by every
 * analysis in the process. Each worker thread has its own module state and
 * therefore initializes its own copy.
 */

import { BuiltinRegistry } from './registry.js';
import { RegistryStateError } from '../errors.js';

let instance: BuiltinRegistry | null = null;

/**
 * Install the process-wide registry, from a registry or from raw tables.
 * May only be called once (until reset).
 */
export function initializeBuiltinRegistry(source: unknown): BuiltinRegistry {
  if (instance !== null) {
    throw new RegistryStateError('Builtin registry is already initialized');
  }
  instance = source instanceof BuiltinRegistry ? source : BuiltinRegistry.fromTables(source);
  return instance;
}

/**
 * The process-wide registry
 */
export function builtinRegistry(): BuiltinRegistry {
  if (instance === null) {
    throw new RegistryStateError('Builtin registry used before initializeBuiltinRegistry()');
  }
  return instance;
}

export function isBuiltinRegistryInitialized(): boolean {
  return instance !== null;
}

/**
 * Drop the process-wide registry (for testing)
 */
export function resetBuiltinRegistry(): void {
  instance = null;
}
