/**
 * Error types raised when a caller breaks a precondition.
 *
 * None of these describe a problem in the analyzed code; that is reported
 * through parse results and cast checks instead.
 */

export class TypeEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TypeEngineError';
  }
}

/**
 * `head()` on a union with no members
 */
export class EmptyUnionTypeError extends TypeEngineError {
  constructor() {
    super('Cannot take the head of an empty union type');
    this.name = 'EmptyUnionTypeError';
  }
}

/**
 * A class reference was built from a string that is not a class name
 */
export class InvalidClassNameError extends TypeEngineError {
  constructor(readonly className: string) {
    super(`Not a class name: '${className}'`);
    this.name = 'InvalidClassNameError';
  }
}

export type BuiltinTable = 'class' | 'property' | 'function';

/**
 * A builtin class, property or function was looked up without first
 * checking that it exists.
 */
export class BuiltinLookupError extends TypeEngineError {
  public readonly table: BuiltinTable;
  public readonly key: string;

  constructor(table: BuiltinTable, key: string) {
    super(`Precondition violated: no builtin ${table} '${key}' (check existence before lookup)`);
    this.name = 'BuiltinLookupError';
    this.table = table;
    this.key = key;
  }
}

export interface TableIssue {
  /** Dotted path into the table, e.g. `functions.strlen.1` */
  path: string;
  message: string;
}

/**
 * Builtin tables that do not match the expected shape
 */
export class BuiltinTableError extends TypeEngineError {
  public readonly issues: readonly TableIssue[];

  constructor(issues: readonly TableIssue[]) {
    const detail = issues.map((issue) => `  ${issue.path || '<root>'}: ${issue.message}`).join('\n');
    super(`Invalid builtin tables:\n${detail}`);
    this.name = 'BuiltinTableError';
    this.issues = issues;
  }
}

/**
 * The process-wide registry was read before initialization, or
 * initialized twice
 */
export class RegistryStateError extends TypeEngineError {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryStateError';
  }
}
