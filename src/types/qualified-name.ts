/**
 * Fully qualified structural element names
 *
 * A qualified name such as `\App\Model\User` or `\str_replace` is only ever
 * used as a lookup key, so it keeps the exact text it was created from.
 */

const NAMESPACE_SEPARATOR = '\\';

export class QualifiedName {
  private constructor(private readonly fqsen: string) {}

  /**
   * Wrap an already fully qualified name, verbatim
   */
  static fromString(fullyQualifiedName: string): QualifiedName {
    if (fullyQualifiedName.length === 0) {
      throw new Error('Qualified name must not be empty');
    }
    return new QualifiedName(fullyQualifiedName);
  }

  /**
   * Build `\Namespace\name` from a namespace (with or without separators at
   * either end) and an unqualified name
   */
  static fromParts(namespace: string, name: string): QualifiedName {
    const trimmed = namespace.replace(/^\\+|\\+$/g, '');
    const prefix = trimmed.length > 0 ? `${NAMESPACE_SEPARATOR}${trimmed}` : '';
    return QualifiedName.fromString(`${prefix}${NAMESPACE_SEPARATOR}${name}`);
  }

  /** Namespace part, e.g. `\App\Model` for `\App\Model\User`; `\` for globals */
  get namespace(): string {
    const index = this.fqsen.lastIndexOf(NAMESPACE_SEPARATOR);
    if (index <= 0) return NAMESPACE_SEPARATOR;
    return this.fqsen.slice(0, index);
  }

  /** Unqualified name */
  get name(): string {
    return this.fqsen.slice(this.fqsen.lastIndexOf(NAMESPACE_SEPARATOR) + 1);
  }

  equals(other: QualifiedName): boolean {
    return this.fqsen === other.fqsen;
  }

  toString(): string {
    return this.fqsen;
  }
}
