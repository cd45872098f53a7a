/**
 * Class hierarchy seam
 *
 * Whether one class may stand in for another is decided by whoever owns
 * the class graph. The cast check only asks.
 */

export interface ClassHierarchy {
  /**
   * True if `subclass` extends or implements `superclass`, directly or
   * through its ancestors. Names are class names as written in types.
   */
  isSubclassOf(subclass: string, superclass: string): boolean;
}

/**
 * A hierarchy that knows no relationships
 */
export const EMPTY_CLASS_HIERARCHY: ClassHierarchy = {
  isSubclassOf: () => false,
};

/** Class names compare case-insensitively and with or without a leading `\` */
function classKey(name: string): string {
  return name.replace(/^\\/, '').toLowerCase();
}

/**
 * Build a hierarchy from each class's direct parents and interfaces
 */
export function createClassHierarchy(parents: Readonly<Record<string, readonly string[]>>): ClassHierarchy {
  const edges = new Map<string, string[]>();
  for (const [name, supers] of Object.entries(parents)) {
    edges.set(classKey(name), supers.map(classKey));
  }

  return {
    isSubclassOf(subclass: string, superclass: string): boolean {
      const target = classKey(superclass);
      const visited = new Set<string>();
      const worklist = [...(edges.get(classKey(subclass)) ?? [])];

      while (worklist.length > 0) {
        const current = worklist.pop();
        if (current === undefined || visited.has(current)) continue;
        if (current === target) return true;
        visited.add(current);
        worklist.push(...(edges.get(current) ?? []));
      }
      return false;
    },
  };
}
