/**
 * Natural-order string comparison
 *
 * Runs of digits compare by numeric value, everything else by code unit,
 * so `Foo2` sorts before `Foo10`. Comparison is case-sensitive.
 */

const CHUNK_PATTERN = /\d+|\D+/g;

function isDigits(chunk: string): boolean {
  return chunk.charCodeAt(0) >= 48 && chunk.charCodeAt(0) <= 57;
}

function compareDigits(a: string, b: string): number {
  const left = a.replace(/^0+(?=\d)/, '');
  const right = b.replace(/^0+(?=\d)/, '');
  if (left.length !== right.length) {
    return left.length - right.length;
  }
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  // Same value: fewer leading zeros first
  return a.length - b.length;
}

export function naturalCompare(a: string, b: string): number {
  const left = a.match(CHUNK_PATTERN) ?? [];
  const right = b.match(CHUNK_PATTERN) ?? [];
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? '';
    const y = right[i] ?? '';
    if (x === y) continue;

    if (isDigits(x) && isDigits(y)) {
      const order = compareDigits(x, y);
      if (order !== 0) return order;
      continue;
    }
    return x < y ? -1 : 1;
  }

  return left.length - right.length;
}
