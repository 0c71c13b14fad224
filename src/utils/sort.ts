export type Sortable = string | number | Date | null;

/** Ascending comparison with nulls last. */
export function compareSortable(a: Sortable, b: Sortable): number {
  if (a === null) return b === null ? 0 : 1;
  if (b === null) return -1;
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const leftText = String(left);
  const rightText = String(right);
  return leftText < rightText ? -1 : leftText > rightText ? 1 : 0;
}
