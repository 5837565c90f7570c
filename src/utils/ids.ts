export const CATEGORY_PREFIX = 'cat_';
export const ITEM_PREFIX = 'item_';

export function idNumber(id: string, prefix: string): number | null {
  if (!id.startsWith(prefix)) return null;
  const rest = id.slice(prefix.length);
  return /^\d+$/.test(rest) ? Number(rest) : null;
}

/** Highest numeric suffix among ids carrying `prefix`, 0 when there is none. */
export function maxIdNumber(ids: Iterable<string>, prefix: string): number {
  let max = 0;
  for (const id of ids) {
    const n = idNumber(id, prefix);
    if (n !== null && n > max) max = n;
  }
  return max;
}

export function formatId(prefix: string, n: number): string {
  return `${prefix}${n}`;
}
