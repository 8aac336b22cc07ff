/**
 * Probability distributions over corpus pages, and the helpers used to
 * compare and print them.
 */

export type Distribution<K = string> = Map<K, number>;

export function totalProbability<K>(dist: ReadonlyMap<K, number>): number {
  let total = 0;
  for (const p of dist.values()) total += p;
  return total;
}

/** Sum of absolute differences over the union of both key sets. */
export function l1Distance<K>(a: ReadonlyMap<K, number>, b: ReadonlyMap<K, number>): number {
  let distance = 0;
  for (const [key, p] of a) {
    distance += Math.abs(p - (b.get(key) ?? 0));
  }
  for (const [key, q] of b) {
    if (!a.has(key)) distance += Math.abs(q);
  }
  return distance;
}

export function maxAbsDelta<K>(a: ReadonlyMap<K, number>, b: ReadonlyMap<K, number>): number {
  let max = 0;
  for (const [key, p] of a) {
    const d = Math.abs(p - (b.get(key) ?? 0));
    if (d > max) max = d;
  }
  return max;
}

export function distributionToRecord(dist: ReadonlyMap<string, number>): Record<string, number> {
  return Object.fromEntries(dist);
}

/**
 * Render a titled block of `  page: 0.1234` lines, pages in sorted order.
 */
export function formatRanks(title: string, dist: ReadonlyMap<string, number>): string[] {
  const pages = [...dist.keys()].sort();
  return [title, ...pages.map(page => `  ${page}: ${(dist.get(page) ?? 0).toFixed(4)}`)];
}
