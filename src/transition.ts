/**
 * Transition model of the random surfer.
 *
 * From the current page the surfer follows one of its links with
 * probability `damping`, or jumps to any page of the corpus with
 * probability `1 - damping`. A page without links is treated as linking
 * to every page, itself included, so the chain has no dead ends.
 */

import type { Corpus } from './corpus.js';
import type { Distribution } from './distribution.js';
import { InvalidDampingError, InvalidNodeError } from './errors.js';

export const DEFAULT_DAMPING = 0.85;

export function assertDamping(damping: number): void {
  if (!(damping > 0 && damping < 1)) {
    throw new InvalidDampingError(damping);
  }
}

/**
 * Probability of visiting each page of the corpus next, given `page`.
 *
 * Every page gets `(1 - damping) / N`; pages linked from `page` get a
 * further `damping / |links|` (or `damping / N` each when `page` has no
 * links).
 */
export function transitionModel<K>(corpus: Corpus<K>, page: K, damping: number = DEFAULT_DAMPING): Distribution<K> {
  assertDamping(damping);

  const links = corpus.get(page);
  if (links === undefined) {
    throw new InvalidNodeError(page);
  }

  const n = corpus.size;
  const model: Distribution<K> = new Map();

  if (links.size === 0) {
    for (const p of corpus.keys()) {
      model.set(p, 1 / n);
    }
    return model;
  }

  for (const link of links) {
    if (!corpus.has(link)) {
      throw new InvalidNodeError(link, `Page ${String(page)} links to ${String(link)}, which is not in the corpus`);
    }
  }

  const jump = (1 - damping) / n;
  const follow = damping / links.size;
  for (const p of corpus.keys()) {
    model.set(p, links.has(p) ? jump + follow : jump);
  }
  return model;
}
