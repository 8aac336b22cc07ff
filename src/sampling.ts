/**
 * PageRank sampling — the random surfer as a single Markov chain.
 *
 * The first sample is a page chosen uniformly at random. Every later
 * sample is drawn from the transition model of the previous one, so
 * `n` samples make one walk of `n - 1` steps with no restarts.
 *
 * PageRank(p) = visits(p) / n.
 *
 * The result is stochastic; it approaches the iterative estimate as n
 * grows. On small corpora 10 000 samples land within a few hundredths
 * (L1) of it.
 */

import type { Corpus } from './corpus.js';
import type { Distribution } from './distribution.js';
import { EmptyCorpusError, InvalidSampleCountError } from './errors.js';
import { defaultRandom, type RandomSource } from './random.js';
import { DEFAULT_DAMPING, assertDamping, transitionModel } from './transition.js';

export const DEFAULT_SAMPLES = 10_000;

function assertSampleCount(n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidSampleCountError(n);
  }
}

/**
 * Walk `n` samples and count how often each page was visited.
 * Every page of the corpus is present in the result, unvisited ones at 0.
 *
 * @param random Source of every draw; pass a seeded one to replay a walk.
 */
export function sampleTallies<K>(
  corpus: Corpus<K>,
  damping: number,
  n: number,
  random: RandomSource = defaultRandom,
): Map<K, number> {
  assertDamping(damping);
  assertSampleCount(n);
  if (corpus.size === 0) throw new EmptyCorpusError();

  const pages = [...corpus.keys()];
  const tallies = new Map<K, number>();
  for (const page of pages) tallies.set(page, 0);

  // The corpus is immutable, so each page's weights are computed once
  const weightCache = new Map<K, number[]>();
  const weightsFor = (page: K): number[] => {
    let weights = weightCache.get(page);
    if (weights === undefined) {
      const model = transitionModel(corpus, page, damping);
      weights = pages.map(p => model.get(p) ?? 0);
      weightCache.set(page, weights);
    }
    return weights;
  };

  let current = random.choice(pages);
  for (let i = 0; i < n; i++) {
    tallies.set(current, (tallies.get(current) ?? 0) + 1);
    if (i < n - 1) {
      current = random.weightedChoice(pages, weightsFor(current));
    }
  }

  return tallies;
}

/**
 * Estimate PageRank from the visit frequencies of an `n`-sample walk.
 */
export function samplePagerank<K>(
  corpus: Corpus<K>,
  damping: number = DEFAULT_DAMPING,
  n: number = DEFAULT_SAMPLES,
  random: RandomSource = defaultRandom,
): Distribution<K> {
  const tallies = sampleTallies(corpus, damping, n, random);
  const ranks: Distribution<K> = new Map();
  for (const [page, count] of tallies) {
    ranks.set(page, count / n);
  }
  return ranks;
}

/**
 * Run `chains` independent walks of `n` samples each and merge them by
 * summing their tallies.
 */
export function sampleChains<K>(
  corpus: Corpus<K>,
  damping: number,
  n: number,
  chains: number,
  random: RandomSource = defaultRandom,
): Distribution<K> {
  if (!Number.isInteger(chains) || chains < 1) {
    throw new RangeError(`Number of chains must be a positive integer, got ${chains}`);
  }

  const merged = new Map<K, number>();
  for (let c = 0; c < chains; c++) {
    for (const [page, count] of sampleTallies(corpus, damping, n, random)) {
      merged.set(page, (merged.get(page) ?? 0) + count);
    }
  }

  const total = n * chains;
  const ranks: Distribution<K> = new Map();
  for (const [page, count] of merged) {
    ranks.set(page, count / total);
  }
  return ranks;
}
