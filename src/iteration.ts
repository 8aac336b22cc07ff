/**
 * Iterative PageRank — fixed-point iteration of
 *
 *   PR(p) = (1 - d) / N  +  d * Σ_{i → p} PR(i) / L(i)
 *
 * where a page with no links counts as linking to all N pages.
 *
 * Each pass reads only the previous pass's ranks and writes a fresh
 * table, which replaces the old one when the pass is done. Iteration
 * stops once every page moved by less than the threshold.
 *
 * The estimator is a small state machine:
 *
 *   initialized --step--> iterating --step--> iterating
 *                                   \--step--> converged  (max delta < threshold)
 *
 * The damping term makes the chain irreducible and aperiodic, so the
 * loop always converges; maxIterations is only a cap.
 */

import type { Corpus } from './corpus.js';
import type { Distribution } from './distribution.js';
import {
  ConvergenceError,
  EmptyCorpusError,
  EstimatorStateError,
  InvalidNodeError,
  InvalidThresholdError,
} from './errors.js';
import { DEFAULT_DAMPING, assertDamping } from './transition.js';

export const DEFAULT_THRESHOLD = 0.001;
export const DEFAULT_MAX_ITERATIONS = 10_000;

export type EstimatorState = 'initialized' | 'iterating' | 'converged';

export interface IterationOptions<K> {
  /** Cap on update passes before giving up. Default 10 000. */
  maxIterations?: number;
  /** Starting ranks. Must cover every page. Default 1/N each. */
  initial?: ReadonlyMap<K, number>;
  /** Called after every pass with its 1-based number and largest per-page change. */
  onIteration?: (iteration: number, maxDelta: number) => void;
}

export class IterativeEstimator<K> {
  private readonly pages: K[];
  /** Out-link indices per page; empty for dangling pages. */
  private readonly links: number[][];
  private readonly maxIterations: number;
  private readonly onIteration?: (iteration: number, maxDelta: number) => void;
  private current: Float64Array;
  private _state: EstimatorState = 'initialized';
  private _iterations = 0;
  private _lastDelta = Infinity;

  constructor(
    corpus: Corpus<K>,
    private readonly damping: number = DEFAULT_DAMPING,
    private readonly threshold: number = DEFAULT_THRESHOLD,
    options: IterationOptions<K> = {},
  ) {
    assertDamping(damping);
    if (!(threshold > 0) || !Number.isFinite(threshold)) {
      throw new InvalidThresholdError(threshold);
    }
    if (corpus.size === 0) throw new EmptyCorpusError();

    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
    this.onIteration = options.onIteration;

    this.pages = [...corpus.keys()];
    const n = this.pages.length;

    const indexMap = new Map<K, number>();
    for (let i = 0; i < n; i++) {
      indexMap.set(this.pages[i], i);
    }

    this.links = this.pages.map(page => {
      const targets: number[] = [];
      for (const link of corpus.get(page) ?? []) {
        const j = indexMap.get(link);
        if (j === undefined) {
          throw new InvalidNodeError(link, `Page ${String(page)} links to ${String(link)}, which is not in the corpus`);
        }
        targets.push(j);
      }
      return targets;
    });

    this.current = new Float64Array(n);
    if (options.initial) {
      for (let i = 0; i < n; i++) {
        const rank = options.initial.get(this.pages[i]);
        if (rank === undefined) {
          throw new InvalidNodeError(this.pages[i], `Initial ranks have no value for page ${String(this.pages[i])}`);
        }
        this.current[i] = rank;
      }
    } else {
      this.current.fill(1 / n);
    }
  }

  get state(): EstimatorState {
    return this._state;
  }

  /** Number of update passes applied so far. */
  get iterations(): number {
    return this._iterations;
  }

  /** Largest per-page change of the latest pass; Infinity before the first. */
  get lastDelta(): number {
    return this._lastDelta;
  }

  /** Snapshot of the current rank table. */
  ranks(): Distribution<K> {
    const ranks: Distribution<K> = new Map();
    for (let i = 0; i < this.pages.length; i++) {
      ranks.set(this.pages[i], this.current[i]);
    }
    return ranks;
  }

  /**
   * Apply one synchronous update pass.
   * @returns The largest per-page change of this pass.
   */
  step(): number {
    if (this._state === 'converged') {
      throw new EstimatorStateError('Estimator has already converged');
    }

    const n = this.pages.length;
    const d = this.damping;
    const prev = this.current;
    const next = new Float64Array(n);

    // Mass held by dangling pages is spread over every page
    let danglingMass = 0;
    for (let i = 0; i < n; i++) {
      if (this.links[i].length === 0) danglingMass += prev[i];
    }
    next.fill((1 - d) / n + (d * danglingMass) / n);

    // Scatter from sources to targets
    for (let i = 0; i < n; i++) {
      const targets = this.links[i];
      if (targets.length === 0) continue;
      const share = (d * prev[i]) / targets.length;
      for (const j of targets) {
        next[j] += share;
      }
    }

    let maxDelta = 0;
    for (let i = 0; i < n; i++) {
      const delta = Math.abs(next[i] - prev[i]);
      if (delta > maxDelta) maxDelta = delta;
    }

    this.current = next;
    this._iterations++;
    this._lastDelta = maxDelta;
    this._state = maxDelta < this.threshold ? 'converged' : 'iterating';
    this.onIteration?.(this._iterations, maxDelta);

    return maxDelta;
  }

  /**
   * Step until converged.
   * @throws ConvergenceError when maxIterations passes are not enough.
   */
  run(): Distribution<K> {
    while (this._state !== 'converged') {
      if (this._iterations >= this.maxIterations) {
        throw new ConvergenceError(this._iterations, this._lastDelta);
      }
      this.step();
    }
    return this.ranks();
  }
}

/**
 * Compute PageRank by iterating the recurrence until no page changes by
 * `threshold` or more between passes.
 */
export function iteratePagerank<K>(
  corpus: Corpus<K>,
  damping: number = DEFAULT_DAMPING,
  threshold: number = DEFAULT_THRESHOLD,
  options: IterationOptions<K> = {},
): Distribution<K> {
  return new IterativeEstimator(corpus, damping, threshold, options).run();
}
