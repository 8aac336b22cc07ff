/**
 * Run configuration. Every value has a default and can be overridden
 * through the environment:
 *
 *   PAGERANK_DAMPING         damping factor, in (0, 1)        default 0.85
 *   PAGERANK_SAMPLES         samples for the random surfer     default 10000
 *   PAGERANK_THRESHOLD       convergence threshold, > 0        default 0.001
 *   PAGERANK_MAX_ITERATIONS  cap on iterative update passes    default 10000
 */

import { ConfigError } from './errors.js';
import { DEFAULT_MAX_ITERATIONS, DEFAULT_THRESHOLD } from './iteration.js';
import { DEFAULT_SAMPLES } from './sampling.js';
import { DEFAULT_DAMPING } from './transition.js';

export interface RankConfig {
  damping: number;
  samples: number;
  threshold: number;
  maxIterations: number;
}

export const DEFAULT_CONFIG: Readonly<RankConfig> = {
  damping: DEFAULT_DAMPING,
  samples: DEFAULT_SAMPLES,
  threshold: DEFAULT_THRESHOLD,
  maxIterations: DEFAULT_MAX_ITERATIONS,
};

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function validateConfig(config: RankConfig): RankConfig {
  if (!(config.damping > 0 && config.damping < 1)) {
    throw new ConfigError(`Damping factor must be between 0 and 1, got ${config.damping}`);
  }
  if (!Number.isInteger(config.samples) || config.samples < 1) {
    throw new ConfigError(`Number of samples must be a positive integer, got ${config.samples}`);
  }
  if (!(config.threshold > 0)) {
    throw new ConfigError(`Convergence threshold must be positive, got ${config.threshold}`);
  }
  if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
    throw new ConfigError(`Max iterations must be a positive integer, got ${config.maxIterations}`);
  }
  return config;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RankConfig {
  return validateConfig({
    damping: readNumber(env, 'PAGERANK_DAMPING', DEFAULT_CONFIG.damping),
    samples: readNumber(env, 'PAGERANK_SAMPLES', DEFAULT_CONFIG.samples),
    threshold: readNumber(env, 'PAGERANK_THRESHOLD', DEFAULT_CONFIG.threshold),
    maxIterations: readNumber(env, 'PAGERANK_MAX_ITERATIONS', DEFAULT_CONFIG.maxIterations),
  });
}
