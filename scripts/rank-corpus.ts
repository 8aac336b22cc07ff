#!/usr/bin/env node
/**
 * rank-corpus.ts — Rank a directory of HTML pages with both estimators.
 *
 * Usage:
 *   rank-corpus <corpus-directory>
 *
 * Damping, sample count and threshold come from the PAGERANK_*
 * environment variables (see src/config.ts).
 */

import { loadConfig } from '../src/config.js';
import { crawl } from '../src/corpus.js';
import { formatRanks } from '../src/distribution.js';
import { iteratePagerank } from '../src/iteration.js';
import { samplePagerank } from '../src/sampling.js';

async function main() {
  const args = process.argv.slice(2);
  if (args.length !== 1) {
    console.error('Usage: rank-corpus <corpus-directory>');
    process.exit(1);
  }

  const config = loadConfig();
  const corpus = await crawl(args[0]);

  const sampled = samplePagerank(corpus, config.damping, config.samples);
  for (const line of formatRanks(`PageRank Results from Sampling (n = ${config.samples})`, sampled)) {
    console.log(line);
  }

  const iterated = iteratePagerank(corpus, config.damping, config.threshold, { maxIterations: config.maxIterations });
  for (const line of formatRanks('PageRank Results from Iteration', iterated)) {
    console.log(line);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
