/**
 * Corpus — the directed link graph being ranked.
 *
 * A corpus maps each page to the set of pages it links to. An empty set
 * marks a dangling page, which the estimators treat as linking to every
 * page (itself included). Once built, a corpus is never mutated.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { CorpusReadError, InvalidNodeError } from './errors.js';

export type Corpus<K = string> = ReadonlyMap<K, ReadonlySet<K>>;

export type CorpusRecord = Record<string, readonly string[]>;

const LINK_PATTERN = /<a\s+(?:[^>]*?)href="([^"]*)"/g;

/**
 * Build a corpus from a plain `{ page: [links] }` object.
 * Repeated links collapse into one.
 */
export function corpusFromRecord(record: CorpusRecord): Corpus {
  const corpus = new Map<string, ReadonlySet<string>>();
  for (const [page, links] of Object.entries(record)) {
    corpus.set(page, new Set(links));
  }
  return corpus;
}

export function corpusToRecord(corpus: Corpus): Record<string, string[]> {
  const record: Record<string, string[]> = {};
  for (const [page, links] of corpus) {
    record[page] = [...links];
  }
  return record;
}

/**
 * Reject link targets that are not pages of the corpus.
 * Returns the corpus so calls can be chained.
 */
export function validateCorpus<K>(corpus: Corpus<K>): Corpus<K> {
  for (const [page, links] of corpus) {
    for (const link of links) {
      if (!corpus.has(link)) {
        throw new InvalidNodeError(link, `Page ${String(page)} links to ${String(link)}, which is not in the corpus`);
      }
    }
  }
  return corpus;
}

/** Extract href targets of anchor tags from an HTML document. */
export function extractLinks(html: string): Set<string> {
  const links = new Set<string>();
  for (const match of html.matchAll(LINK_PATTERN)) {
    links.add(match[1]);
  }
  return links;
}

/**
 * Parse a directory of HTML pages into a corpus.
 *
 * Keys are file names. Links to the page itself and links to files that
 * are not pages of the directory are dropped, so the result always
 * passes validateCorpus.
 */
export async function crawl(directory: string): Promise<Corpus> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    throw new CorpusReadError(directory, error);
  }

  const raw = new Map<string, Set<string>>();
  for (const filename of entries.sort()) {
    if (!filename.endsWith('.html')) continue;
    const contents = await fs.readFile(path.join(directory, filename), 'utf-8');
    const links = extractLinks(contents);
    links.delete(filename);
    raw.set(filename, links);
  }

  const corpus = new Map<string, ReadonlySet<string>>();
  for (const [filename, links] of raw) {
    corpus.set(filename, new Set([...links].filter(link => raw.has(link))));
  }
  return corpus;
}
