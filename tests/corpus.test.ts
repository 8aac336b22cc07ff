import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { corpusFromRecord, corpusToRecord, crawl, extractLinks, validateCorpus } from '../src/corpus.js';
import { CorpusReadError, InvalidNodeError } from '../src/errors.js';

function page(title: string, ...links: string[]): string {
  const anchors = links.map(link => `<li><a href="${link}">${link}</a></li>`).join('\n');
  return `<!DOCTYPE html>\n<html>\n<head><title>${title}</title></head>\n<body>\n<ul>\n${anchors}\n</ul>\n</body>\n</html>\n`;
}

describe('Corpus', () => {
  describe('corpusFromRecord', () => {
    test('builds link sets and collapses repeated links', () => {
      const corpus = corpusFromRecord({ A: ['B', 'B', 'C'], B: [], C: ['A'] });
      expect([...(corpus.get('A') ?? [])]).toEqual(['B', 'C']);
      expect(corpus.get('B')?.size).toBe(0);
      expect(corpus.size).toBe(3);
    });

    test('round-trips through a plain record', () => {
      const record = { A: ['B'], B: ['A', 'C'], C: [] };
      expect(corpusToRecord(corpusFromRecord(record))).toEqual(record);
    });
  });

  describe('validateCorpus', () => {
    test('accepts links between pages of the corpus', () => {
      const corpus = corpusFromRecord({ A: ['B'], B: ['A'], C: [] });
      expect(validateCorpus(corpus)).toBe(corpus);
    });

    test('rejects a link to a page outside the corpus', () => {
      const corpus = corpusFromRecord({ A: ['B', 'nowhere'], B: [] });
      expect(() => validateCorpus(corpus)).toThrow(InvalidNodeError);
      expect(() => validateCorpus(corpus)).toThrow('Page A links to nowhere, which is not in the corpus');
    });

    test('error carries the offending page', () => {
      try {
        validateCorpus(corpusFromRecord({ A: ['X'] }));
        throw new Error('expected validateCorpus to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidNodeError);
        if (error instanceof InvalidNodeError) {
          expect(error.node).toBe('X');
          expect(error.code).toBe('INVALID_NODE');
        }
      }
    });
  });

  describe('extractLinks', () => {
    test('finds href of anchor tags with other attributes before it', () => {
      const html = '<a href="1.html">one</a> <a class="nav" id="x" href="2.html">two</a> <link href="style.css">';
      expect([...extractLinks(html)]).toEqual(['1.html', '2.html']);
    });

    test('ignores single-quoted and missing hrefs', () => {
      expect(extractLinks("<a href='1.html'>one</a><a name=\"top\">top</a>").size).toBe(0);
    });
  });

  describe('crawl', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'corpus-rank-crawl-'));
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    test('maps each html page to the pages it links to', async () => {
      await fs.writeFile(path.join(testDir, '1.html'), page('One', '2.html'));
      await fs.writeFile(path.join(testDir, '2.html'), page('Two', '1.html', '3.html'));
      await fs.writeFile(path.join(testDir, '3.html'), page('Three', '2.html', '2.html'));

      const corpus = await crawl(testDir);

      expect(corpusToRecord(corpus)).toEqual({
        '1.html': ['2.html'],
        '2.html': ['1.html', '3.html'],
        '3.html': ['2.html'],
      });
    });

    test('drops self links and links outside the corpus', async () => {
      await fs.writeFile(path.join(testDir, 'a.html'), page('A', 'a.html', 'b.html', 'https://example.com/', 'missing.html'));
      await fs.writeFile(path.join(testDir, 'b.html'), page('B'));

      const corpus = await crawl(testDir);

      expect(corpusToRecord(corpus)).toEqual({ 'a.html': ['b.html'], 'b.html': [] });
      expect(validateCorpus(corpus)).toBe(corpus);
    });

    test('skips files that are not html pages', async () => {
      await fs.writeFile(path.join(testDir, 'index.html'), page('Index', 'notes.txt'));
      await fs.writeFile(path.join(testDir, 'notes.txt'), 'plain text');

      const corpus = await crawl(testDir);

      expect([...corpus.keys()]).toEqual(['index.html']);
      expect(corpus.get('index.html')?.size).toBe(0);
    });

    test('empty directory gives an empty corpus', async () => {
      const corpus = await crawl(testDir);
      expect(corpus.size).toBe(0);
    });

    test('fails on a directory that does not exist', async () => {
      await expect(crawl(path.join(testDir, 'absent'))).rejects.toThrow(CorpusReadError);
    });
  });
});
