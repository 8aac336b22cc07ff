import { distributionToRecord, formatRanks, l1Distance, maxAbsDelta, totalProbability } from '../src/distribution.js';

describe('Distribution helpers', () => {
  const a = new Map([['x', 0.5], ['y', 0.25], ['z', 0.25]]);
  const b = new Map([['x', 0.25], ['y', 0.5], ['w', 0.25]]);

  test('totalProbability sums the values', () => {
    expect(totalProbability(a)).toBe(1);
    expect(totalProbability(new Map())).toBe(0);
  });

  test('l1Distance covers keys missing from either side', () => {
    // |0.5-0.25| + |0.25-0.5| + |0.25-0| + |0-0.25|
    expect(l1Distance(a, b)).toBe(1);
    expect(l1Distance(b, a)).toBe(1);
    expect(l1Distance(a, a)).toBe(0);
  });

  test('maxAbsDelta takes the largest difference', () => {
    expect(maxAbsDelta(a, new Map([['x', 0.4], ['y', 0.25], ['z', 0.35]]))).toBeCloseTo(0.1, 12);
  });

  test('distributionToRecord keeps every page', () => {
    expect(distributionToRecord(a)).toEqual({ x: 0.5, y: 0.25, z: 0.25 });
  });

  test('formatRanks prints sorted pages with four decimals', () => {
    const ranks = new Map([['2.html', 0.4282], ['1.html', 0.21996], ['3.html', 0.35186]]);
    expect(formatRanks('PageRank Results from Iteration', ranks)).toEqual([
      'PageRank Results from Iteration',
      '  1.html: 0.2200',
      '  2.html: 0.4282',
      '  3.html: 0.3519',
    ]);
  });
});
