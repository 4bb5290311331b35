import { rank, severityWeight } from '../ranking.js';
import type { RankingInput } from '../ranking.js';

const entry = (overrides: Partial<RankingInput> & { id: string }): RankingInput & { id: string } => ({
  coverage: 80,
  duplication: 2,
  newIssues: 1,
  worstHotspot: 'low',
  ...overrides,
});

const ids = (entries: { id: string }[]) => entries.map((e) => e.id);

describe('severityWeight', () => {
  it('orders severities from least to most severe, ignoring case', () => {
    expect(['low', 'MEDIUM', 'High', 'critical'].map(severityWeight)).toEqual([0, 1, 2, 3]);
  });

  it('returns null for unknown or missing severities', () => {
    expect(severityWeight('BLOCKER')).toBeNull();
    expect(severityWeight(null)).toBeNull();
  });
});

describe('rank', () => {
  it('puts higher coverage first', () => {
    const ranked = rank([entry({ id: 'a', coverage: 70 }), entry({ id: 'b', coverage: 90 })]);

    expect(ranked.map((e) => [e.id, e.rank])).toEqual([
      ['b', 1],
      ['a', 2],
    ]);
  });

  it('breaks coverage ties on duplication, then new issues', () => {
    const ranked = rank([
      entry({ id: 'a', duplication: 5 }),
      entry({ id: 'b', duplication: 1, newIssues: 4 }),
      entry({ id: 'c', duplication: 1, newIssues: 0 }),
    ]);

    expect(ids(ranked)).toEqual(['c', 'b', 'a']);
  });

  it('keeps an already better-first order', () => {
    const ranked = rank([entry({ id: 'a', worstHotspot: 'low' }), entry({ id: 'b', worstHotspot: 'critical' })]);

    expect(ids(ranked)).toEqual(['a', 'b']);
  });

  it('prefers the less severe worst hotspot', () => {
    const ranked = rank([entry({ id: 'a', worstHotspot: 'critical' }), entry({ id: 'b', worstHotspot: 'low' })]);

    expect(ids(ranked)).toEqual(['b', 'a']);
  });

  it('keeps input order for full ties', () => {
    const ranked = rank([entry({ id: 'a' }), entry({ id: 'b' }), entry({ id: 'c' })]);

    expect(ranked.map((e) => [e.id, e.rank])).toEqual([
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ]);
  });

  it('sorts missing values after present ones', () => {
    const ranked = rank([
      entry({ id: 'no-coverage', coverage: null }),
      entry({ id: 'nan-coverage', coverage: Number.NaN }),
      entry({ id: 'low-coverage', coverage: 10 }),
      entry({ id: 'no-hotspot', coverage: 10, worstHotspot: null }),
    ]);

    expect(ids(ranked)).toEqual(['low-coverage', 'no-hotspot', 'no-coverage', 'nan-coverage']);
  });

  it('returns an empty ranking for no entries', () => {
    expect(rank([])).toEqual([]);
  });
});
