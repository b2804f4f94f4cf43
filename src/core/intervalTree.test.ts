import { describe, it, expect } from 'vitest';
import { IntervalTree } from './intervalTree';

function tree(entries: Array<[string, number, number]>): IntervalTree<string> {
  const t = new IntervalTree<string>();
  for (const [id, begin, end] of entries) t.insert(id, begin, end, id);
  return t;
}

// deterministic pseudo random numbers (mulberry32)
function rng(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('IntervalTree', () => {
  it('finds overlapping intervals in begin order', () => {
    const t = tree([
      ['c', 30, 40],
      ['a', 0, 10],
      ['b', 5, 20],
      ['d', 50, 60],
    ]);
    expect(t.queryRange(8, 35)).toEqual(['a', 'b', 'c']);
  });

  it('treats intervals as half-open', () => {
    const t = tree([
      ['a', 0, 10],
      ['b', 10, 20],
    ]);
    expect(t.queryRange(10, 15)).toEqual(['b']);
    expect(t.queryRange(0, 10)).toEqual(['a']);
    expect(t.queryPoint(10)).toEqual(['b']);
  });

  it('matches zero-length intervals at their instant only', () => {
    const t = tree([
      ['reminder', 10, 10],
      ['block', 0, 10],
    ]);
    expect(t.queryRange(10, 11)).toEqual(['reminder']);
    expect(t.queryRange(5, 10)).toEqual(['block']);
    expect(t.queryPoint(10)).toEqual(['reminder']);
    expect(t.queryPoint(9)).toEqual(['block']);
  });

  it('rejects inverted intervals', () => {
    const t = new IntervalTree<string>();
    expect(() => t.insert('x', 10, 5, 'x')).toThrow(RangeError);
  });

  it('replaces an entry inserted twice under the same key', () => {
    const t = tree([['a', 0, 10]]);
    t.insert('a', 0, 30, 'a2');
    expect(t.size).toBe(1);
    expect(t.queryRange(20, 25)).toEqual(['a2']);
  });

  it('removes by id and begin', () => {
    const t = tree([
      ['a', 0, 10],
      ['b', 0, 10],
      ['c', 5, 15],
    ]);
    expect(t.remove('b', 0)).toBe(true);
    expect(t.remove('b', 0)).toBe(false);
    expect(t.remove('c', 6)).toBe(false);
    expect(t.size).toBe(2);
    expect(t.queryRange(0, 20)).toEqual(['a', 'c']);
  });

  it('lists begins in a half-open window', () => {
    const t = tree([
      ['a', 10, 20],
      ['b', 20, 30],
      ['c', 30, 40],
    ]);
    expect(t.beginsBetween(10, 30)).toEqual(['b', 'c']);
    expect([...t.beginsAfter(15)]).toEqual(['b', 'c']);
    expect([...t.beginsAfter(30)]).toEqual([]);
  });

  it('stays balanced and agrees with a linear scan', () => {
    const random = rng(42);
    const t = new IntervalTree<string>();
    const all: Array<{ id: string; begin: number; end: number }> = [];

    for (let i = 0; i < 500; i++) {
      const begin = Math.floor(random() * 10_000);
      const end = begin + Math.floor(random() * 300);
      const id = `e${i}`;
      t.insert(id, begin, end, id);
      all.push({ id, begin, end });
    }
    for (const entry of all.splice(0, 200)) {
      expect(t.remove(entry.id, entry.begin)).toBe(true);
    }

    expect(t.size).toBe(300);
    // AVL height bound: 1.44 log2(n + 2)
    expect(t.height).toBeLessThanOrEqual(Math.ceil(1.45 * Math.log2(302)));

    for (let q = 0; q < 50; q++) {
      const from = Math.floor(random() * 10_000);
      const to = from + 1 + Math.floor(random() * 500);
      const expected = all
        .filter(({ begin, end }) =>
          begin === end ? from <= begin && begin < to : begin < to && end > from
        )
        .map(({ id }) => id)
        .sort();
      expect([...t.queryRange(from, to)].sort()).toEqual(expected);
    }
  });
});
