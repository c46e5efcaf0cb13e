import { createRandom, pickOne, randomInt, uniform } from './random.js';

describe('createRandom', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRandom(42);
    const b = createRandom(42);
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());
    expect(seqA).toEqual(seqB);
    expect(a.seed).toBe(42);
  });

  it('draws from [0, 1)', () => {
    const random = createRandom(7);
    for (let i = 0; i < 1000; i++) {
      const v = random.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('picks its own seed when none is given', () => {
    const random = createRandom();
    expect(Number.isInteger(random.seed)).toBe(true);
  });
});

describe('helpers', () => {
  it('uniform returns min for an empty range', () => {
    expect(uniform(createRandom(1), 3, 3)).toBe(3);
  });

  it('randomInt covers both ends of the range', () => {
    const random = createRandom(3);
    const seen = new Set<number>();
    for (let i = 0; i < 200; i++) seen.add(randomInt(random, 1, 3));
    expect([...seen].sort()).toEqual([1, 2, 3]);
  });

  it('pickOne throws on an empty list', () => {
    expect(() => pickOne(createRandom(1), [])).toThrow(RangeError);
  });
});
