import { sample, seededRandom, shuffle } from './sampling';

describe('sampling', () => {
  const items = ['a', 'b', 'c', 'd', 'e', 'f'];

  it('should return distinct items from the input', () => {
    const picked = sample(items, 4, seededRandom(7));

    expect(picked).toHaveLength(4);
    expect(new Set(picked).size).toBe(4);
    picked.forEach((item) => expect(items).toContain(item));
  });

  it('should cap the sample at the pool size', () => {
    expect(sample(items, 50, seededRandom(1)).sort()).toEqual(items);
    expect(sample(items, 0, seededRandom(1))).toEqual([]);
    expect(sample([], 3, seededRandom(1))).toEqual([]);
  });

  it('should leave the input untouched', () => {
    const input = [...items];
    shuffle(input, seededRandom(3));

    expect(input).toEqual(items);
  });

  it('should be reproducible for the same seed', () => {
    expect(shuffle(items, seededRandom(42))).toEqual(shuffle(items, seededRandom(42)));
  });

  it('should keep the order when the source always returns zero', () => {
    expect(shuffle(items, () => 0)).toEqual(items);
  });

  it('should produce values in [0, 1)', () => {
    const random = seededRandom(99);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
