import { describe, it, expect } from 'vitest';
import { seededRandom, sequenceRandom } from '@utils/random';

describe('random sources', () => {
  it('seeded generator repeats for the same seed and stays within a byte', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    const xs = Array.from({ length: 32 }, () => a());
    const ys = Array.from({ length: 32 }, () => b());
    expect(xs).toEqual(ys);
    expect(xs.every((v) => Number.isInteger(v) && v >= 0 && v <= 255)).toBe(true);
  });

  it('sequence source cycles through its bytes', () => {
    const r = sequenceRandom([1, 0x1FF]);
    expect([r(), r(), r()]).toEqual([1, 0xFF, 1]);
    expect(() => sequenceRandom([])).toThrow();
  });
});
