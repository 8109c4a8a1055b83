import type { RandomSource } from '@core/cpu/types';

// mulberry32: small deterministic generator for reproducible runs and tests
export function seededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6D2B79F5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) & 0xFF;
  };
}

// Replays a fixed byte sequence, cycling when exhausted
export function sequenceRandom(bytes: readonly number[]): RandomSource {
  if (bytes.length === 0) throw new Error('sequenceRandom needs at least one byte');
  let idx = 0;
  return () => {
    const b = bytes[idx % bytes.length] & 0xFF;
    idx++;
    return b;
  };
}
