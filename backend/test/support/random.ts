/** Deterministic PRNG (mulberry32) so generated price series are reproducible. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomCosts(random: () => number, length: number, min = 0, max = 150): number[] {
  return Array.from({length}, () => Math.round(min + random() * (max - min)));
}
