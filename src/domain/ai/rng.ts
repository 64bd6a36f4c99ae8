/** Random source returning values in [0, 1). */
export type Rng = () => number;

export const defaultRng: Rng = () => Math.random();

// Simple xorshift32 for deterministic tests.
export function makeSeededRng(seed: number): Rng {
  let x = (seed | 0) || 123456789;
  return () => {
    // xorshift32
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    // Convert to [0,1)
    return ((x >>> 0) % 0x1_0000_0000) / 0x1_0000_0000;
  };
}

function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.max(0, Math.min(1, x));
}

/** Uniform pick. Returns null for an empty list. */
export function pickRandom<T>(items: readonly T[], rng: Rng): T | null {
  if (items.length === 0) return null;
  const r = clamp01(rng());
  const idx = Math.min(items.length - 1, Math.max(0, Math.floor(r * items.length)));
  return items[idx] ?? null;
}
