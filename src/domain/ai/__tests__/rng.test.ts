import { makeSeededRng, pickRandom } from '../rng';

describe('rng', () => {
  it('seeded sources repeat the same sequence in [0, 1)', () => {
    const a = makeSeededRng(7);
    const b = makeSeededRng(7);
    for (let i = 0; i < 50; i++) {
      const x = a();
      expect(x).toBe(b());
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it('different seeds diverge', () => {
    const a = makeSeededRng(1);
    const b = makeSeededRng(2);
    expect(a()).not.toBe(b());
  });

  it('pickRandom maps the draw onto the list', () => {
    expect(pickRandom(['x', 'y', 'z'], () => 0)).toBe('x');
    expect(pickRandom(['x', 'y', 'z'], () => 0.34)).toBe('y');
    expect(pickRandom(['x', 'y', 'z'], () => 0.999)).toBe('z');
    expect(pickRandom([], () => 0.5)).toBeNull();
  });

  it('pickRandom treats a non-finite draw as 0', () => {
    expect(pickRandom(['x', 'y'], () => Number.NaN)).toBe('x');
    expect(pickRandom(['x', 'y'], () => Number.POSITIVE_INFINITY)).toBe('x');
  });
});
