import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createRNG, gaussian, clamp } from '../../../../src/core/generator/random.ts';

describe('createRNG', () => {
  it('should return the same sequence for the same seed', () => {
    const a = createRNG(42);
    const b = createRNG(42);

    const first = Array.from({ length: 20 }, () => a());
    const second = Array.from({ length: 20 }, () => b());

    assert.deepStrictEqual(first, second);
  });

  it('should return different sequences for different seeds', () => {
    const a = createRNG(1);
    const b = createRNG(2);

    const first = Array.from({ length: 5 }, () => a());
    const second = Array.from({ length: 5 }, () => b());

    assert.notDeepStrictEqual(first, second);
  });

  it('should return values in [0, 1)', () => {
    const rng = createRNG(7);
    for (let i = 0; i < 1000; i++) {
      const value = rng();
      assert.ok(value >= 0 && value < 1, `out of range: ${value}`);
    }
  });
});

describe('gaussian', () => {
  it('should return the mean when the standard deviation is 0', () => {
    const rng = createRNG(3);

    for (let i = 0; i < 10; i++) {
      assert.strictEqual(gaussian(rng, 12, 0), 12);
    }
  });

  it('should center samples around the mean', () => {
    const rng = createRNG(11);
    const samples = Array.from({ length: 5000 }, () => gaussian(rng, 50, 5));
    const mean = samples.reduce((sum, v) => sum + v, 0) / samples.length;

    assert.ok(Math.abs(mean - 50) < 0.5, `mean was ${mean}`);
  });

  it('should stay finite when the generator returns 0', () => {
    assert.strictEqual(gaussian(() => 0, 5, 2), 5);
  });
});

describe('clamp', () => {
  it('should bound values to the range', () => {
    assert.strictEqual(clamp(-3, 5, 100), 5);
    assert.strictEqual(clamp(150, 5, 100), 100);
    assert.strictEqual(clamp(42, 5, 100), 42);
  });
});
