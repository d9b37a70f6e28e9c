/**
 * 乱数生成器
 *
 * シードを固定すれば同じ系列を返すので、シミュレーションを再現できる
 */

/** [0, 1) の一様乱数を返す関数 */
export type RNG = () => number;

/**
 * mulberry32によるシード付き乱数生成器を作成
 */
export function createRNG(seed: number): RNG {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Box-Muller法による正規乱数
 */
export function gaussian(rng: RNG, mean: number, stdDev: number): number {
  // log(0)を避けるため u1 は (0, 1] に寄せる
  const u1 = 1 - rng();
  const u2 = rng();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
