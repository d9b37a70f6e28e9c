import type { TaskSpec } from '../../types/task.ts';
import type { GeneratorConfig } from '../../types/config.ts';
import type { RNG } from './random.ts';
import { gaussian, clamp } from './random.ts';

/** 生成タスクの負荷の下限・上限 */
export const GENERATED_MIN_LOAD = 5;
export const GENERATED_MAX_LOAD = 100;

/** 生成タスクの所要時間の下限 */
export const GENERATED_MIN_DURATION = 1;

/**
 * タスク生成器: 1tickごとに呼ばれ、0件または1件のタスク仕様を返す
 */
export type TaskGenerator = () => TaskSpec[];

export interface TaskGeneratorOptions {
  settings: GeneratorConfig;
  /** tick間隔（ミリ秒）。生成確率を tasks/sec からtick単位に換算するのに使う */
  tickIntervalMs: number;
  rng: RNG;
}

/**
 * 1tickあたりの生成確率
 *
 * rate[tasks/sec] × tick長[sec]。100ms tickなら rate * 0.1
 */
export const spawnProbability = (rate: number, tickIntervalMs: number): number =>
  rate * (tickIntervalMs / 1000);

/**
 * 確率的にタスクを生成する関数を作成
 *
 * 負荷は正規分布から取り[5, 100]に丸め、所要時間は正規分布から取り1以上に丸める
 */
export function createTaskGenerator(options: TaskGeneratorOptions): TaskGenerator {
  const { settings, tickIntervalMs, rng } = options;

  return () => {
    const probability = spawnProbability(settings.rate, tickIntervalMs);
    if (rng() >= probability) {
      return [];
    }

    const load = clamp(
      gaussian(rng, settings.meanLoad, settings.loadStdDev),
      GENERATED_MIN_LOAD,
      GENERATED_MAX_LOAD,
    );
    const executionTime = Math.max(
      GENERATED_MIN_DURATION,
      gaussian(rng, settings.meanDuration, settings.durationStdDev),
    );

    return [{ load, executionTime }];
  };
}
