/**
 * Distribution Strategies - 純粋関数による割り当て先選択
 *
 * 各戦略は (task, processors) → 割り当て先インデックス の純粋関数。
 * Processorが1台以上あれば必ずどれかを返す（空き容量が無くても割り当てる）。
 * Processorが0台の場合のみnullを返し、タスクは破棄される。
 */

import type { Task } from '../../types/task.ts';
import { Algorithm } from '../../types/algorithm.ts';
import type { Processor } from './processor.ts';
import { RECENT_HISTORY_WINDOW } from './processor.ts';

/**
 * 割り当て先を選ぶ関数の型
 */
export type DistributionStrategy = (task: Task, processors: readonly Processor[]) => number | null;

/**
 * スコア最小のインデックスを返す（同点は先に現れた方）
 *
 * WHY: NaN（速度0かつ負荷0）は比較に勝てないため、有限のスコアがあればそちらを優先する
 */
const indexOfMinimum = (scores: readonly number[]): number | null => {
  let best: number | null = null;
  let bestScore = Number.NaN;

  for (const [index, score] of scores.entries()) {
    if (best === null || (Number.isNaN(bestScore) && !Number.isNaN(score)) || score < bestScore) {
      best = index;
      bestScore = score;
    }
  }

  return best;
};

/**
 * round_robin: 先頭から順に空き容量が足りる最初のProcessor
 *
 * 見つからなければ先頭（index 0）に割り当てる
 */
export const roundRobin: DistributionStrategy = (task, processors) => {
  if (processors.length === 0) {
    return null;
  }
  const index = processors.findIndex((p) => p.availableCapacity() >= task.load);
  return index === -1 ? 0 : index;
};

/**
 * least_loaded: currentLoadが最小のProcessor
 *
 * 空き容量が足りなくても同じProcessorに割り当てる
 */
export const leastLoaded: DistributionStrategy = (_task, processors) =>
  indexOfMinimum(processors.map((p) => p.currentLoad));

/**
 * weighted: currentLoad / processingSpeed が最小のProcessor
 */
export const weighted: DistributionStrategy = (_task, processors) =>
  indexOfMinimum(processors.map((p) => p.currentLoad / p.processingSpeed));

/**
 * adaptive用のスコアを計算（小さいほど良い）
 *
 * (負荷率) × (1 / 速度) × (1 + 直近平均負荷 / 200)
 */
export const adaptiveScore = (processor: Processor): number => {
  const recentLoad = processor.recentAverageLoad(RECENT_HISTORY_WINDOW);
  return (
    (processor.currentLoad / processor.capacity) *
    (1 / processor.processingSpeed) *
    (1 + recentLoad / 200)
  );
};

/**
 * adaptive: 負荷率・速度・直近の負荷履歴を組み合わせたスコアが最小のProcessor
 */
export const adaptive: DistributionStrategy = (_task, processors) =>
  indexOfMinimum(processors.map(adaptiveScore));

/**
 * アルゴリズム名 → 戦略関数 のテーブル
 */
export const STRATEGIES: Readonly<Record<Algorithm, DistributionStrategy>> = {
  [Algorithm.ROUND_ROBIN]: roundRobin,
  [Algorithm.LEAST_LOADED]: leastLoaded,
  [Algorithm.WEIGHTED]: weighted,
  [Algorithm.ADAPTIVE]: adaptive,
};

/**
 * 選択したアルゴリズムでタスクを割り当てる
 *
 * @returns 割り当て先のインデックス。Processorが無い場合はnull（タスクは破棄）
 */
export const distribute = (
  algorithm: Algorithm,
  task: Task,
  processors: readonly Processor[],
): number | null => {
  const index = STRATEGIES[algorithm](task, processors);
  if (index === null) {
    return null;
  }
  const target = processors[index];
  if (target === undefined) {
    return null;
  }
  target.addTask(task);
  return index;
};
