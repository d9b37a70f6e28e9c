import { ALGORITHM_NAMES, type Algorithm } from '../../types/algorithm.ts';
import type { Config } from '../../types/config.ts';
import { createSimulationEmitter } from '../../adapters/events/simulation-emitter-impl.ts';
import { createReportCollector } from '../report/collector.ts';
import type { ReportData } from '../report/types.ts';
import { createSimulationDriverFromConfig } from './simulation-driver.ts';

/**
 * アルゴリズム別の比較結果
 */
export interface AlgorithmComparison {
  algorithm: Algorithm;
  report: ReportData;
}

/**
 * 指定した設定・tick数で1回分のシミュレーションをタイマーなしで実行する
 *
 * 同じ設定（シード）なら同じタスク列が生成される
 */
export function runHeadless(config: Config, ticks: number): ReportData {
  const emitter = createSimulationEmitter();
  const collector = createReportCollector();
  const detach = collector.attach(emitter);
  const driver = createSimulationDriverFromConfig(config, { emitter });

  for (let i = 0; i < ticks; i++) {
    driver.step();
  }

  detach();
  return collector.collect();
}

/**
 * 全アルゴリズムを同一のシードで実行して比較する
 *
 * @param config ベース設定（algorithmは上書きされる）
 * @param ticks 各アルゴリズムの実行tick数
 */
export function compareAlgorithms(config: Config, ticks: number): AlgorithmComparison[] {
  return ALGORITHM_NAMES.map((algorithm) => ({
    algorithm,
    report: runHeadless({ ...config, algorithm }, ticks),
  }));
}
