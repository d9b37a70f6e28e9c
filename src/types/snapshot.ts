import type { ProcessorId } from './branded.ts';
import type { Algorithm } from './algorithm.ts';

/**
 * Processor単位のスナップショット
 */
export interface ProcessorSnapshot {
  readonly id: ProcessorId;
  readonly currentLoad: number;
  readonly capacity: number;
  readonly taskCount: number;
  /** 古い順に並んだ負荷履歴（最大100件） */
  readonly history: readonly number[];
  readonly processingSpeed: number;
}

/**
 * シミュレーション全体のスナップショット
 *
 * 表示層へ渡す読み取り専用のコピー。エンジン内部の状態とは参照を共有しない。
 */
export interface SimulationSnapshot {
  /** 実行済みサイクル数（一時停止中のtickは含まない） */
  readonly tick: number;
  readonly algorithm: Algorithm;
  readonly active: boolean;
  readonly paused: boolean;
  readonly processors: readonly ProcessorSnapshot[];
  readonly queueDepth: number;
  readonly completedTasks: number;
  /** 全Processorの平均currentLoad */
  readonly averageLoad: number;
}
