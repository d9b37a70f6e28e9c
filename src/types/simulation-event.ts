/**
 * Simulation Event Types
 *
 * シミュレーションループが発火するイベントの型定義。
 * 表示層やレポート収集はこのイベントを購読してスナップショットを受け取る。
 */

import type { Task } from './task.ts';
import type { SimulationSnapshot } from './snapshot.ts';

/**
 * シミュレーションイベント種別
 */
export const SimulationEventType = {
  /** ループ開始 */
  SIMULATION_START: 'SIMULATION_START',
  /** ループ停止 */
  SIMULATION_STOP: 'SIMULATION_STOP',
  /** 一時停止 */
  PAUSED: 'PAUSED',
  /** 再開 */
  RESUMED: 'RESUMED',
  /** LoadBalancerを作り直した */
  RESET: 'RESET',
  /** 1サイクル実行完了 */
  TICK: 'TICK',
  /** このサイクルでタスクが完了した */
  TASKS_COMPLETED: 'TASKS_COMPLETED',
  /** キュー済みコマンドの適用に失敗 */
  COMMAND_FAILED: 'COMMAND_FAILED',
  /** tick処理中の予期しない例外 */
  TICK_ERROR: 'TICK_ERROR',
} as const;

export type SimulationEventType = (typeof SimulationEventType)[keyof typeof SimulationEventType];

/**
 * イベント基底インターフェース
 */
export interface BaseSimulationEvent {
  type: SimulationEventType;
  /** 発生時刻 */
  timestamp: Date;
}

export interface SimulationStartEvent extends BaseSimulationEvent {
  type: typeof SimulationEventType.SIMULATION_START;
  snapshot: SimulationSnapshot;
}

export interface SimulationStopEvent extends BaseSimulationEvent {
  type: typeof SimulationEventType.SIMULATION_STOP;
  snapshot: SimulationSnapshot;
}

export interface PausedEvent extends BaseSimulationEvent {
  type: typeof SimulationEventType.PAUSED;
}

export interface ResumedEvent extends BaseSimulationEvent {
  type: typeof SimulationEventType.RESUMED;
}

export interface ResetEvent extends BaseSimulationEvent {
  type: typeof SimulationEventType.RESET;
  snapshot: SimulationSnapshot;
}

export interface TickEvent extends BaseSimulationEvent {
  type: typeof SimulationEventType.TICK;
  snapshot: SimulationSnapshot;
}

export interface TasksCompletedEvent extends BaseSimulationEvent {
  type: typeof SimulationEventType.TASKS_COMPLETED;
  tick: number;
  tasks: readonly Task[];
}

export interface CommandFailedEvent extends BaseSimulationEvent {
  type: typeof SimulationEventType.COMMAND_FAILED;
  /** 失敗したコマンド種別 */
  command: string;
  message: string;
}

export interface TickErrorEvent extends BaseSimulationEvent {
  type: typeof SimulationEventType.TICK_ERROR;
  message: string;
}

export type SimulationEvent =
  | SimulationStartEvent
  | SimulationStopEvent
  | PausedEvent
  | ResumedEvent
  | ResetEvent
  | TickEvent
  | TasksCompletedEvent
  | CommandFailedEvent
  | TickErrorEvent;

/**
 * イベントハンドラ型
 */
export type SimulationEventHandler = (event: SimulationEvent) => void;
