/**
 * SimulationEmitter Interface
 *
 * シミュレーションイベントを発火・購読するためのインターフェース定義。
 *
 * WHY: 表示層はシミュレーション内部を直接触らず、このEmitter経由で
 * スナップショットを受け取る。UI技術への依存をコアに持ち込まないための境界。
 */

import type { SimulationEvent, SimulationEventHandler } from '../../types/simulation-event.ts';
import type { SimulationSnapshot } from '../../types/snapshot.ts';

export interface SimulationEmitter {
  /**
   * イベントを発火
   *
   * @param event 発火するイベント
   */
  emit(event: SimulationEvent): void;

  /**
   * 最後に発火されたスナップショットを取得
   *
   * @returns まだ一度も発火していなければnull
   */
  getLastSnapshot(): SimulationSnapshot | null;

  /**
   * イベントハンドラを購読
   *
   * @param handler イベントハンドラ
   * @returns 購読解除関数
   */
  subscribe(handler: SimulationEventHandler): () => void;

  /**
   * 保持しているスナップショットを破棄
   */
  reset(): void;
}
