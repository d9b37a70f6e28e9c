/**
 * SimulationEmitter Implementation
 *
 * イベント発火・最新スナップショット保持・購読機能の実装。
 * tick自体が固定間隔なので、progress表示のようなスロットリングは行わない。
 */

import type { SimulationEmitter } from './simulation-emitter.ts';
import type { SimulationEvent, SimulationEventHandler } from '../../types/simulation-event.ts';
import type { SimulationSnapshot } from '../../types/snapshot.ts';

/**
 * SimulationEmitter ファクトリー関数
 *
 * @returns SimulationEmitter インスタンス
 */
export function createSimulationEmitter(): SimulationEmitter {
  const handlers: Set<SimulationEventHandler> = new Set();
  let lastSnapshot: SimulationSnapshot | null = null;

  /**
   * スナップショットを持つイベントなら保持する
   */
  const rememberSnapshot = (event: SimulationEvent): void => {
    if ('snapshot' in event) {
      lastSnapshot = event.snapshot;
    }
  };

  /**
   * ハンドラにイベントを配信
   */
  const dispatchToHandlers = (event: SimulationEvent): void => {
    for (const handler of handlers) {
      try {
        handler(event);
      } catch (err) {
        // ハンドラのエラーはログに残すだけ（表示側の不具合でシミュレーションを止めない）
        console.error('[SimulationEmitter] Handler error:', err);
      }
    }
  };

  return {
    emit(event: SimulationEvent): void {
      rememberSnapshot(event);
      dispatchToHandlers(event);
    },

    getLastSnapshot(): SimulationSnapshot | null {
      return lastSnapshot;
    },

    subscribe(handler: SimulationEventHandler): () => void {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },

    reset(): void {
      lastSnapshot = null;
    },
  };
}
