/**
 * Report data collector
 *
 * WHY: ドライバーが発火するイベントを購読し、実行後のレポートに必要な統計を積み上げる
 */

import type { ProcessorId } from '../../types/branded.ts';
import type { Algorithm } from '../../types/algorithm.ts';
import type { SimulationSnapshot } from '../../types/snapshot.ts';
import { SimulationEventType, type SimulationEvent } from '../../types/simulation-event.ts';
import type { SimulationEmitter } from '../../adapters/events/simulation-emitter.ts';
import type { ProcessorStatistics, ReportData, ReportEvent } from './types.ts';

interface ProcessorAccumulator {
  samples: number;
  totalLoad: number;
  peakLoad: number;
  processingSpeed: number;
}

export interface ReportCollectorOptions {
  /** 終了時刻の取得（テストで固定する） */
  now?: () => Date;
}

/**
 * レポートコレクターを作成
 *
 * @returns handle でイベントを受け取り、collect で集計結果を返す
 */
export const createReportCollector = (options: ReportCollectorOptions = {}) => {
  const now = options.now ?? (() => new Date());

  let start: Date | null = null;
  let lastTimestamp: Date | null = null;
  let algorithm: Algorithm | null = null;
  let ticks = 0;
  let totalAverageLoad = 0;
  let peakAverageLoad = 0;
  let maxQueueDepth = 0;
  let lastSnapshot: SimulationSnapshot | null = null;
  const processors = new Map<ProcessorId, ProcessorAccumulator>();
  const events: ReportEvent[] = [];

  const recordTick = (snapshot: SimulationSnapshot): void => {
    ticks++;
    algorithm = snapshot.algorithm;
    totalAverageLoad += snapshot.averageLoad;
    peakAverageLoad = Math.max(peakAverageLoad, snapshot.averageLoad);
    maxQueueDepth = Math.max(maxQueueDepth, snapshot.queueDepth);
    lastSnapshot = snapshot;

    for (const processor of snapshot.processors) {
      const acc = processors.get(processor.id) ?? {
        samples: 0,
        totalLoad: 0,
        peakLoad: 0,
        processingSpeed: processor.processingSpeed,
      };
      acc.samples++;
      acc.totalLoad += processor.currentLoad;
      acc.peakLoad = Math.max(acc.peakLoad, processor.currentLoad);
      acc.processingSpeed = processor.processingSpeed;
      processors.set(processor.id, acc);
    }
  };

  const handle = (event: SimulationEvent): void => {
    start ??= event.timestamp;
    lastTimestamp = event.timestamp;

    switch (event.type) {
      case SimulationEventType.TICK:
        recordTick(event.snapshot);
        break;
      case SimulationEventType.COMMAND_FAILED:
        events.push({
          type: 'COMMAND_FAILED',
          timestamp: event.timestamp,
          details: `${event.command}: ${event.message}`,
        });
        break;
      case SimulationEventType.TICK_ERROR:
        events.push({ type: 'TICK_ERROR', timestamp: event.timestamp, details: event.message });
        break;
      default:
        break;
    }
  };

  /**
   * エミッターを購読する
   *
   * @returns 購読解除関数
   */
  const attach = (emitter: SimulationEmitter): (() => void) => emitter.subscribe(handle);

  const collect = (): ReportData => {
    const end = lastTimestamp ?? now();
    const processorStatistics: ProcessorStatistics[] = [...processors.entries()]
      .sort(([a], [b]) => a - b)
      .map(([processorId, acc]) => ({
        processorId,
        samples: acc.samples,
        meanLoad: acc.totalLoad / acc.samples,
        peakLoad: acc.peakLoad,
        processingSpeed: acc.processingSpeed,
      }));

    return {
      algorithm,
      period: { start: start ?? end, end },
      ticks,
      completedTasks: lastSnapshot?.completedTasks ?? 0,
      meanAverageLoad: ticks === 0 ? 0 : totalAverageLoad / ticks,
      peakAverageLoad,
      maxQueueDepth,
      finalQueueDepth: lastSnapshot?.queueDepth ?? 0,
      processors: processorStatistics,
      events: [...events],
    };
  };

  return { handle, attach, collect };
};

export type ReportCollector = ReturnType<typeof createReportCollector>;
