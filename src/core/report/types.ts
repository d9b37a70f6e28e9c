import type { ProcessorId } from '../../types/branded.ts';
import type { Algorithm } from '../../types/algorithm.ts';

/**
 * レポートイベント種別
 *
 * - COMMAND_FAILED: キュー済みコマンドの適用失敗
 * - TICK_ERROR: tick処理中の例外
 */
export type ReportEventType = 'COMMAND_FAILED' | 'TICK_ERROR';

/**
 * レポートイベント
 *
 * 実行中に発生した異常を記録
 */
export interface ReportEvent {
  type: ReportEventType;
  timestamp: Date;
  details: string;
}

/**
 * 実行期間
 */
export interface ReportPeriod {
  start: Date;
  end: Date;
}

/**
 * Processor別の負荷統計
 *
 * Processor数変更で途中から現れた・消えたProcessorは観測できたtickだけで集計する
 */
export interface ProcessorStatistics {
  processorId: ProcessorId;
  /** 観測tick数 */
  samples: number;
  meanLoad: number;
  peakLoad: number;
  /** 最後に観測した処理速度 */
  processingSpeed: number;
}

/**
 * レポートデータ
 */
export interface ReportData {
  /** 最後に観測したアルゴリズム（tickを1度も観測していなければnull） */
  algorithm: Algorithm | null;
  period: ReportPeriod;
  /** 観測したTICKイベント数 */
  ticks: number;
  completedTasks: number;
  /** 全体平均負荷のtick平均 */
  meanAverageLoad: number;
  /** 全体平均負荷の最大値 */
  peakAverageLoad: number;
  maxQueueDepth: number;
  finalQueueDepth: number;
  processors: ProcessorStatistics[];
  events: ReportEvent[];
}
