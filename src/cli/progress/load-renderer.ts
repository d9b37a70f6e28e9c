/**
 * Load Renderer
 *
 * シミュレーションのスナップショットをターミナルに描画するレンダラー。
 * - TTYモード: Processorごとの負荷バーを毎tick上書き更新
 * - 非TTYモード: 数tickごとの簡易ログ形式（CI/パイプ環境向け）
 */

import type { SimulationEmitter } from '../../adapters/events/simulation-emitter.ts';
import type { SimulationEvent } from '../../types/simulation-event.ts';
import { SimulationEventType } from '../../types/simulation-event.ts';
import type { ProcessorSnapshot, SimulationSnapshot } from '../../types/snapshot.ts';
import { formatLoad } from '../../core/report/formatter.ts';
import {
  ANSI,
  isAnsiEnabled,
  colorize,
  bold,
  dim,
  renderLoadBar,
  formatTime,
  type OutputStream,
} from './ansi-utils.ts';

/**
 * レンダラー設定
 */
export interface LoadRendererOptions {
  /** 出力ストリーム（デフォルト: process.stderr） */
  stream?: OutputStream;
  /** 負荷バーの幅（デフォルト: 30） */
  barWidth?: number;
  /** 非TTYモードで何tickごとにログを出すか（デフォルト: 10） */
  logEvery?: number;
}

export interface LoadRenderer {
  start(): void;
  stop(): void;
}

/**
 * スナップショットのサマリー行
 */
export function formatSnapshotSummary(snapshot: SimulationSnapshot): string {
  return (
    `tick ${snapshot.tick} | ${snapshot.algorithm} | queue ${snapshot.queueDepth}` +
    ` | completed ${snapshot.completedTasks} | avg load ${formatLoad(snapshot.averageLoad)}`
  );
}

/**
 * LoadRendererを作成してSimulationEmitterに接続
 */
export function createLoadRenderer(emitter: SimulationEmitter, options: LoadRendererOptions = {}): LoadRenderer {
  const stream = options.stream ?? process.stderr;
  const barWidth = options.barWidth ?? 30;
  const logEvery = options.logEvery ?? 10;
  const useAnsi = isAnsiEnabled(stream);

  let unsubscribe: (() => void) | null = null;
  let lastRenderedLines = 0;

  const write = (text: string): void => {
    stream.write(text);
  };

  const writeLine = (text: string): void => {
    stream.write(text + '\n');
  };

  /**
   * 前回の描画をクリア
   */
  const clearDisplay = (): void => {
    for (let i = 0; i < lastRenderedLines; i++) {
      write(ANSI.CURSOR_UP(1) + ANSI.CLEAR_LINE);
    }
    lastRenderedLines = 0;
  };

  const formatProcessorLine = (processor: ProcessorSnapshot): string => {
    const bar = renderLoadBar(processor.currentLoad, processor.capacity, barWidth, true);
    const label = `P${String(processor.id).padStart(2, '0')}`;
    const load = `${formatLoad(processor.currentLoad).padStart(6)} / ${processor.capacity}`;
    const detail = dim(`x${processor.processingSpeed} ${processor.taskCount} task(s)`, true);
    return `${label} ${bar} ${load} ${detail}`;
  };

  /**
   * 負荷表示を描画（TTYモード）
   */
  const renderSnapshot = (snapshot: SimulationSnapshot): void => {
    clearDisplay();

    const lines = [bold(formatSnapshotSummary(snapshot), true), ...snapshot.processors.map(formatProcessorLine)];
    for (const line of lines) {
      writeLine(line);
    }
    lastRenderedLines = lines.length;
  };

  /**
   * ログ行を出力（負荷表示を一度消してから出す。次のtickで再描画される）
   */
  const logLine = (text: string): void => {
    clearDisplay();
    writeLine(text);
  };

  const handleEventTTY = (event: SimulationEvent): void => {
    switch (event.type) {
      case SimulationEventType.TICK:
        renderSnapshot(event.snapshot);
        break;
      case SimulationEventType.PAUSED:
        logLine('⏸️  Paused');
        break;
      case SimulationEventType.RESUMED:
        logLine('▶️  Resumed');
        break;
      case SimulationEventType.RESET:
        logLine('🔄 Reset');
        break;
      case SimulationEventType.COMMAND_FAILED:
        logLine(colorize(`⚠️  ${event.command} failed: ${event.message}`, ANSI.YELLOW, true));
        break;
      case SimulationEventType.TICK_ERROR:
        logLine(colorize(`❌ Tick failed: ${event.message}`, ANSI.RED, true));
        break;
      default:
        break;
    }
  };

  /**
   * 非TTYモードでイベントを処理（簡易ログ形式）
   */
  const handleEventNonTTY = (event: SimulationEvent): void => {
    const timestamp = formatTime(event.timestamp);

    switch (event.type) {
      case SimulationEventType.SIMULATION_START:
        writeLine(`[${timestamp}] Simulation started: ${event.snapshot.processors.length} processors, ${event.snapshot.algorithm}`);
        break;
      case SimulationEventType.TICK:
        if (event.snapshot.tick % logEvery === 0) {
          writeLine(`[${timestamp}] ${formatSnapshotSummary(event.snapshot)}`);
        }
        break;
      case SimulationEventType.SIMULATION_STOP:
        writeLine(`[${timestamp}] Simulation stopped: ${formatSnapshotSummary(event.snapshot)}`);
        break;
      case SimulationEventType.COMMAND_FAILED:
        writeLine(`[${timestamp}] ${event.command} failed: ${event.message}`);
        break;
      case SimulationEventType.TICK_ERROR:
        writeLine(`[${timestamp}] Tick failed: ${event.message}`);
        break;
      default:
        break;
    }
  };

  return {
    start(): void {
      if (unsubscribe) {
        return; // 既に開始済み
      }

      unsubscribe = emitter.subscribe(useAnsi ? handleEventTTY : handleEventNonTTY);

      if (useAnsi) {
        write(ANSI.HIDE_CURSOR);
      }
    },

    stop(): void {
      if (unsubscribe) {
        unsubscribe();
        unsubscribe = null;
      }

      if (useAnsi) {
        // 最後の描画は残したままカーソルを戻す
        lastRenderedLines = 0;
        write(ANSI.SHOW_CURSOR);
      }
    },
  };
}
