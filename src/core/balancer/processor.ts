import type { ProcessorId } from '../../types/branded.ts';
import type { Task } from '../../types/task.ts';
import { isTaskComplete } from '../../types/task.ts';
import type { ProcessorSnapshot } from '../../types/snapshot.ts';
import { RingBuffer } from './ring-buffer.ts';

/** 保持する負荷履歴の件数 */
export const HISTORY_LIMIT = 100;

/** adaptiveアルゴリズムが参照する直近履歴の件数 */
export const RECENT_HISTORY_WINDOW = 10;

export const DEFAULT_CAPACITY = 100;
export const DEFAULT_PROCESSING_SPEED = 1.0;

/**
 * Processorのオプション
 */
export interface ProcessorOptions {
  /** 名目上の最大負荷（デフォルト: 100） */
  capacity?: number;
  /** 処理速度倍率（デフォルト: 1.0） */
  processingSpeed?: number;
}

/**
 * シミュレーション上の処理ユニット
 *
 * currentLoadは常に保持タスクのload合計と一致する。
 * addTask/removeTask以外でcurrentLoadを書き換えてはならない。
 */
export class Processor {
  readonly id: ProcessorId;
  readonly capacity: number;
  processingSpeed: number;
  private load = 0;
  private readonly owned: Task[] = [];
  private readonly history = new RingBuffer<number>(HISTORY_LIMIT);

  constructor(id: ProcessorId, options: ProcessorOptions = {}) {
    this.id = id;
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.processingSpeed = options.processingSpeed ?? DEFAULT_PROCESSING_SPEED;
  }

  get currentLoad(): number {
    return this.load;
  }

  get tasks(): readonly Task[] {
    return this.owned;
  }

  get taskCount(): number {
    return this.owned.length;
  }

  /**
   * タスクを割り当てる
   *
   * 容量チェックは行わない（超過割り当ての判断は分散戦略の責務）
   */
  addTask(task: Task): void {
    this.owned.push(task);
    this.load += task.load;
  }

  /**
   * タスクを取り除く
   *
   * @returns 保持していた場合true。保持していなければ何もしない
   */
  removeTask(task: Task): boolean {
    const index = this.owned.findIndex((t) => t.id === task.id);
    if (index === -1) {
      return false;
    }
    this.owned.splice(index, 1);
    this.load -= task.load;
    return true;
  }

  /**
   * 1tick分処理を進める
   *
   * 各タスクの残り時間をprocessingSpeedだけ減らし、完了したタスクを取り除く。
   * タスクの有無に関わらず履歴は必ず1件追加する。
   *
   * @returns このtickで完了したタスク
   */
  processTick(): Task[] {
    const completed: Task[] = [];
    for (const task of this.owned) {
      task.remainingTime -= this.processingSpeed;
      if (isTaskComplete(task)) {
        completed.push(task);
      }
    }

    for (const task of completed) {
      this.removeTask(task);
    }

    this.history.push(this.load);
    return completed;
  }

  availableCapacity(): number {
    return this.capacity - this.load;
  }

  /**
   * 直近window件の履歴の平均（履歴が空なら0）
   */
  recentAverageLoad(window: number = RECENT_HISTORY_WINDOW): number {
    const recent = this.history.last(window);
    if (recent.length === 0) {
      return 0;
    }
    return recent.reduce((sum, value) => sum + value, 0) / recent.length;
  }

  /**
   * 全タスクを取り出して返す（Processor削除時の再キュー用）
   */
  drainTasks(): Task[] {
    const drained = [...this.owned];
    for (const task of drained) {
      this.removeTask(task);
    }
    return drained;
  }

  loadHistory(): number[] {
    return this.history.toArray();
  }

  toSnapshot(): ProcessorSnapshot {
    return {
      id: this.id,
      currentLoad: this.load,
      capacity: this.capacity,
      taskCount: this.owned.length,
      history: this.history.toArray(),
      processingSpeed: this.processingSpeed,
    };
  }
}
