import { createOk, createErr, isErr, type Result } from 'option-t/plain_result';
import type { ProcessorId, TaskId } from '../../types/branded.ts';
import { processorId, taskId } from '../../types/branded.ts';
import type { Task } from '../../types/task.ts';
import { createTask, validateTaskSpec } from '../../types/task.ts';
import { Algorithm, parseAlgorithm } from '../../types/algorithm.ts';
import type { SimulationSnapshot } from '../../types/snapshot.ts';
import type {
  InvalidAlgorithmError,
  InvalidProcessorCountError,
  InvalidProcessorSpeedError,
  InvalidTaskParametersError,
  ProcessorNotFoundError,
} from '../../types/errors.ts';
import { invalidProcessorCount, invalidProcessorSpeed, processorNotFound } from '../../types/errors.ts';
import { Processor, DEFAULT_CAPACITY, DEFAULT_PROCESSING_SPEED } from './processor.ts';
import { distribute } from './strategies.ts';

/**
 * LoadBalancerのオプション
 */
export interface LoadBalancerOptions {
  /** Processor数（デフォルト: 4） */
  numProcessors?: number;
  /** 初期アルゴリズム（デフォルト: round_robin） */
  algorithm?: Algorithm;
  /** 新規Processorのcapacity（デフォルト: 100） */
  capacity?: number;
  /** 新規Processorの処理速度（デフォルト: 1.0） */
  defaultSpeed?: number;
}

/**
 * 1タスク分の割り当て結果
 */
export interface Assignment {
  taskId: TaskId;
  /** 割り当て先。Processorが無く破棄された場合はnull */
  processorId: ProcessorId | null;
}

/**
 * Processor数変更の結果
 */
export interface ProcessorCountChange {
  previousCount: number;
  currentCount: number;
  /** 削除されたProcessorからキューに戻されたタスク数 */
  requeuedTasks: number;
}

/**
 * 負荷分散器
 *
 * Processor列と待ちキューを所有し、分散とtick処理を調停する
 */
export class LoadBalancer {
  private processorList: Processor[] = [];
  private readonly taskQueue: Task[] = [];
  private selectedAlgorithm: Algorithm;
  private completed = 0;
  private nextTaskId = 0;
  private cycles = 0;
  private readonly capacity: number;
  private readonly defaultSpeed: number;

  constructor(options: LoadBalancerOptions = {}) {
    this.selectedAlgorithm = options.algorithm ?? Algorithm.ROUND_ROBIN;
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.defaultSpeed = options.defaultSpeed ?? DEFAULT_PROCESSING_SPEED;

    const count = options.numProcessors ?? 4;
    for (let i = 0; i < count; i++) {
      this.processorList.push(this.createProcessor(i));
    }
  }

  get processors(): readonly Processor[] {
    return this.processorList;
  }

  get algorithm(): Algorithm {
    return this.selectedAlgorithm;
  }

  get completedTasks(): number {
    return this.completed;
  }

  get queueDepth(): number {
    return this.taskQueue.length;
  }

  get tick(): number {
    return this.cycles;
  }

  get processorCapacity(): number {
    return this.capacity;
  }

  get processorDefaultSpeed(): number {
    return this.defaultSpeed;
  }

  /**
   * 待ちキュー内のタスク（先頭が次に割り当てられる）
   */
  get pendingTasks(): readonly Task[] {
    return this.taskQueue;
  }

  /**
   * 新しいタスクを生成してキューに追加
   */
  addTask(load: number, executionTime: number): Result<Task, InvalidTaskParametersError> {
    const specResult = validateTaskSpec(load, executionTime);
    if (isErr(specResult)) {
      return specResult;
    }

    const task = createTask(taskId(this.nextTaskId), specResult.val);
    this.nextTaskId++;
    this.taskQueue.push(task);
    return createOk(task);
  }

  /**
   * キューを1回だけ空にし、各タスクを選択中のアルゴリズムで割り当てる
   *
   * WHY: 処理開始時点のキュー長だけ取り出すことで、処理中に追加されたタスクは
   * 次のサイクルまで待たせる
   */
  distributeTasks(): Assignment[] {
    const assignments: Assignment[] = [];
    const pending = this.taskQueue.length;

    for (let i = 0; i < pending; i++) {
      const task = this.taskQueue.shift();
      if (task === undefined) {
        break;
      }

      const index = distribute(this.selectedAlgorithm, task, this.processorList);
      const target = index === null ? undefined : this.processorList[index];
      assignments.push({ taskId: task.id, processorId: target?.id ?? null });
    }

    return assignments;
  }

  /**
   * 全Processorを1tick進める
   *
   * タスクを持たないProcessorもprocessTick()を呼び、履歴を1件ずつ追加する
   *
   * @returns このサイクルで完了したタスク
   */
  processCycle(): Task[] {
    const completedTasks: Task[] = [];
    for (const processor of this.processorList) {
      completedTasks.push(...processor.processTick());
    }

    this.completed += completedTasks.length;
    this.cycles++;
    return completedTasks;
  }

  setAlgorithm(name: string): Result<Algorithm, InvalidAlgorithmError> {
    const parsed = parseAlgorithm(name);
    if (isErr(parsed)) {
      return parsed;
    }
    this.selectedAlgorithm = parsed.val;
    return parsed;
  }

  /**
   * Processor数を変更する
   *
   * 増やす場合は末尾に新しいProcessorを追加し、減らす場合は末尾から削除する。
   * 削除したProcessorのタスクは破棄せずキューに戻し、次のサイクルで再分散する。
   */
  changeProcessorCount(count: number): Result<ProcessorCountChange, InvalidProcessorCountError> {
    if (!Number.isInteger(count) || count < 1) {
      return createErr(invalidProcessorCount(count));
    }

    const previousCount = this.processorList.length;
    let requeuedTasks = 0;

    if (count > previousCount) {
      for (let i = previousCount; i < count; i++) {
        this.processorList.push(this.createProcessor(i));
      }
    } else if (count < previousCount) {
      const removed = this.processorList.slice(count);
      this.processorList = this.processorList.slice(0, count);

      for (const processor of removed) {
        const drained = processor.drainTasks();
        this.taskQueue.push(...drained);
        requeuedTasks += drained.length;
      }
    }

    return createOk({ previousCount, currentCount: count, requeuedTasks });
  }

  setProcessorSpeed(
    id: ProcessorId,
    speed: number,
  ): Result<void, ProcessorNotFoundError | InvalidProcessorSpeedError> {
    if (!Number.isFinite(speed) || speed < 0) {
      return createErr(invalidProcessorSpeed(speed));
    }

    const processor = this.processorList.find((p) => p.id === id);
    if (!processor) {
      return createErr(processorNotFound(id));
    }

    processor.processingSpeed = speed;
    return createOk(undefined);
  }

  /**
   * 現在の状態のコピーを返す
   */
  snapshot(lifecycle: { active: boolean; paused: boolean }): SimulationSnapshot {
    const processors = this.processorList.map((p) => p.toSnapshot());
    const totalLoad = processors.reduce((sum, p) => sum + p.currentLoad, 0);

    return {
      tick: this.cycles,
      algorithm: this.selectedAlgorithm,
      active: lifecycle.active,
      paused: lifecycle.paused,
      processors,
      queueDepth: this.taskQueue.length,
      completedTasks: this.completed,
      averageLoad: processors.length > 0 ? totalLoad / processors.length : 0,
    };
  }

  private createProcessor(index: number): Processor {
    return new Processor(processorId(index), {
      capacity: this.capacity,
      processingSpeed: this.defaultSpeed,
    });
  }
}
