import { createOk, createErr, type Result } from 'option-t/plain_result';
import type { TaskId } from './branded.ts';
import type { InvalidTaskParametersError } from './errors.ts';
import { invalidTaskParameters } from './errors.ts';

/**
 * タスクが要求できる負荷の範囲（capacityに対する割合）
 */
export const MIN_TASK_LOAD = 0;
export const MAX_TASK_LOAD = 100;

/**
 * シミュレーション上の作業単位
 *
 * idとloadは生成後に変化しない。remainingTimeのみProcessorが毎tick減算する。
 */
export interface Task {
  readonly id: TaskId;
  /** 要求負荷（0-100） */
  readonly load: number;
  /** 初期実行時間 */
  readonly executionTime: number;
  /** 残り実行時間。0以下で完了 */
  remainingTime: number;
}

/**
 * 生成前のタスク仕様（ジェネレータやinjectTaskが返す）
 */
export interface TaskSpec {
  load: number;
  executionTime: number;
}

/**
 * タスク仕様を検証する
 *
 * loadは[0, 100]、executionTimeは正の有限値でなければならない
 */
export const validateTaskSpec = (
  load: number,
  executionTime: number,
): Result<TaskSpec, InvalidTaskParametersError> => {
  if (!Number.isFinite(load) || load < MIN_TASK_LOAD || load > MAX_TASK_LOAD) {
    return createErr(
      invalidTaskParameters(load, executionTime, `load must be within [${MIN_TASK_LOAD}, ${MAX_TASK_LOAD}]`),
    );
  }
  if (!Number.isFinite(executionTime) || executionTime <= 0) {
    return createErr(
      invalidTaskParameters(load, executionTime, 'executionTime must be a positive finite number'),
    );
  }
  return createOk({ load, executionTime });
};

/**
 * 新しいタスクを生成
 */
export const createTask = (id: TaskId, spec: TaskSpec): Task => ({
  id,
  load: spec.load,
  executionTime: spec.executionTime,
  remainingTime: spec.executionTime,
});

export const isTaskComplete = (task: Task): boolean => task.remainingTime <= 0;
