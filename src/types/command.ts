import type { ProcessorId } from './branded.ts';
import type { Algorithm } from './algorithm.ts';

/**
 * 制御コマンドの定数定義
 *
 * 表示層からの制御信号は検証後にコマンドとしてキューに積まれ、
 * 次のtickの先頭でまとめて適用される。
 */
export const CommandType = {
  CONFIGURE: 'CONFIGURE',
  SET_ALGORITHM: 'SET_ALGORITHM',
  SET_PROCESSOR_COUNT: 'SET_PROCESSOR_COUNT',
  SET_PROCESSOR_SPEED: 'SET_PROCESSOR_SPEED',
  INJECT_TASK: 'INJECT_TASK',
} as const;

export type CommandType = (typeof CommandType)[keyof typeof CommandType];

export interface ConfigureCommand {
  readonly type: typeof CommandType.CONFIGURE;
  readonly numProcessors: number;
  readonly algorithm: Algorithm;
}

export interface SetAlgorithmCommand {
  readonly type: typeof CommandType.SET_ALGORITHM;
  readonly algorithm: Algorithm;
}

export interface SetProcessorCountCommand {
  readonly type: typeof CommandType.SET_PROCESSOR_COUNT;
  readonly count: number;
}

export interface SetProcessorSpeedCommand {
  readonly type: typeof CommandType.SET_PROCESSOR_SPEED;
  readonly processorId: ProcessorId;
  readonly speed: number;
}

export interface InjectTaskCommand {
  readonly type: typeof CommandType.INJECT_TASK;
  readonly load: number;
  readonly executionTime: number;
}

export type ControlCommand =
  | ConfigureCommand
  | SetAlgorithmCommand
  | SetProcessorCountCommand
  | SetProcessorSpeedCommand
  | InjectTaskCommand;
