import { createOk, createErr, isErr, type Result } from 'option-t/plain_result';
import type { ProcessorId } from '../../types/branded.ts';
import { processorId } from '../../types/branded.ts';
import { Algorithm, parseAlgorithm } from '../../types/algorithm.ts';
import type { ControlCommand } from '../../types/command.ts';
import { CommandType } from '../../types/command.ts';
import type { Config, ProcessorConfig } from '../../types/config.ts';
import { DEFAULT_CONFIG } from '../../types/config.ts';
import type { ControlError } from '../../types/errors.ts';
import { invalidProcessorCount, invalidProcessorSpeed, processorNotFound } from '../../types/errors.ts';
import type { SimulationSnapshot } from '../../types/snapshot.ts';
import { validateTaskSpec } from '../../types/task.ts';
import { SimulationEventType, type SimulationEventHandler } from '../../types/simulation-event.ts';
import type { SimulationEmitter } from '../../adapters/events/simulation-emitter.ts';
import { createSimulationEmitter } from '../../adapters/events/simulation-emitter-impl.ts';
import { LoadBalancer } from '../balancer/load-balancer.ts';
import type { TaskGenerator } from '../generator/task-generator.ts';
import { createTaskGenerator } from '../generator/task-generator.ts';
import { createRNG } from '../generator/random.ts';
import type { IntervalTimer } from './interval-timer.ts';
import { systemIntervalTimer } from './interval-timer.ts';
import type { SimulationState } from './simulation-state.ts';
import {
  initialSimulationState,
  activate,
  deactivate,
  pause as pauseState,
  resume as resumeState,
  shouldProcess,
} from './simulation-state.ts';

/** デフォルトのtick間隔（ミリ秒） */
export const DEFAULT_TICK_INTERVAL_MS = 100;

/**
 * SimulationDriverのオプション
 */
export interface SimulationDriverOptions {
  /** Processor数（デフォルト: 4） */
  numProcessors?: number;
  /** 初期アルゴリズム（デフォルト: round_robin） */
  algorithm?: Algorithm;
  /** tick間隔（デフォルト: 100ms） */
  tickIntervalMs?: number;
  /** 新規Processorの設定 */
  processor?: ProcessorConfig;
  /** タスク生成器（省略時はタスクを生成しない。injectTaskのみで駆動する） */
  generator?: TaskGenerator;
  /** イベント発火先（省略時は内部で作成） */
  emitter?: SimulationEmitter;
  /** 固定間隔タイマー（テストで差し替える） */
  timer?: IntervalTimer;
  /** ライフサイクル遷移をログ出力するか */
  verbose?: boolean;
}

/**
 * Processor数の検証（1以上の整数）
 */
const validateProcessorCount = (count: number): Result<number, ControlError> =>
  Number.isInteger(count) && count >= 1 ? createOk(count) : createErr(invalidProcessorCount(count));

/**
 * シミュレーションドライバーを作成
 *
 * 固定間隔でタスク生成 → 分散 → 処理 → スナップショット通知 を繰り返す。
 * LoadBalancerはドライバーが所有し、外部からの変更はすべてコマンド経由で直列化される。
 *
 * @param options ドライバーオプション
 * @returns ドライバー操作オブジェクト
 */
export const createSimulationDriver = (options: SimulationDriverOptions = {}) => {
  const tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
  const processorConfig = options.processor ?? DEFAULT_CONFIG.processor;
  const generator: TaskGenerator = options.generator ?? (() => []);
  const emitter = options.emitter ?? createSimulationEmitter();
  const timer = options.timer ?? systemIntervalTimer;
  const verbose = options.verbose ?? false;

  const createBalancer = (numProcessors: number, algorithm: Algorithm): LoadBalancer =>
    new LoadBalancer({
      numProcessors,
      algorithm,
      capacity: processorConfig.capacity,
      defaultSpeed: processorConfig.defaultSpeed,
    });

  let balancer = createBalancer(
    options.numProcessors ?? 4,
    options.algorithm ?? Algorithm.ROUND_ROBIN,
  );
  let lifecycle: SimulationState = initialSimulationState();
  let cancelTimer: (() => void) | null = null;
  let hasStarted = false;
  const commandQueue: ControlCommand[] = [];

  const log = (message: string): void => {
    if (verbose) {
      console.log(message);
    }
  };

  const snapshot = (): SimulationSnapshot => balancer.snapshot(lifecycle);

  /**
   * コマンドを1件適用
   *
   * 投入時点で検証済みだが、Processor数変更などで対象が消えている場合がある
   */
  const applyCommand = (command: ControlCommand): void => {
    switch (command.type) {
      case CommandType.CONFIGURE: {
        balancer.changeProcessorCount(command.numProcessors);
        balancer.setAlgorithm(command.algorithm);
        break;
      }

      case CommandType.SET_ALGORITHM: {
        balancer.setAlgorithm(command.algorithm);
        break;
      }

      case CommandType.SET_PROCESSOR_COUNT: {
        const result = balancer.changeProcessorCount(command.count);
        if (!isErr(result) && result.val.requeuedTasks > 0) {
          log(`  🔁 Re-queued ${result.val.requeuedTasks} task(s) from removed processors`);
        }
        break;
      }

      case CommandType.SET_PROCESSOR_SPEED: {
        const result = balancer.setProcessorSpeed(command.processorId, command.speed);
        if (isErr(result)) {
          emitter.emit({
            type: SimulationEventType.COMMAND_FAILED,
            timestamp: new Date(),
            command: command.type,
            message: result.err.message,
          });
        }
        break;
      }

      case CommandType.INJECT_TASK: {
        const result = balancer.addTask(command.load, command.executionTime);
        if (isErr(result)) {
          emitter.emit({
            type: SimulationEventType.COMMAND_FAILED,
            timestamp: new Date(),
            command: command.type,
            message: result.err.message,
          });
        }
        break;
      }
    }
  };

  /**
   * キュー済みコマンドを投入順にすべて適用
   */
  const flushCommands = (): void => {
    const pending = commandQueue.splice(0, commandQueue.length);
    for (const command of pending) {
      applyCommand(command);
    }
  };

  /**
   * キュー済みコマンドをすべて適用した後のProcessor数
   *
   * Processor IDは常に 0..n-1 なので、ID存在確認はこの数で判定できる
   */
  const projectedProcessorCount = (): number => {
    let count = balancer.processors.length;
    for (const command of commandQueue) {
      if (command.type === CommandType.CONFIGURE) {
        count = command.numProcessors;
      } else if (command.type === CommandType.SET_PROCESSOR_COUNT) {
        count = command.count;
      }
    }
    return count;
  };

  /**
   * 検証済みコマンドを投入
   *
   * ループ動作中はキューに積んで次のtickで適用し、停止中は即座に適用する
   */
  const submit = (command: ControlCommand): void => {
    if (lifecycle.active) {
      commandQueue.push(command);
    } else {
      applyCommand(command);
    }
  };

  /**
   * 1tick分の処理
   *
   * @returns 処理を行った場合はスナップショット、一時停止中や失敗時はnull
   */
  const runTick = (): SimulationSnapshot | null => {
    try {
      flushCommands();

      if (!shouldProcess(lifecycle)) {
        return null;
      }

      for (const spec of generator()) {
        const added = balancer.addTask(spec.load, spec.executionTime);
        if (isErr(added)) {
          console.warn(`  ⚠️  Generated task rejected: ${added.err.message}`);
        }
      }

      balancer.distributeTasks();
      const completed = balancer.processCycle();
      const current = snapshot();

      emitter.emit({
        type: SimulationEventType.TICK,
        timestamp: new Date(),
        snapshot: current,
      });

      if (completed.length > 0) {
        emitter.emit({
          type: SimulationEventType.TASKS_COMPLETED,
          timestamp: new Date(),
          tick: current.tick,
          tasks: completed,
        });
      }

      return current;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`  ❌ Tick failed: ${errorMessage}`);
      emitter.emit({
        type: SimulationEventType.TICK_ERROR,
        timestamp: new Date(),
        message: errorMessage,
      });
      return null;
    }
  };

  /**
   * タイマーから呼ばれるtick
   *
   * 停止フラグはtickの先頭で確認する
   */
  const onTimer = (): void => {
    if (!lifecycle.active) {
      return;
    }
    runTick();
  };

  const schedule = (): void => {
    cancelTimer = timer.start(onTimer, tickIntervalMs);
  };

  /**
   * ループを開始（動作中なら何もしない）
   */
  const start = (): void => {
    if (lifecycle.active && cancelTimer !== null) {
      return;
    }

    lifecycle = activate(lifecycle);
    hasStarted = true;
    schedule();

    log(`🚀 Simulation started (${balancer.processors.length} processors, ${balancer.algorithm})`);
    emitter.emit({
      type: SimulationEventType.SIMULATION_START,
      timestamp: new Date(),
      snapshot: snapshot(),
    });
  };

  /**
   * ループを停止
   *
   * 未適用のコマンドは停止時に適用してから止める
   */
  const stop = (): void => {
    if (cancelTimer !== null) {
      cancelTimer();
      cancelTimer = null;
    }
    if (!lifecycle.active) {
      return;
    }

    lifecycle = deactivate(lifecycle);
    flushCommands();

    log(`🛑 Simulation stopped at tick ${balancer.tick}`);
    emitter.emit({
      type: SimulationEventType.SIMULATION_STOP,
      timestamp: new Date(),
      snapshot: snapshot(),
    });
  };

  const pause = (): void => {
    if (lifecycle.paused) {
      return;
    }
    lifecycle = pauseState(lifecycle);
    log('⏸️  Simulation paused');
    emitter.emit({ type: SimulationEventType.PAUSED, timestamp: new Date() });
  };

  const resume = (): void => {
    if (!lifecycle.paused) {
      return;
    }
    lifecycle = resumeState(lifecycle);
    log('▶️  Simulation resumed');
    emitter.emit({ type: SimulationEventType.RESUMED, timestamp: new Date() });
  };

  /**
   * 同じProcessor数・アルゴリズムでLoadBalancerを作り直す
   *
   * キュー済みコマンドは旧LoadBalancerに適用してから作り直すので、
   * 直前に選択したアルゴリズムやProcessor数は引き継がれる（投入済みタスクは破棄）。
   * 一度開始したループが停止していた場合は再開する
   */
  const reset = (): void => {
    flushCommands();
    balancer = createBalancer(balancer.processors.length, balancer.algorithm);
    emitter.reset();

    log('🔄 Simulation reset');
    emitter.emit({
      type: SimulationEventType.RESET,
      timestamp: new Date(),
      snapshot: snapshot(),
    });

    if (hasStarted && cancelTimer === null) {
      start();
    }
  };

  const configure = (numProcessors: number, algorithm: string): Result<void, ControlError> => {
    const countResult = validateProcessorCount(numProcessors);
    if (isErr(countResult)) {
      return countResult;
    }
    const algorithmResult = parseAlgorithm(algorithm);
    if (isErr(algorithmResult)) {
      return algorithmResult;
    }

    submit({
      type: CommandType.CONFIGURE,
      numProcessors: countResult.val,
      algorithm: algorithmResult.val,
    });
    return createOk(undefined);
  };

  const setAlgorithm = (name: string): Result<void, ControlError> => {
    const algorithmResult = parseAlgorithm(name);
    if (isErr(algorithmResult)) {
      return algorithmResult;
    }

    submit({ type: CommandType.SET_ALGORITHM, algorithm: algorithmResult.val });
    return createOk(undefined);
  };

  const setProcessorCount = (count: number): Result<void, ControlError> => {
    const countResult = validateProcessorCount(count);
    if (isErr(countResult)) {
      return countResult;
    }

    submit({ type: CommandType.SET_PROCESSOR_COUNT, count: countResult.val });
    return createOk(undefined);
  };

  const setProcessorSpeed = (rawId: number, speed: number): Result<void, ControlError> => {
    if (!Number.isFinite(speed) || speed < 0) {
      return createErr(invalidProcessorSpeed(speed));
    }

    const id: ProcessorId = processorId(rawId);
    // 動作中はキュー済みのProcessor数変更を反映した数で判定する
    if (!Number.isInteger(rawId) || rawId < 0 || rawId >= projectedProcessorCount()) {
      return createErr(processorNotFound(id));
    }

    submit({ type: CommandType.SET_PROCESSOR_SPEED, processorId: id, speed });
    return createOk(undefined);
  };

  /**
   * 乱数生成器を通さずにタスクを投入（決定的なシナリオ用）
   */
  const injectTask = (load: number, executionTime: number): Result<void, ControlError> => {
    const specResult = validateTaskSpec(load, executionTime);
    if (isErr(specResult)) {
      return specResult;
    }

    submit({ type: CommandType.INJECT_TASK, ...specResult.val });
    return createOk(undefined);
  };

  const subscribe = (handler: SimulationEventHandler): (() => void) => emitter.subscribe(handler);

  return {
    start,
    stop,
    pause,
    resume,
    reset,
    /** 1tickを同期的に実行（タイマーを使わない手動実行） */
    step: runTick,
    snapshot,
    configure,
    setAlgorithm,
    setProcessorCount,
    setProcessorSpeed,
    injectTask,
    subscribe,
    /** 未適用のコマンド数 */
    pendingCommands: (): number => commandQueue.length,
    tickIntervalMs,
  };
};

/**
 * SimulationDriver型
 */
export type SimulationDriver = ReturnType<typeof createSimulationDriver>;

/**
 * 設定からドライバーを作成
 *
 * シード付き乱数でタスク生成器を組み立てる
 */
export const createSimulationDriverFromConfig = (
  config: Config,
  deps: Pick<SimulationDriverOptions, 'emitter' | 'timer' | 'verbose'> = {},
): SimulationDriver =>
  createSimulationDriver({
    numProcessors: config.numProcessors,
    algorithm: config.algorithm,
    tickIntervalMs: config.tickIntervalMs,
    processor: config.processor,
    generator: createTaskGenerator({
      settings: config.generator,
      tickIntervalMs: config.tickIntervalMs,
      rng: createRNG(config.seed),
    }),
    ...deps,
  });
