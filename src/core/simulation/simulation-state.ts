/**
 * Simulation State - 純粋関数による状態遷移
 *
 * ループのライフサイクル（Active/Stopped × Running/Paused）を外部化し、
 * イミュータブルな状態遷移を提供する。
 */

/**
 * ライフサイクル状態
 */
export interface SimulationState {
  /** ループが動作中か（falseなら次のtickで何もしない） */
  readonly active: boolean;
  /** 一時停止中か（tickは続くが生成・分散・処理を行わない） */
  readonly paused: boolean;
}

/**
 * 初期状態を生成（停止中・一時停止なし）
 */
export const initialSimulationState = (): SimulationState => ({
  active: false,
  paused: false,
});

export const activate = (state: SimulationState): SimulationState => ({
  ...state,
  active: true,
});

export const deactivate = (state: SimulationState): SimulationState => ({
  ...state,
  active: false,
});

export const pause = (state: SimulationState): SimulationState => ({
  ...state,
  paused: true,
});

export const resume = (state: SimulationState): SimulationState => ({
  ...state,
  paused: false,
});

/**
 * 生成・分散・処理を行うべきtickか判定
 */
export const shouldProcess = (state: SimulationState): boolean => !state.paused;
