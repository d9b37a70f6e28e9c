/**
 * 固定間隔タイマーの抽象
 *
 * WHY: ドライバーをsetIntervalに直結させず、テストでは手動で進められるタイマーに差し替える
 */
export interface IntervalTimer {
  /**
   * callbackをintervalMsごとに呼び出す
   *
   * @returns 停止関数
   */
  start(callback: () => void, intervalMs: number): () => void;
}

/**
 * setInterval/clearIntervalによる実装
 */
export const systemIntervalTimer: IntervalTimer = {
  start(callback, intervalMs) {
    const handle = setInterval(callback, intervalMs);
    return () => {
      clearInterval(handle);
    };
  },
};
