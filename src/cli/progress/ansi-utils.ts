/**
 * ANSI Escape Sequence Utilities
 *
 * ターミナル制御用のANSIエスケープシーケンス。
 * - 色付け
 * - カーソル制御
 * - 負荷バー描画
 */

/**
 * ANSIエスケープシーケンス定数
 */
export const ANSI = {
  // カーソル制御
  HIDE_CURSOR: '\x1b[?25l',
  SHOW_CURSOR: '\x1b[?25h',
  CURSOR_UP: (n: number) => `\x1b[${n}A`,
  CLEAR_LINE: '\x1b[2K',

  // 色（フォアグラウンド）
  RESET: '\x1b[0m',
  BOLD: '\x1b[1m',
  DIM: '\x1b[2m',
  RED: '\x1b[31m',
  GREEN: '\x1b[32m',
  YELLOW: '\x1b[33m',
  GRAY: '\x1b[90m',
} as const;

/**
 * 負荷バー文字
 */
export const LOAD_BAR = {
  FILLED: '█',
  EMPTY: '░',
} as const;

/**
 * 負荷率（%）による色分けの閾値
 */
export const LOAD_THRESHOLDS = {
  /** これ未満は緑 */
  WARNING: 60,
  /** これ未満は黄、以上は赤 */
  CRITICAL: 85,
} as const;

/**
 * 出力先ストリーム
 *
 * process.stdout / process.stderr のうちレンダラーが使う部分だけ
 */
export interface OutputStream {
  readonly isTTY?: boolean;
  write(text: string): boolean;
}

/**
 * ANSIが有効かどうかを判定
 *
 * @param stream 出力ストリーム
 * @returns ANSIが有効な場合true
 */
export function isAnsiEnabled(stream: OutputStream): boolean {
  // TTYでない場合は無効
  if (!stream.isTTY) {
    return false;
  }

  // NO_COLOR環境変数が設定されている場合は無効
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }

  return true;
}

/**
 * テキストに色を付ける
 */
export function colorize(text: string, color: string, useAnsi: boolean): string {
  if (!useAnsi) {
    return text;
  }
  return `${color}${text}${ANSI.RESET}`;
}

export function bold(text: string, useAnsi: boolean): string {
  return colorize(text, ANSI.BOLD, useAnsi);
}

export function dim(text: string, useAnsi: boolean): string {
  return colorize(text, ANSI.DIM, useAnsi);
}

/**
 * 負荷率に応じた色を返す
 *
 * @param percent 容量に対する負荷率（%）
 */
export function loadColor(percent: number): string {
  if (percent < LOAD_THRESHOLDS.WARNING) {
    return ANSI.GREEN;
  }
  if (percent < LOAD_THRESHOLDS.CRITICAL) {
    return ANSI.YELLOW;
  }
  return ANSI.RED;
}

/**
 * 負荷バーを描画
 *
 * 容量超過（過剰割り当て）時もバーは満杯で止める
 *
 * @param load 現在の負荷
 * @param capacity 容量
 * @param width バーの幅（文字数）
 * @param useAnsi ANSIを使用するか
 * @returns 負荷バー文字列
 */
export function renderLoadBar(load: number, capacity: number, width: number, useAnsi: boolean): string {
  const ratio = capacity > 0 ? load / capacity : 0;
  const clampedRatio = Math.max(0, Math.min(1, ratio));
  const filledWidth = Math.round(clampedRatio * width);
  const emptyWidth = width - filledWidth;

  const filled = LOAD_BAR.FILLED.repeat(filledWidth);
  const empty = LOAD_BAR.EMPTY.repeat(emptyWidth);

  if (useAnsi) {
    return colorize(filled, loadColor(ratio * 100), true) + colorize(empty, ANSI.GRAY, true);
  }

  return filled + empty;
}

/**
 * 時刻をフォーマット
 *
 * @returns HH:MM:SS形式の文字列
 */
export function formatTime(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `${hours}:${minutes}:${seconds}`;
}
