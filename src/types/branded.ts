/**
 * Branded Types for type-safe domain identifiers
 *
 * シミュレーション内の識別子はどちらも整数だが、TaskIdとProcessorIdを
 * 取り違えないようにBranded Typeで区別する。
 */

declare const brand: unique symbol;
type Brand<K, T> = T & { readonly [brand]: K };

// Task関連
export type TaskId = Brand<'TaskId', number>;

// Processor関連
export type ProcessorId = Brand<'ProcessorId', number>;

// コンストラクタ関数
// これらの関数を使って、素のnumber型からBranded Typeへ変換する
export const taskId = (raw: number): TaskId => raw as TaskId;
export const processorId = (raw: number): ProcessorId => raw as ProcessorId;
