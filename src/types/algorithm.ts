import { createOk, createErr, type Result } from 'option-t/plain_result';
import type { InvalidAlgorithmError } from './errors.ts';
import { invalidAlgorithm } from './errors.ts';

/**
 * 負荷分散アルゴリズムの定数定義
 *
 * - round_robin: 先頭から順に空き容量のあるProcessorを探す
 * - least_loaded: currentLoadが最小のProcessor
 * - weighted: currentLoad / processingSpeed が最小のProcessor
 * - adaptive: 負荷率・速度・直近の負荷履歴を組み合わせたスコアが最小のProcessor
 */
export const Algorithm = {
  ROUND_ROBIN: 'round_robin',
  LEAST_LOADED: 'least_loaded',
  WEIGHTED: 'weighted',
  ADAPTIVE: 'adaptive',
} as const;

export type Algorithm = (typeof Algorithm)[keyof typeof Algorithm];

export const ALGORITHM_NAMES: readonly Algorithm[] = Object.values(Algorithm);

export const isAlgorithm = (name: string): name is Algorithm =>
  ALGORITHM_NAMES.some((known) => known === name);

/**
 * 文字列をアルゴリズム名として解釈する
 *
 * 未知の名前は無視せずエラーとして返す
 */
export const parseAlgorithm = (name: string): Result<Algorithm, InvalidAlgorithmError> => {
  if (isAlgorithm(name)) {
    return createOk(name);
  }
  return createErr(invalidAlgorithm(name, ALGORITHM_NAMES));
};
