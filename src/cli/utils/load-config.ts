import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { createOk, createErr, type Result } from 'option-t/plain_result';
import { ConfigSchema, DEFAULT_CONFIG, type Config } from '../../types/config.ts';
import {
  configFileNotFound,
  configParseError,
  configValidationError,
  type ConfigError,
} from '../../types/errors.ts';

/** プロジェクト設定ディレクトリ */
export const CONFIG_DIR = '.balancer';

/** デフォルトの設定ファイルパス（baseDirからの相対） */
export const DEFAULT_CONFIG_PATH = path.join(CONFIG_DIR, 'config.json');

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

/**
 * 設定ファイルを読み込む
 *
 * 動作:
 * - configPath未指定: .balancer/config.json を読む。存在しなければデフォルト設定
 * - configPath指定: 指定ファイルを読む。存在しなければ ConfigFileNotFoundError
 *
 * @param configPath - 設定ファイルのパス（省略時はデフォルトパス）
 * @param baseDir - 相対パスの基準ディレクトリ
 */
export async function loadConfig(
  configPath?: string,
  baseDir: string = process.cwd(),
): Promise<Result<Config, ConfigError>> {
  const filePath = path.resolve(baseDir, configPath ?? DEFAULT_CONFIG_PATH);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return configPath === undefined ? createOk(DEFAULT_CONFIG) : createErr(configFileNotFound(filePath));
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return createErr(configParseError(filePath, error));
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return createErr(configValidationError(z.prettifyError(parsed.error), filePath));
  }
  return createOk(parsed.data);
}

/**
 * CLIフラグによる上書き
 */
export interface ConfigOverrides {
  algorithm?: string;
  processors?: number;
  seed?: number;
  rate?: number;
  interval?: number;
}

/**
 * 設定にCLIフラグを上書きし、スキーマで再検証する
 *
 * WHY: フラグの値域（Processor数の上限やアルゴリズム名）も設定ファイルと同じ規則で弾く
 */
export function applyConfigOverrides(config: Config, overrides: ConfigOverrides): Result<Config, ConfigError> {
  const merged = {
    ...config,
    algorithm: overrides.algorithm ?? config.algorithm,
    numProcessors: overrides.processors ?? config.numProcessors,
    seed: overrides.seed ?? config.seed,
    tickIntervalMs: overrides.interval ?? config.tickIntervalMs,
    generator: {
      ...config.generator,
      rate: overrides.rate ?? config.generator.rate,
    },
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    return createErr(configValidationError(z.prettifyError(parsed.error)));
  }
  return createOk(parsed.data);
}
