import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { createOk, createErr, isErr, type Result } from 'option-t/plain_result';
import { ConfigSchema, DEFAULT_CONFIG } from '../../types/config.ts';
import { configFileExists, type ConfigFileExistsError } from '../../types/errors.ts';
import { CONFIG_DIR } from '../utils/load-config.ts';
import { toDisplayPath } from '../utils/display-path.ts';

/** 設定ファイルと同じディレクトリに置くスキーマファイル名 */
export const SCHEMA_FILE_NAME = 'config-schema.json';

/**
 * 初期化で作成したファイル
 */
export interface InitializedFiles {
  configPath: string;
  schemaPath: string;
}

/**
 * プロジェクト設定を初期化する
 *
 * - .balancer/config.json（デフォルト値）
 * - .balancer/config-schema.json（IDE補完用のJSON Schema）
 *
 * @param baseDir 初期化するディレクトリ
 * @param force 既存の設定ファイルを上書きするか
 */
export async function initializeProject(
  baseDir: string,
  force: boolean,
): Promise<Result<InitializedFiles, ConfigFileExistsError>> {
  const configDir = path.join(baseDir, CONFIG_DIR);
  const configPath = path.join(configDir, 'config.json');
  const schemaPath = path.join(configDir, SCHEMA_FILE_NAME);

  if (!force) {
    const exists = await fs
      .access(configPath)
      .then(() => true)
      .catch(() => false);
    if (exists) {
      return createErr(configFileExists(configPath));
    }
  }

  await fs.mkdir(configDir, { recursive: true });

  const config = { $schema: `./${SCHEMA_FILE_NAME}`, ...DEFAULT_CONFIG };
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

  // WHY: スキーマはzodの定義から生成するので、設定項目を追加しても手で同期する必要がない
  const schema = z.toJSONSchema(ConfigSchema, { io: 'input' });
  await fs.writeFile(schemaPath, JSON.stringify(schema, null, 2) + '\n', 'utf-8');

  return createOk({ configPath, schemaPath });
}

/**
 * `balancer-sim init` コマンドの実装
 */
export function createInitCommand(): Command {
  const initCommand = new Command('init')
    .description('Create .balancer/config.json with default settings')
    .option('--force', 'Overwrite existing configuration', false)
    .action(async (options: { force: boolean }) => {
      try {
        const result = await initializeProject(process.cwd(), options.force);
        if (isErr(result)) {
          console.error(`${result.err.message}\nUse --force to overwrite`);
          process.exit(1);
        }

        console.log(`✓ Configuration file created: ${toDisplayPath(result.val.configPath)}`);
        console.log(`✓ Schema file created: ${toDisplayPath(result.val.schemaPath)}`);
        console.log(`\nNext steps:`);
        console.log(`  1. Run: balancer-sim run --ticks 100`);
        console.log(`  2. Compare algorithms: balancer-sim compare`);
      } catch (error) {
        console.error('Initialization failed:', error);
        process.exit(1);
      }
    });

  return initCommand;
}
