import { z } from 'zod';
import { Algorithm } from './algorithm.ts';

/**
 * Processor設定のスキーマ
 *
 * WHY: 新規に生成するProcessorはすべてこの値で初期化される（Reset・増設時も同じ）
 */
const ProcessorConfigSchema = z
  .object({
    /** 名目上の最大負荷（ソフトリミット、超過は許容される） */
    capacity: z.number().positive().default(100),
    /** 初期処理速度倍率 */
    defaultSpeed: z.number().min(0).default(1.0),
  })
  .default({ capacity: 100, defaultSpeed: 1.0 });

/**
 * タスク生成器設定のスキーマ
 *
 * サイズ・所要時間はそれぞれ独立した正規分布から生成される
 */
const GeneratorConfigSchema = z
  .object({
    /** 1秒あたりの平均生成タスク数 */
    rate: z.number().min(0).max(10).default(1.0),
    /** 平均タスク負荷（%） */
    meanLoad: z.number().min(5).max(100).default(20),
    /** タスク負荷の標準偏差 */
    loadStdDev: z.number().min(0).default(10),
    /** 平均所要時間 */
    meanDuration: z.number().min(1).default(5),
    /** 所要時間の標準偏差 */
    durationStdDev: z.number().min(0).default(2),
  })
  .default({ rate: 1.0, meanLoad: 20, loadStdDev: 10, meanDuration: 5, durationStdDev: 2 });

/**
 * シミュレーション設定のスキーマ
 */
export const ConfigSchema = z.object({
  $schema: z.string().optional(),
  /** Processor数 */
  numProcessors: z.number().int().min(1).max(64).default(4),
  /** 負荷分散アルゴリズム */
  algorithm: z.enum(Algorithm).default(Algorithm.ROUND_ROBIN),
  /** tick間隔（ミリ秒） */
  tickIntervalMs: z.number().int().min(1).max(10_000).default(100),
  /** 乱数シード（同じシードなら同じ負荷系列になる） */
  seed: z.number().int().default(1),
  processor: ProcessorConfigSchema,
  generator: GeneratorConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProcessorConfig = Config['processor'];
export type GeneratorConfig = Config['generator'];

/**
 * デフォルト設定
 */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
