import { Command } from 'commander';
import { compareAlgorithms } from '../../core/simulation/compare-algorithms.ts';
import { formatComparisonTable } from '../../core/report/formatter.ts';
import { parseIntegerOption, parsePositiveIntegerOption } from '../utils/cli-options.ts';
import { resolveConfig } from './run.ts';

/** compareのデフォルトtick数 */
const DEFAULT_COMPARE_TICKS = 200;

interface CompareCommandOptions {
  config?: string;
  ticks: number;
  seed?: number;
  processors?: number;
}

/**
 * `balancer-sim compare` コマンドの実装
 *
 * 全アルゴリズムを同じシードでタイマーなしに実行し、結果を表で比較する。
 */
export function createCompareCommand(): Command {
  const compareCommand = new Command('compare')
    .description('Run every algorithm on the same seeded workload and compare the results')
    .option('--config <path>', 'Path to configuration file')
    .option('--ticks <n>', 'Ticks to simulate per algorithm', parsePositiveIntegerOption, DEFAULT_COMPARE_TICKS)
    .option('--seed <n>', 'Random seed for the task generator', parseIntegerOption)
    .option('--processors <n>', 'Number of processors', parseIntegerOption)
    .action(async (options: CompareCommandOptions) => {
      try {
        const config = await resolveConfig(options);
        console.log(
          `⚖️  Comparing algorithms: ${options.ticks} ticks, ${config.numProcessors} processors, seed ${config.seed}\n`,
        );
        console.log(formatComparisonTable(compareAlgorithms(config, options.ticks)));
      } catch (error) {
        console.error('Comparison failed:', error);
        process.exit(1);
      }
    });

  return compareCommand;
}
