import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { isErr } from 'option-t/plain_result';
import { ALGORITHM_NAMES } from '../../types/algorithm.ts';
import type { Config } from '../../types/config.ts';
import { SimulationEventType } from '../../types/simulation-event.ts';
import { createSimulationEmitter } from '../../adapters/events/simulation-emitter-impl.ts';
import { createSimulationDriverFromConfig } from '../../core/simulation/simulation-driver.ts';
import { createReportCollector } from '../../core/report/collector.ts';
import { formatReportAsMarkdown, formatLoad } from '../../core/report/formatter.ts';
import type { ReportData } from '../../core/report/types.ts';
import { createLoadRenderer } from '../progress/load-renderer.ts';
import { loadConfig, applyConfigOverrides } from '../utils/load-config.ts';
import { parseIntegerOption, parseNumberOption, parsePositiveIntegerOption } from '../utils/cli-options.ts';
import { toDisplayPath } from '../utils/display-path.ts';

interface RunCommandOptions {
  config?: string;
  algorithm?: string;
  processors?: number;
  ticks?: number;
  seed?: number;
  rate?: number;
  interval?: number;
  report?: string;
  verbose: boolean;
}

/**
 * `balancer-sim run` コマンドの実装
 *
 * 設定に従ってシミュレーションを実時間で実行し、負荷をライブ表示する。
 * --ticks に達するか SIGINT で停止する。
 */
export function createRunCommand(): Command {
  const runCommand = new Command('run')
    .description('Run the load balancing simulation in real time')
    .option('--config <path>', 'Path to configuration file')
    .option('--algorithm <name>', `Distribution algorithm (${ALGORITHM_NAMES.join(', ')})`)
    .option('--processors <n>', 'Number of processors', parseIntegerOption)
    .option('--ticks <n>', 'Stop after this many ticks (default: run until Ctrl+C)', parsePositiveIntegerOption)
    .option('--seed <n>', 'Random seed for the task generator', parseIntegerOption)
    .option('--rate <n>', 'Average number of generated tasks per second', parseNumberOption)
    .option('--interval <ms>', 'Tick interval in milliseconds', parseIntegerOption)
    .option('--report <path>', 'Write a Markdown report to this path')
    .option('--verbose', 'Log lifecycle transitions', false)
    .action(async (options: RunCommandOptions) => {
      try {
        await executeRun(options);
      } catch (error) {
        console.error('Simulation failed:', error);
        process.exit(1);
      }
    });

  return runCommand;
}

/**
 * 設定ファイルとCLIフラグから最終的な設定を組み立てる
 *
 * 失敗した場合はエラーを表示して終了する
 */
export async function resolveConfig(options: {
  config?: string;
  algorithm?: string;
  processors?: number;
  seed?: number;
  rate?: number;
  interval?: number;
}): Promise<Config> {
  const loaded = await loadConfig(options.config);
  if (isErr(loaded)) {
    console.error(`❌ ${loaded.err.message}`);
    process.exit(1);
  }

  const config = applyConfigOverrides(loaded.val, options);
  if (isErr(config)) {
    console.error(`❌ ${config.err.message}`);
    process.exit(1);
  }
  return config.val;
}

/**
 * 実行結果のサマリーを出力
 */
function printSummary(report: ReportData): void {
  console.log(`\n✅ Simulation finished after ${report.ticks} ticks (${report.algorithm ?? '-'})`);
  console.log(`   Completed tasks: ${report.completedTasks}`);
  console.log(`   Mean load: ${formatLoad(report.meanAverageLoad)} (peak ${formatLoad(report.peakAverageLoad)})`);
  console.log(`   Max queue depth: ${report.maxQueueDepth}`);
  if (report.events.length > 0) {
    console.log(`   ⚠️  ${report.events.length} command/tick failure(s) recorded`);
  }
}

/**
 * balancer-sim run の実行処理
 */
async function executeRun(options: RunCommandOptions): Promise<void> {
  const config = await resolveConfig(options);

  const emitter = createSimulationEmitter();
  const collector = createReportCollector();
  const detachCollector = collector.attach(emitter);
  const renderer = createLoadRenderer(emitter);
  const driver = createSimulationDriverFromConfig(config, { emitter, verbose: options.verbose });

  renderer.start();

  // --ticks 到達かSIGINTで停止するまで待つ
  await new Promise<void>((resolve) => {
    let finished = false;

    const finish = (): void => {
      if (finished) {
        return;
      }
      finished = true;
      process.off('SIGINT', finish);
      unsubscribe();
      driver.stop();
      resolve();
    };

    const unsubscribe = driver.subscribe((event) => {
      if (
        event.type === SimulationEventType.TICK &&
        options.ticks !== undefined &&
        event.snapshot.tick >= options.ticks
      ) {
        finish();
      }
    });

    process.on('SIGINT', finish);
    driver.start();
  });

  renderer.stop();
  detachCollector();

  const report = collector.collect();
  printSummary(report);

  if (options.report !== undefined) {
    const reportPath = path.resolve(options.report);
    await fs.mkdir(path.dirname(reportPath), { recursive: true });
    await fs.writeFile(reportPath, formatReportAsMarkdown(report) + '\n', 'utf-8');
    console.log(`📄 Report written: ${toDisplayPath(reportPath)}`);
  }
}
