import type { ReportData, ReportEvent, ProcessorStatistics } from './types.ts';

/**
 * ReportDataをMarkdown形式に変換する
 *
 * @param data レポートデータ
 * @returns Markdown形式の文字列
 */
export function formatReportAsMarkdown(data: ReportData): string {
  const sections: string[] = [];

  // ヘッダー
  sections.push('# 負荷分散シミュレーションレポート\n');

  // 実行概要
  sections.push('## 実行概要');
  sections.push(`- アルゴリズム: ${data.algorithm ?? '-'}`);
  sections.push(`- 開始: ${data.period.start.toISOString()}`);
  sections.push(`- 終了: ${data.period.end.toISOString()}`);
  sections.push(`- 実行サイクル数: ${data.ticks}\n`);

  // 集計
  sections.push('## 集計');
  sections.push('| 項目 | 値 |');
  sections.push('|------|------|');
  sections.push(`| 完了タスク数 | ${data.completedTasks} |`);
  sections.push(`| 平均負荷（全期間） | ${formatLoad(data.meanAverageLoad)} |`);
  sections.push(`| 平均負荷（ピーク） | ${formatLoad(data.peakAverageLoad)} |`);
  sections.push(`| 最大キュー長 | ${data.maxQueueDepth} |`);
  sections.push(`| 最終キュー長 | ${data.finalQueueDepth} |\n`);

  // Processor別
  sections.push('## Processor別負荷');
  if (data.processors.length === 0) {
    sections.push('- なし\n');
  } else {
    sections.push('| ID | 平均負荷 | ピーク負荷 | 処理速度 | 観測tick数 |');
    sections.push('|------|------|------|------|------|');
    for (const processor of data.processors) {
      sections.push(formatProcessorRow(processor));
    }
    sections.push('');
  }

  // 観察されたイベント
  sections.push('## 観察されたイベント');
  if (data.events.length === 0) {
    sections.push('- なし');
  } else {
    for (const event of data.events) {
      sections.push(formatEvent(event));
    }
  }

  return sections.join('\n');
}

/**
 * 負荷値を小数1桁で表記
 */
export function formatLoad(load: number): string {
  return load.toFixed(1);
}

function formatProcessorRow(processor: ProcessorStatistics): string {
  return `| ${processor.processorId} | ${formatLoad(processor.meanLoad)} | ${formatLoad(processor.peakLoad)} | ${processor.processingSpeed} | ${processor.samples} |`;
}

function formatEvent(event: ReportEvent): string {
  return `- ${event.timestamp.toISOString()}: [${event.type}] ${event.details}`;
}

/**
 * アルゴリズム比較結果をMarkdownの表に変換する
 */
export function formatComparisonTable(
  rows: readonly { algorithm: string; report: ReportData }[],
): string {
  const lines: string[] = [];
  lines.push('| アルゴリズム | 完了タスク数 | 平均負荷 | ピーク平均負荷 | 最大キュー長 | 負荷の偏り |');
  lines.push('|------|------|------|------|------|------|');
  for (const { algorithm, report } of rows) {
    lines.push(
      `| ${algorithm} | ${report.completedTasks} | ${formatLoad(report.meanAverageLoad)} | ${formatLoad(report.peakAverageLoad)} | ${report.maxQueueDepth} | ${formatLoad(loadImbalance(report.processors))} |`,
    );
  }
  return lines.join('\n');
}

/**
 * Processor間の平均負荷の標準偏差
 *
 * 値が小さいほど均等に分散できている
 */
export function loadImbalance(processors: readonly ProcessorStatistics[]): number {
  if (processors.length === 0) {
    return 0;
  }
  const mean = processors.reduce((sum, p) => sum + p.meanLoad, 0) / processors.length;
  const variance = processors.reduce((sum, p) => sum + (p.meanLoad - mean) ** 2, 0) / processors.length;
  return Math.sqrt(variance);
}
