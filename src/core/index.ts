/**
 * Core module public exports
 *
 * WHY: コアモジュールの統合エントリーポイントを提供
 */

// Balancer module
export * from './balancer/ring-buffer.ts';
export * from './balancer/processor.ts';
export * from './balancer/strategies.ts';
export * from './balancer/load-balancer.ts';

// Generator module
export * from './generator/random.ts';
export * from './generator/task-generator.ts';

// Simulation module
export * from './simulation/interval-timer.ts';
export * from './simulation/simulation-state.ts';
export * from './simulation/simulation-driver.ts';
export * from './simulation/compare-algorithms.ts';

// Report module
export * from './report/types.ts';
export * from './report/collector.ts';
export * from './report/formatter.ts';
