/**
 * balancer-sim library entry point
 */

export * from './core/index.ts';

export * from './types/branded.ts';
export * from './types/task.ts';
export * from './types/algorithm.ts';
export * from './types/snapshot.ts';
export * from './types/command.ts';
export * from './types/config.ts';
export * from './types/errors.ts';
export * from './types/simulation-event.ts';

export type { SimulationEmitter } from './adapters/events/simulation-emitter.ts';
export { createSimulationEmitter } from './adapters/events/simulation-emitter-impl.ts';
