import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createReportCollector } from '../../../../src/core/report/collector.ts';
import { createSimulationEmitter } from '../../../../src/adapters/events/simulation-emitter-impl.ts';
import { Algorithm } from '../../../../src/types/algorithm.ts';
import { processorId } from '../../../../src/types/branded.ts';
import type { SimulationSnapshot } from '../../../../src/types/snapshot.ts';
import { SimulationEventType, type SimulationEvent } from '../../../../src/types/simulation-event.ts';

const at = (second: number): Date => new Date(Date.UTC(2024, 0, 23, 10, 0, second));

const makeSnapshot = (params: {
  tick: number;
  loads: number[];
  queueDepth?: number;
  completedTasks?: number;
  speed?: number;
}): SimulationSnapshot => ({
  tick: params.tick,
  algorithm: Algorithm.LEAST_LOADED,
  active: true,
  paused: false,
  processors: params.loads.map((load, index) => ({
    id: processorId(index),
    currentLoad: load,
    capacity: 100,
    taskCount: load > 0 ? 1 : 0,
    history: [],
    processingSpeed: params.speed ?? 1,
  })),
  queueDepth: params.queueDepth ?? 0,
  completedTasks: params.completedTasks ?? 0,
  averageLoad: params.loads.reduce((sum, l) => sum + l, 0) / params.loads.length,
});

const tick = (second: number, snapshot: SimulationSnapshot): SimulationEvent => ({
  type: SimulationEventType.TICK,
  timestamp: at(second),
  snapshot,
});

describe('createReportCollector', () => {
  it('should aggregate tick snapshots', () => {
    const collector = createReportCollector();

    collector.handle({
      type: SimulationEventType.SIMULATION_START,
      timestamp: at(0),
      snapshot: makeSnapshot({ tick: 0, loads: [0, 0] }),
    });
    collector.handle(tick(1, makeSnapshot({ tick: 1, loads: [10, 30], queueDepth: 2 })));
    collector.handle(tick(2, makeSnapshot({ tick: 2, loads: [30, 50], completedTasks: 3, speed: 2 })));
    collector.handle({
      type: SimulationEventType.SIMULATION_STOP,
      timestamp: at(5),
      snapshot: makeSnapshot({ tick: 2, loads: [30, 50], completedTasks: 3 }),
    });

    const report = collector.collect();

    assert.strictEqual(report.algorithm, Algorithm.LEAST_LOADED);
    assert.deepStrictEqual(report.period, { start: at(0), end: at(5) });
    assert.strictEqual(report.ticks, 2);
    assert.strictEqual(report.completedTasks, 3);
    assert.strictEqual(report.meanAverageLoad, 30);
    assert.strictEqual(report.peakAverageLoad, 40);
    assert.strictEqual(report.maxQueueDepth, 2);
    assert.strictEqual(report.finalQueueDepth, 0);
    assert.deepStrictEqual(report.processors, [
      { processorId: processorId(0), samples: 2, meanLoad: 20, peakLoad: 30, processingSpeed: 2 },
      { processorId: processorId(1), samples: 2, meanLoad: 40, peakLoad: 50, processingSpeed: 2 },
    ]);
    assert.deepStrictEqual(report.events, []);
  });

  it('should aggregate processors only over the ticks they existed', () => {
    const collector = createReportCollector();

    collector.handle(tick(1, makeSnapshot({ tick: 1, loads: [10] })));
    collector.handle(tick(2, makeSnapshot({ tick: 2, loads: [20, 40] })));

    const report = collector.collect();

    assert.deepStrictEqual(
      report.processors.map((p) => [p.processorId, p.samples, p.meanLoad]),
      [
        [processorId(0), 2, 15],
        [processorId(1), 1, 40],
      ],
    );
  });

  it('should record command failures and tick errors', () => {
    const collector = createReportCollector();

    collector.handle({
      type: SimulationEventType.COMMAND_FAILED,
      timestamp: at(3),
      command: 'SET_PROCESSOR_SPEED',
      message: 'Processor not found: 3',
    });
    collector.handle({ type: SimulationEventType.TICK_ERROR, timestamp: at(4), message: 'boom' });

    assert.deepStrictEqual(collector.collect().events, [
      { type: 'COMMAND_FAILED', timestamp: at(3), details: 'SET_PROCESSOR_SPEED: Processor not found: 3' },
      { type: 'TICK_ERROR', timestamp: at(4), details: 'boom' },
    ]);
  });

  it('should return an empty report before any event', () => {
    const collector = createReportCollector({ now: () => at(9) });

    const report = collector.collect();

    assert.strictEqual(report.algorithm, null);
    assert.deepStrictEqual(report.period, { start: at(9), end: at(9) });
    assert.strictEqual(report.ticks, 0);
    assert.strictEqual(report.meanAverageLoad, 0);
    assert.deepStrictEqual(report.processors, []);
  });

  it('should follow an emitter until detached', () => {
    const emitter = createSimulationEmitter();
    const collector = createReportCollector();

    const detach = collector.attach(emitter);
    emitter.emit(tick(1, makeSnapshot({ tick: 1, loads: [10] })));
    detach();
    emitter.emit(tick(2, makeSnapshot({ tick: 2, loads: [10] })));

    assert.strictEqual(collector.collect().ticks, 1);
  });
});
