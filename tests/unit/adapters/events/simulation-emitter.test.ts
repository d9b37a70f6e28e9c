import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createSimulationEmitter } from '../../../../src/adapters/events/simulation-emitter-impl.ts';
import { LoadBalancer } from '../../../../src/core/balancer/load-balancer.ts';
import { SimulationEventType, type SimulationEvent } from '../../../../src/types/simulation-event.ts';

const snapshotEvent = (): SimulationEvent => ({
  type: SimulationEventType.TICK,
  timestamp: new Date(0),
  snapshot: new LoadBalancer({ numProcessors: 1 }).snapshot({ active: true, paused: false }),
});

describe('SimulationEmitter', () => {
  it('should deliver events to every subscriber', () => {
    const emitter = createSimulationEmitter();
    const first: string[] = [];
    const second: string[] = [];
    emitter.subscribe((e) => {
      first.push(e.type);
    });
    emitter.subscribe((e) => {
      second.push(e.type);
    });

    emitter.emit({ type: SimulationEventType.PAUSED, timestamp: new Date(0) });

    assert.deepStrictEqual(first, [SimulationEventType.PAUSED]);
    assert.deepStrictEqual(second, [SimulationEventType.PAUSED]);
  });

  it('should remember the last snapshot until reset', () => {
    const emitter = createSimulationEmitter();
    assert.strictEqual(emitter.getLastSnapshot(), null);

    const event = snapshotEvent();
    emitter.emit(event);
    emitter.emit({ type: SimulationEventType.RESUMED, timestamp: new Date(0) });

    assert.ok(event.type === SimulationEventType.TICK);
    assert.strictEqual(emitter.getLastSnapshot(), event.snapshot);

    emitter.reset();
    assert.strictEqual(emitter.getLastSnapshot(), null);
  });

  it('should keep delivering when a handler throws', (t) => {
    const errorMock = t.mock.method(console, 'error', () => {});
    const emitter = createSimulationEmitter();
    const received: string[] = [];
    emitter.subscribe(() => {
      throw new Error('render failed');
    });
    emitter.subscribe((e) => {
      received.push(e.type);
    });

    emitter.emit({ type: SimulationEventType.PAUSED, timestamp: new Date(0) });

    assert.deepStrictEqual(received, [SimulationEventType.PAUSED]);
    assert.strictEqual(errorMock.mock.callCount(), 1);
    assert.strictEqual(errorMock.mock.calls[0]?.arguments[0], '[SimulationEmitter] Handler error:');
  });

  it('should stop delivering after unsubscribe', () => {
    const emitter = createSimulationEmitter();
    let count = 0;
    const unsubscribe = emitter.subscribe(() => {
      count++;
    });

    emitter.emit({ type: SimulationEventType.PAUSED, timestamp: new Date(0) });
    unsubscribe();
    emitter.emit({ type: SimulationEventType.RESUMED, timestamp: new Date(0) });

    assert.strictEqual(count, 1);
  });
});
