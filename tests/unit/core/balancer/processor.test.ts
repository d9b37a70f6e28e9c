import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Processor, HISTORY_LIMIT } from '../../../../src/core/balancer/processor.ts';
import { createTask, type Task } from '../../../../src/types/task.ts';
import { taskId, processorId } from '../../../../src/types/branded.ts';
import { createRNG } from '../../../../src/core/generator/random.ts';

const makeTask = (id: number, load: number, executionTime: number): Task =>
  createTask(taskId(id), { load, executionTime });

describe('Processor', () => {
  describe('load accounting', () => {
    it('should keep currentLoad equal to the sum of owned task loads', () => {
      const processor = new Processor(processorId(0));
      const first = makeTask(0, 30, 5);
      const second = makeTask(1, 20, 5);

      processor.addTask(first);
      processor.addTask(second);
      assert.strictEqual(processor.currentLoad, 50);
      assert.strictEqual(processor.taskCount, 2);

      assert.strictEqual(processor.removeTask(first), true);
      assert.strictEqual(processor.currentLoad, 20);
      assert.strictEqual(processor.taskCount, 1);
    });

    it('should keep currentLoad equal to the owned loads across a long mixed sequence', () => {
      const processor = new Processor(processorId(0), { processingSpeed: 0.75 });
      const rng = createRNG(7);
      let nextId = 0;
      let completedCount = 0;
      let drainCalls = 0;

      const assertBalanced = (step: number): void => {
        const expected = processor.tasks.reduce((sum, task) => sum + task.load, 0);
        assert.ok(
          Math.abs(processor.currentLoad - expected) < 1e-9,
          `step ${step}: currentLoad ${processor.currentLoad} != ${expected}`,
        );
      };

      for (let step = 0; step < 500; step++) {
        const roll = rng();
        if (roll < 0.45) {
          // 小数を含む負荷（0.1刻みの丸め誤差が蓄積しうる値）
          processor.addTask(makeTask(nextId++, Math.round(rng() * 400) / 10 + 0.1, 1 + rng() * 6));
        } else if (roll < 0.65) {
          const owned = processor.tasks;
          const target = owned[Math.floor(rng() * owned.length)];
          if (target !== undefined) {
            assert.strictEqual(processor.removeTask(target), true);
          }
        } else if (roll < 0.7) {
          // 保持していないタスクの除去は何もしない
          assert.strictEqual(processor.removeTask(makeTask(-1, 12.3, 1)), false);
        } else if (roll < 0.97) {
          completedCount += processor.processTick().length;
        } else {
          processor.drainTasks();
          drainCalls++;
          assert.strictEqual(processor.taskCount, 0);
        }
        assertBalanced(step);
      }

      // 完了と全取り出しの両方が実際に起きていること
      assert.ok(completedCount > 0);
      assert.ok(drainCalls > 0);
    });

    it('should ignore removal of a task it does not own', () => {
      const processor = new Processor(processorId(0));
      processor.addTask(makeTask(0, 30, 5));

      assert.strictEqual(processor.removeTask(makeTask(99, 30, 5)), false);
      assert.strictEqual(processor.currentLoad, 30);
      assert.strictEqual(processor.taskCount, 1);
    });

    it('should allow over-subscription with negative available capacity', () => {
      const processor = new Processor(processorId(0));
      processor.addTask(makeTask(0, 70, 5));
      processor.addTask(makeTask(1, 50, 5));

      assert.strictEqual(processor.currentLoad, 120);
      assert.strictEqual(processor.availableCapacity(), -20);
    });

    it('should use the configured capacity and speed', () => {
      const processor = new Processor(processorId(3), { capacity: 50, processingSpeed: 2 });

      assert.strictEqual(processor.capacity, 50);
      assert.strictEqual(processor.processingSpeed, 2);
      assert.strictEqual(processor.availableCapacity(), 50);
    });
  });

  describe('processTick', () => {
    it('should complete a 5-tick task after exactly 5 ticks at speed 1', () => {
      const processor = new Processor(processorId(0));
      const task = makeTask(0, 30, 5);
      processor.addTask(task);

      for (let tick = 1; tick <= 4; tick++) {
        assert.deepStrictEqual(processor.processTick(), [], `tick ${tick} should not complete the task`);
        assert.strictEqual(task.remainingTime, 5 - tick);
      }

      const completed = processor.processTick();
      assert.strictEqual(completed.length, 1);
      assert.strictEqual(completed[0]?.id, task.id);
      assert.strictEqual(processor.currentLoad, 0);
      assert.strictEqual(processor.taskCount, 0);
      assert.deepStrictEqual(processor.loadHistory(), [30, 30, 30, 30, 0]);
    });

    it('should advance tasks by the processing speed', () => {
      const processor = new Processor(processorId(0), { processingSpeed: 2 });
      processor.addTask(makeTask(0, 10, 5));

      assert.strictEqual(processor.processTick().length, 0);
      assert.strictEqual(processor.processTick().length, 0);
      assert.strictEqual(processor.processTick().length, 1);
    });

    it('should never complete tasks at speed 0', () => {
      const processor = new Processor(processorId(0), { processingSpeed: 0 });
      processor.addTask(makeTask(0, 10, 1));

      for (let i = 0; i < 10; i++) {
        processor.processTick();
      }

      assert.strictEqual(processor.taskCount, 1);
      assert.strictEqual(processor.tasks[0]?.remainingTime, 1);
    });

    it('should append one history sample even without tasks', () => {
      const processor = new Processor(processorId(0));

      processor.processTick();

      assert.strictEqual(processor.currentLoad, 0);
      assert.deepStrictEqual(processor.loadHistory(), [0]);
    });

    it('should cap history and evict the oldest samples first', () => {
      const processor = new Processor(processorId(0));

      // 毎tick負荷1の長時間タスクを追加して、履歴を 1, 2, ..., 120 にする
      for (let i = 0; i < 120; i++) {
        processor.addTask(makeTask(i, 1, 1000));
        processor.processTick();
      }

      const history = processor.loadHistory();
      assert.strictEqual(history.length, HISTORY_LIMIT);
      assert.strictEqual(history[0], 21);
      assert.strictEqual(history[history.length - 1], 120);
    });
  });

  describe('recentAverageLoad', () => {
    it('should return 0 without history', () => {
      assert.strictEqual(new Processor(processorId(0)).recentAverageLoad(), 0);
    });

    it('should average the most recent window of samples', () => {
      const processor = new Processor(processorId(0));
      for (let i = 0; i < 20; i++) {
        processor.addTask(makeTask(i, 1, 1000));
        processor.processTick();
      }

      // 直近10件は 11..20
      assert.strictEqual(processor.recentAverageLoad(10), 15.5);
      // 履歴が窓より短い場合はある分だけで平均
      assert.strictEqual(processor.recentAverageLoad(40), 10.5);
    });
  });

  describe('drainTasks', () => {
    it('should remove and return every owned task', () => {
      const processor = new Processor(processorId(0));
      processor.addTask(makeTask(0, 10, 5));
      processor.addTask(makeTask(1, 15, 5));

      const drained = processor.drainTasks();

      assert.deepStrictEqual(
        drained.map((t) => t.id),
        [taskId(0), taskId(1)],
      );
      assert.strictEqual(processor.currentLoad, 0);
      assert.strictEqual(processor.taskCount, 0);
    });
  });

  describe('toSnapshot', () => {
    it('should copy the processor state', () => {
      const processor = new Processor(processorId(2), { capacity: 80, processingSpeed: 1.5 });
      processor.addTask(makeTask(0, 25, 10));
      processor.processTick();

      const snapshot = processor.toSnapshot();

      assert.deepStrictEqual(snapshot, {
        id: processorId(2),
        currentLoad: 25,
        capacity: 80,
        taskCount: 1,
        history: [25],
        processingSpeed: 1.5,
      });

      processor.processTick();
      assert.deepStrictEqual(snapshot.history, [25]);
    });
  });
});
