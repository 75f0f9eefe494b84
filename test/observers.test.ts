import test from 'node:test';
import assert from 'node:assert/strict';
import pino from 'pino';
import { LoggingObserver } from '../src/core/observers';
import type { RevisionRecord } from '../src/core/types';
import { makeSnapshot } from './test-utils';

interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

function memoryLogger() {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug', base: null, timestamp: false },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      }
    }
  );
  return { logger, lines };
}

function revision(switched: boolean): RevisionRecord {
  return {
    time: 1.5,
    agentId: 2,
    fromTask: 0,
    toTask: switched ? 1 : 0,
    switched,
    payoffs: [0.2, 0.4],
    outcome: { currentTask: 0, nextTask: switched ? 1 : 0, switched, probabilities: [0.96, 0.04] }
  };
}

test('every n-th tick is logged at info, the rest at debug', () => {
  const { logger, lines } = memoryLogger();
  const observer = new LoggingObserver({ logger, tickEvery: 3 });
  for (let index = 0; index < 7; index += 1) {
    observer.onTick(makeSnapshot(index / 10, [0.5, 0.5]));
  }
  assert.deepEqual(
    lines.map((line) => [line.msg, line.level]),
    [
      ['tick', 30],
      ['tick', 20],
      ['tick', 20],
      ['tick', 30],
      ['tick', 20],
      ['tick', 20],
      ['tick', 30]
    ]
  );
  assert.deepEqual(lines[3].population, [0.5, 0.5]);
  assert.equal(lines[3].time, 0.3);
});

test('only switching revisions are logged', () => {
  const { logger, lines } = memoryLogger();
  const observer = new LoggingObserver({ logger });
  observer.onRevision(revision(false));
  observer.onRevision(revision(true));
  assert.deepEqual(lines, [{ level: 20, msg: 'task_switch', time: 1.5, agentId: 2, fromTask: 0, toTask: 1 }]);
});

test('failures warn and growth-rate changes are logged at info', () => {
  const { logger, lines } = memoryLogger();
  const observer = new LoggingObserver({ logger });
  const snapshot = { ...makeSnapshot(4, [0.5, 0.5]), liveAgents: 7 };
  observer.onFailure({ time: 4, agentId: 3, task: 1, cause: 'scheduled' }, snapshot);
  observer.onGrowthRateChange({ time: 5, task: 0, previousRate: 0.5, rate: 5 });
  observer.onStateChange({ time: 6, from: 'running', to: 'terminated', reason: 'horizon' });
  assert.deepEqual(lines, [
    { level: 40, msg: 'agent_failure', time: 4, agentId: 3, task: 1, cause: 'scheduled', liveAgents: 7 },
    { level: 30, msg: 'growth_rate_change', time: 5, task: 0, previousRate: 0.5, rate: 5 },
    { level: 30, msg: 'state_change', time: 6, from: 'running', to: 'terminated', reason: 'horizon' }
  ]);
});
