import test from 'node:test';
import assert from 'node:assert/strict';
import { equilibriumReport, initialShares } from '../src/analysis';
import { consumptionRate } from '../src/models/consumption';
import { closeTo, twoTaskConfig } from './test-utils';

test('initial shares follow the configured assignment', () => {
  const config = twoTaskConfig({ agents: { count: 4, initialAssignment: 'first-task' } });
  assert.deepEqual(initialShares(config), [1, 0]);
});

test('equilibrium report lists the uniform and initial resting levels', () => {
  const config = twoTaskConfig({ agents: { count: 4, initialAssignment: 'first-task' } });
  const report = equilibriumReport(config);
  assert.equal(report.tasks.length, 2);

  const [first, second] = report.tasks;
  assert.equal(first.uniformShare, 0.5);
  assert(first.uniformLevel !== null);
  assert(closeTo(consumptionRate(config.taskParams[0], first.uniformLevel, 0.5), 0.5, 1e-9));
  assert.equal(first.initialShare, 1);
  assert(first.initialLevel !== null);
  assert(first.initialLevel < first.uniformLevel);
  assert.equal(second.initialShare, 0);
  assert.equal(second.initialLevel, null);

  assert(report.uniformPayoffs !== null);
  assert.equal(report.uniformPayoffs[0], report.uniformPayoffs[1]);
});

test('no uniform payoffs when a task cannot balance its growth', () => {
  const config = twoTaskConfig({
    tasks: {
      count: 2,
      consumption: { R: [3.44, 3.44], alpha: [0.5, 0.5], beta: [0.91, 0.91] },
      growthRates: [0.5, 3]
    }
  });
  const report = equilibriumReport(config);
  assert.equal(report.tasks[1].uniformLevel, null);
  assert.equal(report.uniformPayoffs, null);
});
