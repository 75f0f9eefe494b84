import test from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  applyEnvironmentOverrides,
  loadSimulationConfig,
  parseSimulationConfig,
  resolveInitialTasks
} from '../src/config';
import { ConfigurationError } from '../src/errors';
import { fixturePath, TWO_TASK_INPUT, twoTaskConfig } from './test-utils';

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new assert.AssertionError({ message: 'expected a ConfigurationError' });
}

test('fills defaults and resolves derived fields', () => {
  const config = parseSimulationConfig({ ...TWO_TASK_INPUT, seed: undefined });
  assert.equal(config.seed, 1337);
  assert.equal(config.dynamics.tickInterval, 0.1);
  assert.equal(config.dynamics.maxStep, 0.01);
  assert.equal(config.payoff.nu, 0);
  assert.deepEqual(config.initialTasks, [0, 1, 0, 1, 0, 1, 0, 1, 0, 1]);
  assert.deepEqual(config.initialResources, [0, 0]);
  assert.deepEqual(config.taskParams[1], { R: 3.44, alpha: 0.5, beta: 0.91 });
  assert.deepEqual(config.schedule, { growthRateChanges: [], failures: [] });
});

test('initial assignment strategies', () => {
  assert.deepEqual(resolveInitialTasks('round-robin', 5, 3), [0, 1, 2, 0, 1]);
  assert.deepEqual(resolveInitialTasks('first-task', 3, 3), [0, 0, 0]);
  assert.deepEqual(resolveInitialTasks([2, 1], 2, 3), [2, 1]);
});

test('rejects a non-positive revision rate', () => {
  const issues = issuesOf(() => twoTaskConfig({ revision: { rate: 0, rho: 0.2 } }));
  assert(issues.some((issue) => issue.startsWith('revision.rate:')));
});

test('rejects an empty population', () => {
  const issues = issuesOf(() => twoTaskConfig({ agents: { count: 0 } }));
  assert(issues.some((issue) => issue.startsWith('agents.count:')));
});

test('rejects per-task arrays that do not match the task count', () => {
  const issues = issuesOf(() =>
    twoTaskConfig({
      tasks: {
        count: 2,
        consumption: { R: [3.44, 3.44], alpha: [0.5, 0.5], beta: [0.91, 0.91] },
        growthRates: [0.5]
      }
    })
  );
  assert.deepEqual(issues, ['tasks.growthRates has 1 entries but tasks.count is 2']);
});

test('rejects schedules that name unknown tasks or agents', () => {
  const issues = issuesOf(() =>
    twoTaskConfig({
      schedule: {
        growthRateChanges: [{ time: 1, task: 2, rate: 1 }],
        failures: [{ time: 1, agents: [10] }]
      }
    })
  );
  assert.deepEqual(issues, [
    'schedule.growthRateChanges[0] refers to unknown task 2',
    'schedule.failures[0] refers to unknown agent 10'
  ]);
});

test('a failure entry needs exactly one target form', () => {
  const issues = issuesOf(() =>
    twoTaskConfig({ schedule: { failures: [{ time: 1, agents: [0], count: 1 }] } })
  );
  assert.deepEqual(issues, ['schedule.failures.0: A failure entry needs exactly one of "agents" or "count"']);
});

test('rejects an integration step outside the stability region', () => {
  const issues = issuesOf(() =>
    twoTaskConfig({
      tasks: {
        count: 2,
        consumption: { R: [100, 100], alpha: [10, 10], beta: [1, 1] },
        growthRates: [0.5, 0.5]
      }
    })
  );
  assert.equal(issues.length, 1);
  assert(issues[0].startsWith('dynamics.maxStep=0.01 is outside the RK4 stability region'));
});

test('rejects a protocol constant above the static payoff bound', () => {
  const issues = issuesOf(() =>
    parseSimulationConfig({
      horizon: 10,
      agents: { count: 3 },
      tasks: {
        count: 3,
        consumption: { R: [1, 1, 1], alpha: [0.5, 0.5, 0.5], beta: [1, 1, 1] },
        growthRates: [0.5, 0.5, 0.5]
      },
      revision: { rate: 1, rho: 0.5, payoffBound: 2 }
    })
  );
  assert.deepEqual(issues, ['revision.rho=0.5 exceeds 0.25 allowed by payoffBound=2']);
});

test('rejects initial payoffs that already give a negative stay probability', () => {
  assert.throws(
    () =>
      twoTaskConfig({
        tasks: {
          count: 2,
          consumption: { R: [3.44, 3.44], alpha: [0.5, 0.5], beta: [0.91, 0.91] },
          growthRates: [0.5, 0.5],
          initialResources: [0, 10]
        }
      }),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message.startsWith('Revision protocol constant rejects the initial state') &&
      error.issues.length === 1
  );
});

test('environment overrides replace seed and horizon', () => {
  const raw = applyEnvironmentOverrides({ seed: 1, horizon: 5 }, { POPGAME_SEED: '9', POPGAME_HORIZON: '12.5' });
  assert.deepEqual(raw, { seed: 9, horizon: 12.5 });
  assert.deepEqual(applyEnvironmentOverrides({ seed: 1 }, {}), { seed: 1 });
  assert.equal(applyEnvironmentOverrides('not an object', { POPGAME_SEED: '9' }), 'not an object');
});

test('loads the YAML surge preset', async () => {
  const config = await loadSimulationConfig(fixturePath('four-task-surge.yaml'), {});
  assert.equal(config.seed, 7);
  assert.equal(config.tasks.count, 4);
  assert.equal(config.revision.rate, 0.125);
  assert.deepEqual(config.schedule.growthRateChanges, [
    { time: 500, task: 0, rate: 5 },
    { time: 600, task: 0, rate: 0.5 }
  ]);
  assert.deepEqual(config.initialTasks, [0, 1, 2, 3, 0, 1, 2, 3, 0, 1, 2, 3]);
});

test('loads the JSON failure preset', async () => {
  const config = await loadSimulationConfig(fixturePath('four-task-failures.json'), {});
  assert.equal(config.agents.count, 20);
  assert.equal(config.payoff.nu, 40);
  assert.equal(config.schedule.failures.length, 1);
  assert.equal(config.schedule.failures[0].count, 5);
  assert.equal(config.schedule.failures[0].time, 500);
});

test('loading applies environment overrides', async () => {
  const config = await loadSimulationConfig(fixturePath('symmetric-two-task.json'), {
    POPGAME_SEED: '99',
    POPGAME_HORIZON: '50'
  });
  assert.equal(config.seed, 99);
  assert.equal(config.horizon, 50);
  assert.equal(config.convergence?.metric, 'population-variance');
});

test('unparseable files raise a configuration error', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'popgame-config-'));
  try {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ not json', 'utf8');
    await assert.rejects(
      loadSimulationConfig(file, {}),
      (error: unknown) => error instanceof ConfigurationError && error.message.startsWith('Failed to parse configuration')
    );
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
