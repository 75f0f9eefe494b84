import test from 'node:test';
import assert from 'node:assert/strict';
import { PopulationStateTracker } from '../src/core/populationState';
import { NumericalInstabilityError, SimulationStateError } from '../src/errors';
import { closeTo, sum } from './test-utils';

const params = { R: 3.44, alpha: 0.5, beta: 0.91 };

function tracker(initialTasks: number[], taskCount = 2): PopulationStateTracker {
  return new PopulationStateTracker({
    params: Array.from({ length: taskCount }, () => params),
    growthRates: new Array<number>(taskCount).fill(0.5),
    initialResources: new Array<number>(taskCount).fill(0),
    initialTasks
  });
}

test('population shares follow the initial assignment', () => {
  const state = tracker([0, 1, 0, 1]);
  assert.deepEqual(state.populationShares(), [0.5, 0.5]);
  assert.equal(state.liveAgents, 4);
  assert.deepEqual(state.liveAgentIds(), [0, 1, 2, 3]);
});

test('task changes move one unit of mass and keep shares summing to one', () => {
  const state = tracker([0, 0, 0, 1, 2], 3);
  const move = state.applyTaskChange(1, 2);
  assert.deepEqual(move, { agentId: 1, fromTask: 0, toTask: 2 });
  assert.equal(state.taskOf(1), 2);
  assert.deepEqual(state.snapshot().counts, [2, 1, 2]);
  assert(closeTo(sum(state.populationShares()), 1, 1e-12));
});

test('removing an agent renormalises the shares over the survivors', () => {
  const state = tracker([0, 0, 1, 1]);
  assert.equal(state.removeAgent(0), 0);
  assert.equal(state.liveAgents, 3);
  assert.equal(state.isAlive(0), false);
  const shares = state.populationShares();
  assert(closeTo(shares[0], 1 / 3, 1e-12));
  assert(closeTo(shares[1], 2 / 3, 1e-12));
  assert.equal(state.removeAgent(0), null);
  assert.throws(() => state.applyTaskChange(0, 1), SimulationStateError);
});

test('shares are all zero once every agent has failed', () => {
  const state = tracker([0, 1]);
  state.removeAgent(0);
  state.removeAgent(1);
  assert.deepEqual(state.populationShares(), [0, 0]);
});

test('integration advances time and cannot go backwards', () => {
  const state = tracker([0, 1]);
  state.applyResourceIntegration(1, 0.01);
  assert.equal(state.currentTime, 1);
  assert(state.snapshot().resources[0] > 0);
  assert.throws(() => state.applyResourceIntegration(0.5, 0.01), RangeError);
  const before = state.snapshot();
  state.applyResourceIntegration(1, 0.01);
  assert.deepEqual(state.snapshot(), before);
});

test('a diverging integration commits nothing', () => {
  const state = tracker([0, 1]);
  state.applyResourceIntegration(1, 0.01);
  const before = state.snapshot();
  state.setGrowthRate(1, Number.MAX_VALUE);
  assert.throws(() => state.applyResourceIntegration(2, 0.01), NumericalInstabilityError);
  assert.deepEqual(state.snapshot().resources, before.resources);
  assert.equal(state.currentTime, 1);
});

test('snapshots are frozen copies', () => {
  const state = tracker([0, 1]);
  const snapshot = state.snapshot();
  assert(Object.isFrozen(snapshot));
  assert(Object.isFrozen(snapshot.population));
  state.applyTaskChange(0, 1);
  assert.deepEqual(snapshot.counts, [1, 1]);
});

test('growth rate updates return the previous rate', () => {
  const state = tracker([0, 1]);
  assert.equal(state.setGrowthRate(0, 5), 0.5);
  assert.deepEqual(state.snapshot().growthRates, [5, 0.5]);
  assert.throws(() => state.setGrowthRate(2, 1), RangeError);
});

test('unknown agents and tasks are rejected', () => {
  const state = tracker([0, 1]);
  assert.throws(() => state.taskOf(5), RangeError);
  assert.throws(() => state.applyTaskChange(0, 3), RangeError);
  assert.throws(() => tracker([0, 2]), RangeError);
});
