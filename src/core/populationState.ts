import { NumericalInstabilityError, SimulationStateError } from '../errors';
import type { ConsumptionParams } from '../models/consumption';
import { integrateResources } from '../models/resourceDynamics';
import type { PopulationSnapshot } from './types';

export interface PopulationStateInit {
  readonly params: readonly ConsumptionParams[];
  readonly growthRates: readonly number[];
  readonly initialResources: readonly number[];
  /** Initial task of every agent, indexed by agent id. */
  readonly initialTasks: readonly number[];
}

export interface TaskMove {
  readonly agentId: number;
  readonly fromTask: number;
  readonly toTask: number;
}

/**
 * Sole owner of the mutable simulation state: resource levels q, growth
 * rates w and agent assignments (from which the population shares x are
 * derived). Every mutation goes through one of the apply* methods so a
 * reader never sees a half-applied update.
 */
export class PopulationStateTracker {
  private readonly params: readonly ConsumptionParams[];
  private readonly resources: number[];
  private readonly growthRates: number[];
  private readonly counts: number[];
  private readonly assignments: number[];
  private readonly alive: boolean[];
  private liveCount: number;
  private time = 0;

  constructor(init: PopulationStateInit) {
    const taskCount = init.params.length;
    if (taskCount === 0) {
      throw new RangeError('At least one task is required');
    }
    if (init.growthRates.length !== taskCount || init.initialResources.length !== taskCount) {
      throw new RangeError('Growth rates and initial resources need one entry per task');
    }
    this.params = init.params.map((entry) => ({ ...entry }));
    this.resources = init.initialResources.slice();
    this.growthRates = init.growthRates.slice();
    this.counts = new Array<number>(taskCount).fill(0);
    this.assignments = [];
    this.alive = [];
    for (const task of init.initialTasks) {
      this.assertTask(task);
      this.assignments.push(task);
      this.alive.push(true);
      this.counts[task] += 1;
    }
    this.liveCount = this.assignments.length;
  }

  get taskCount(): number {
    return this.params.length;
  }

  get agentCount(): number {
    return this.assignments.length;
  }

  get liveAgents(): number {
    return this.liveCount;
  }

  get currentTime(): number {
    return this.time;
  }

  get consumptionParams(): readonly ConsumptionParams[] {
    return this.params;
  }

  taskOf(agentId: number): number {
    this.assertAgent(agentId);
    return this.assignments[agentId];
  }

  isAlive(agentId: number): boolean {
    this.assertAgent(agentId);
    return this.alive[agentId];
  }

  liveAgentIds(): number[] {
    const ids: number[] = [];
    for (let agentId = 0; agentId < this.alive.length; agentId += 1) {
      if (this.alive[agentId]) {
        ids.push(agentId);
      }
    }
    return ids;
  }

  populationShares(): number[] {
    if (this.liveCount === 0) {
      return this.counts.map(() => 0);
    }
    return this.counts.map((count) => count / this.liveCount);
  }

  snapshot(): PopulationSnapshot {
    return Object.freeze({
      time: this.time,
      resources: Object.freeze(this.resources.slice()),
      population: Object.freeze(this.populationShares()),
      counts: Object.freeze(this.counts.slice()),
      growthRates: Object.freeze(this.growthRates.slice()),
      liveAgents: this.liveCount
    });
  }

  /** Moves one live agent (one unit of population mass) to another task. */
  applyTaskChange(agentId: number, toTask: number): TaskMove {
    this.assertAgent(agentId);
    this.assertTask(toTask);
    if (!this.alive[agentId]) {
      throw new SimulationStateError(`Agent ${agentId} has failed and cannot change task`);
    }
    const fromTask = this.assignments[agentId];
    if (fromTask !== toTask) {
      this.counts[fromTask] -= 1;
      this.counts[toTask] += 1;
      this.assignments[agentId] = toTask;
    }
    return { agentId, fromTask, toTask };
  }

  /**
   * Integrates every task's resource level from the current time up to
   * `toTime` with the present population shares. Nothing is committed unless
   * all tasks stay finite.
   */
  applyResourceIntegration(toTime: number, maxStep: number): void {
    if (!Number.isFinite(toTime)) {
      throw new NumericalInstabilityError(`Integration target time is not finite (${toTime})`);
    }
    if (toTime < this.time) {
      throw new RangeError(`Cannot integrate backwards from ${this.time} to ${toTime}`);
    }
    if (toTime === this.time) {
      return;
    }
    const next = integrateResources(
      {
        params: this.params,
        growthRates: this.growthRates,
        resources: this.resources,
        population: this.populationShares()
      },
      toTime - this.time,
      { maxStep, startTime: this.time }
    );
    for (let task = 0; task < next.length; task += 1) {
      this.resources[task] = next[task];
    }
    this.time = toTime;
  }

  /** Permanently removes a failed agent together with its population mass. */
  removeAgent(agentId: number): number | null {
    this.assertAgent(agentId);
    if (!this.alive[agentId]) {
      return null;
    }
    const task = this.assignments[agentId];
    this.alive[agentId] = false;
    this.counts[task] -= 1;
    this.liveCount -= 1;
    return task;
  }

  setGrowthRate(task: number, rate: number): number {
    this.assertTask(task);
    if (!Number.isFinite(rate)) {
      throw new NumericalInstabilityError(`Growth rate for task ${task} must be finite (received ${rate})`, { task });
    }
    const previous = this.growthRates[task];
    this.growthRates[task] = rate;
    return previous;
  }

  private assertAgent(agentId: number): void {
    if (!Number.isInteger(agentId) || agentId < 0 || agentId >= this.assignments.length) {
      throw new RangeError(`Unknown agent ${agentId}`);
    }
  }

  private assertTask(task: number): void {
    if (!Number.isInteger(task) || task < 0 || task >= this.params.length) {
      throw new RangeError(`Task ${task} is outside [0, ${this.params.length})`);
    }
  }
}
