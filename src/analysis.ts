import type { NormalisedSimulationConfig } from './config';
import { equilibriumResourceLevel } from './models/consumption';
import { payoffVector } from './models/payoff';

export interface TaskEquilibrium {
  readonly task: number;
  readonly growthRate: number;
  readonly uniformShare: number;
  /** q* for the uniform split; null when the task cannot balance growth. */
  readonly uniformLevel: number | null;
  readonly initialShare: number;
  readonly initialLevel: number | null;
}

export interface EquilibriumReport {
  readonly tasks: readonly TaskEquilibrium[];
  /** Payoffs with every task at its uniform-split q*, when all exist. */
  readonly uniformPayoffs: readonly number[] | null;
}

export function initialShares(config: NormalisedSimulationConfig): number[] {
  const counts = new Array<number>(config.tasks.count).fill(0);
  for (const task of config.initialTasks) {
    counts[task] += 1;
  }
  return counts.map((count) => count / config.initialTasks.length);
}

/** Closed-form resting points of the resource dynamics for two frozen splits. */
export function equilibriumReport(config: NormalisedSimulationConfig): EquilibriumReport {
  const uniformShare = 1 / config.tasks.count;
  const shares = initialShares(config);
  const tasks = config.taskParams.map((params, task) => {
    const growthRate = config.tasks.growthRates[task];
    return {
      task,
      growthRate,
      uniformShare,
      uniformLevel: equilibriumResourceLevel(params, growthRate, uniformShare),
      initialShare: shares[task],
      initialLevel: equilibriumResourceLevel(params, growthRate, shares[task])
    };
  });

  const levels: number[] = [];
  for (const entry of tasks) {
    if (entry.uniformLevel === null) {
      return { tasks, uniformPayoffs: null };
    }
    levels.push(entry.uniformLevel);
  }
  const uniformPayoffs = payoffVector(
    {
      params: config.taskParams,
      growthRates: config.tasks.growthRates,
      resources: levels,
      population: tasks.map(() => uniformShare)
    },
    config.payoff
  );
  return { tasks, uniformPayoffs };
}
