import { ConfigurationError } from '../errors';
import type { RandomSource } from '../utils/random';

export interface RevisionOutcome {
  readonly currentTask: number;
  readonly nextTask: number;
  readonly switched: boolean;
  /** Categorical distribution; index `currentTask` holds the stay probability. */
  readonly probabilities: readonly number[];
}

/**
 * Pairwise proportional imitation:
 *   P(i → j) = ρ · [p_j − p_i]₊,  P(stay) = 1 − ρ · Σ_{j≠i} [p_j − p_i]₊
 *
 * A negative stay probability means ρ is too large for the payoffs reached;
 * that is reported as a configuration error instead of being renormalised.
 */
export function switchProbabilities(currentTask: number, payoffs: readonly number[], rho: number): number[] {
  if (!Number.isInteger(currentTask) || currentTask < 0 || currentTask >= payoffs.length) {
    throw new RangeError(`Task ${currentTask} is outside [0, ${payoffs.length})`);
  }
  const current = payoffs[currentTask];
  const probabilities = payoffs.map(() => 0);
  let switchMass = 0;
  for (let task = 0; task < payoffs.length; task += 1) {
    if (task === currentTask) {
      continue;
    }
    const gain = Math.max(payoffs[task] - current, 0);
    probabilities[task] = rho * gain;
    switchMass += probabilities[task];
  }
  const stay = 1 - switchMass;
  if (stay < 0) {
    throw new ConfigurationError('Revision protocol constant is too large for the reached payoffs', [
      `rho=${rho} yields P(stay)=${stay} for task ${currentTask} with payoffs [${payoffs.join(', ')}]`
    ]);
  }
  probabilities[currentTask] = stay;
  return probabilities;
}

/**
 * Draws one outcome with a single uniform variate, scanning tasks in ascending
 * order. A draw left uncovered by rounding resolves to staying.
 */
export function sampleRevision(probabilities: readonly number[], currentTask: number, random: RandomSource): number {
  const draw = random.next();
  let cumulative = 0;
  for (let task = 0; task < probabilities.length; task += 1) {
    cumulative += probabilities[task];
    if (draw < cumulative) {
      return task;
    }
  }
  return currentTask;
}

export function reviseTask(
  currentTask: number,
  payoffs: readonly number[],
  rho: number,
  random: RandomSource
): RevisionOutcome {
  const probabilities = switchProbabilities(currentTask, payoffs, rho);
  const nextTask = sampleRevision(probabilities, currentTask, random);
  return {
    currentTask,
    nextTask,
    switched: nextTask !== currentTask,
    probabilities
  };
}

/**
 * Largest ρ that keeps P(stay) ≥ 0 whenever every payoff gap stays within
 * `payoffBound`.
 */
export function maxSafeRho(taskCount: number, payoffBound: number): number {
  if (taskCount <= 1 || payoffBound <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return 1 / ((taskCount - 1) * payoffBound);
}
