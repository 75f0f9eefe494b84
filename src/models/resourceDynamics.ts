import { NumericalInstabilityError } from '../errors';
import { ConsumptionParams, resourceDerivative } from './consumption';

export interface ResourceIntegrationInput {
  readonly params: readonly ConsumptionParams[];
  readonly growthRates: readonly number[];
  readonly resources: readonly number[];
  readonly population: readonly number[];
}

export interface IntegrationOptions {
  /** Upper bound on a single RK4 sub-step. */
  readonly maxStep: number;
  /** Simulation time at the start of the interval, only used for error reports. */
  readonly startTime?: number;
}

function rk4Step(params: ConsumptionParams, growthRate: number, q: number, x: number, h: number): number {
  const k1 = resourceDerivative(params, growthRate, q, x);
  const k2 = resourceDerivative(params, growthRate, q + (h / 2) * k1, x);
  const k3 = resourceDerivative(params, growthRate, q + (h / 2) * k2, x);
  const k4 = resourceDerivative(params, growthRate, q + h * k3, x);
  return q + (h / 6) * (k1 + 2 * k2 + 2 * k3 + k4);
}

export function subStepCount(duration: number, maxStep: number): number {
  if (duration <= 0) {
    return 0;
  }
  return Math.max(1, Math.ceil(duration / maxStep - 1e-9));
}

/**
 * Integrates q̇_i = −F_i(q_i, x_i) + w_i over `duration` with x held constant,
 * using classical fourth-order Runge–Kutta on equal sub-steps no longer than
 * `maxStep`. Tasks decouple once x is frozen, so each is integrated on its own.
 *
 * Throws NumericalInstabilityError as soon as any value leaves the finite range.
 */
export function integrateResources(
  input: ResourceIntegrationInput,
  duration: number,
  options: IntegrationOptions
): number[] {
  const { params, growthRates, resources, population } = input;
  if (params.length !== resources.length || params.length !== population.length || params.length !== growthRates.length) {
    throw new RangeError('Resource integration inputs must all have one entry per task');
  }
  if (!(options.maxStep > 0)) {
    throw new RangeError(`maxStep must be positive (received ${options.maxStep})`);
  }
  if (!(duration >= 0) || !Number.isFinite(duration)) {
    throw new RangeError(`Integration interval must be a finite non-negative number (received ${duration})`);
  }

  const next = resources.slice();
  const steps = subStepCount(duration, options.maxStep);
  if (steps === 0) {
    return next;
  }
  const h = duration / steps;

  for (let task = 0; task < next.length; task += 1) {
    let q = next[task];
    if (!Number.isFinite(q)) {
      throw new NumericalInstabilityError(`Resource level of task ${task} is not finite (${q})`, {
        task,
        time: options.startTime
      });
    }
    for (let step = 0; step < steps; step += 1) {
      q = rk4Step(params[task], growthRates[task], q, population[task], h);
      if (!Number.isFinite(q)) {
        throw new NumericalInstabilityError(`Resource level of task ${task} diverged during integration`, {
          task,
          time: options.startTime === undefined ? undefined : options.startTime + h * (step + 1)
        });
      }
    }
    next[task] = q;
  }
  return next;
}
