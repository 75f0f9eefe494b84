import { NumericalInstabilityError } from '../errors';
import { ConsumptionParams, consumptionRate } from './consumption';

export interface PayoffSettings {
  /** Weight ν of the model-based correction; 0 gives the purely reactive payoff. */
  readonly nu: number;
  /** Fixed reference resource level γ*. */
  readonly referenceLevel: number;
}

export interface PayoffInput {
  readonly params: readonly ConsumptionParams[];
  readonly growthRates: readonly number[];
  readonly resources: readonly number[];
  readonly population: readonly number[];
}

export function taskPayoff(
  params: ConsumptionParams,
  growthRate: number,
  q: number,
  x: number,
  settings: PayoffSettings
): number {
  if (settings.nu === 0) {
    return q;
  }
  return q + settings.nu * (-consumptionRate(params, settings.referenceLevel, x) + growthRate);
}

/**
 * p_i(t) = q_i(t) + ν(−F_i(γ*, x_i) + w_i) for every task. Must be called with
 * the state current at the revision instant; the result is never cached.
 */
export function payoffVector(input: PayoffInput, settings: PayoffSettings): number[] {
  return input.resources.map((q, task) => {
    const payoff = taskPayoff(input.params[task], input.growthRates[task], q, input.population[task], settings);
    if (!Number.isFinite(payoff)) {
      throw new NumericalInstabilityError(`Payoff of task ${task} is not finite (${payoff})`, { task });
    }
    return payoff;
  });
}
