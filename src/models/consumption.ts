export interface ConsumptionParams {
  /** Saturated consumption rate R_i. */
  readonly R: number;
  /** Resource sensitivity α_i. */
  readonly alpha: number;
  /** Population exponent β_i. */
  readonly beta: number;
}

/**
 * x^β with the boundary pinned to zero: an empty task consumes nothing, for
 * every β including β = 0 and β < 0.
 */
export function populationFactor(x: number, beta: number): number {
  if (x <= 0) {
    return 0;
  }
  return Math.pow(x, beta);
}

/**
 * F_i(q, x) = R · (e^{αq} − 1)/(e^{αq} + 1) · x^β, written as R · tanh(αq/2) · x^β
 * so that large |q| saturates instead of overflowing.
 */
export function consumptionRate(params: ConsumptionParams, q: number, x: number): number {
  const factor = populationFactor(x, params.beta);
  if (factor === 0) {
    return 0;
  }
  return params.R * Math.tanh((params.alpha * q) / 2) * factor;
}

/** q̇ = −F(q, x) + w */
export function resourceDerivative(params: ConsumptionParams, growthRate: number, q: number, x: number): number {
  return growthRate - consumptionRate(params, q, x);
}

/**
 * Resource level q* at which consumption balances growth for a frozen share x.
 * Returns null when the task can never balance (nobody serves it, or growth
 * exceeds the saturated consumption R · x^β).
 */
export function equilibriumResourceLevel(params: ConsumptionParams, growthRate: number, x: number): number | null {
  const capacity = params.R * populationFactor(x, params.beta);
  if (capacity <= 0) {
    return null;
  }
  const ratio = growthRate / capacity;
  if (!(Math.abs(ratio) < 1)) {
    return null;
  }
  return (2 / params.alpha) * Math.atanh(ratio);
}

/**
 * Upper bound of |∂F/∂q| over every reachable share (x ≥ 1/N). Used to check
 * the RK4 step against the fastest resource time constant.
 */
export function stiffnessBound(params: readonly ConsumptionParams[], agentCount: number): number {
  let bound = 0;
  for (const task of params) {
    const worstShare = task.beta >= 0 ? 1 : Math.pow(Math.max(agentCount, 1), -task.beta);
    bound = Math.max(bound, (task.R * task.alpha * worstShare) / 2);
  }
  return bound;
}
