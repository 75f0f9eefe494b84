import type { PopulationSnapshot } from './types';

export type ConvergenceMetric = 'population-variance' | 'payoff-gap';

export interface ConvergenceSettings {
  readonly metric: ConvergenceMetric;
  readonly threshold: number;
  /** Simulated time the metric must stay at or under the threshold. */
  readonly holdDuration: number;
}

export function populationVariance(shares: readonly number[]): number {
  if (shares.length === 0) {
    return 0;
  }
  const mean = shares.reduce((acc, value) => acc + value, 0) / shares.length;
  return shares.reduce((acc, value) => acc + (value - mean) ** 2, 0) / shares.length;
}

export function payoffGap(payoffs: readonly number[]): number {
  if (payoffs.length === 0) {
    return 0;
  }
  return Math.max(...payoffs) - Math.min(...payoffs);
}

export class ConvergenceMonitor {
  private holdStartedAt: number | null = null;
  private lastValue: number | null = null;

  constructor(private readonly settings: ConvergenceSettings) {}

  get metric(): ConvergenceMetric {
    return this.settings.metric;
  }

  get latestValue(): number | null {
    return this.lastValue;
  }

  /**
   * Feeds one observation. Returns the start of the hold window once the
   * metric has stayed under the threshold for `holdDuration`, otherwise null.
   */
  evaluate(snapshot: PopulationSnapshot, payoffs: readonly number[]): number | null {
    const value =
      this.settings.metric === 'population-variance' ? populationVariance(snapshot.population) : payoffGap(payoffs);
    this.lastValue = value;
    if (value > this.settings.threshold) {
      this.holdStartedAt = null;
      return null;
    }
    if (this.holdStartedAt === null) {
      this.holdStartedAt = snapshot.time;
    }
    return snapshot.time - this.holdStartedAt >= this.settings.holdDuration ? this.holdStartedAt : null;
  }

  reset(): void {
    this.holdStartedAt = null;
    this.lastValue = null;
  }
}
