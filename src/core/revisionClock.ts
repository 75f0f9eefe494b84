import { DeterministicRandom } from '../utils/random';

/**
 * Smallest time strictly after `time`. Guards the strict increase of an
 * agent's revision times when a drawn interval is too small to register.
 */
export function nextRepresentableAfter(time: number): number {
  if (time === 0) {
    return Number.MIN_VALUE;
  }
  const candidate = time + Math.abs(time) * Number.EPSILON;
  return candidate > time ? candidate : time + Number.MIN_VALUE;
}

/**
 * Independent Poisson clocks, one per agent, all with rate λ. Each agent draws
 * its intervals from its own stream derived from (seed, agent, "clock"), so
 * an agent's sequence of revision times never depends on how many draws other
 * agents have made.
 */
export class RevisionClock {
  private readonly streams = new Map<number, DeterministicRandom>();
  private readonly nextTimes = new Map<number, number>();
  private readonly draws = new Map<number, number>();

  constructor(
    private readonly rate: number,
    private readonly seed: number
  ) {
    if (!(rate > 0) || !Number.isFinite(rate)) {
      throw new RangeError(`Revision rate must be a positive finite number (received ${rate})`);
    }
  }

  /** Draws the next revision instant of `agentId` after `currentTime`. */
  schedule(agentId: number, currentTime: number): number {
    const stream = this.streamFor(agentId);
    const interval = stream.exponential(this.rate);
    const previous = this.nextTimes.get(agentId);
    let next = currentTime + interval;
    if (next <= currentTime) {
      next = nextRepresentableAfter(currentTime);
    }
    if (previous !== undefined && next <= previous) {
      next = nextRepresentableAfter(previous);
    }
    this.nextTimes.set(agentId, next);
    this.draws.set(agentId, (this.draws.get(agentId) ?? 0) + 1);
    return next;
  }

  nextRevisionTime(agentId: number): number | undefined {
    return this.nextTimes.get(agentId);
  }

  drawCount(agentId: number): number {
    return this.draws.get(agentId) ?? 0;
  }

  /** Drops a failed agent's clock. */
  retire(agentId: number): void {
    this.nextTimes.delete(agentId);
    this.streams.delete(agentId);
    this.draws.delete(agentId);
  }

  private streamFor(agentId: number): DeterministicRandom {
    let stream = this.streams.get(agentId);
    if (!stream) {
      stream = DeterministicRandom.forAgent(this.seed, agentId, 'clock');
      this.streams.set(agentId, stream);
    }
    return stream;
  }
}
