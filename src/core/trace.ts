import type {
  FailureRecord,
  GrowthRateChange,
  PopulationSnapshot,
  RevisionRecord,
  SimulationObserver,
  StateTransition
} from './types';

export interface TraceSample {
  readonly time: number;
  readonly resources: readonly number[];
  readonly population: readonly number[];
  readonly liveAgents: number;
}

export interface TraceRevision {
  readonly time: number;
  readonly agentId: number;
  readonly fromTask: number;
  readonly toTask: number;
}

export type TraceEventType = 'state' | 'failure' | 'growth-rate';

export interface TraceEvent {
  readonly time: number;
  readonly type: TraceEventType;
  readonly description: string;
}

export interface TraceRecorderOptions {
  /** Keep one tick sample out of every `sampleEvery`. */
  readonly sampleEvery?: number;
  readonly recordRevisions?: boolean;
}

/**
 * In-memory trace of a run: periodic state samples, the revision history
 * and a log of discrete events.
 */
export class TraceRecorder implements SimulationObserver {
  readonly samples: TraceSample[] = [];
  readonly revisions: TraceRevision[] = [];
  readonly events: TraceEvent[] = [];
  private readonly sampleEvery: number;
  private readonly recordRevisions: boolean;
  private ticksSeen = 0;

  constructor(options: TraceRecorderOptions = {}) {
    this.sampleEvery = Math.max(1, Math.floor(options.sampleEvery ?? 1));
    this.recordRevisions = options.recordRevisions ?? true;
  }

  onTick(snapshot: PopulationSnapshot): void {
    if (this.ticksSeen % this.sampleEvery === 0) {
      this.samples.push({
        time: snapshot.time,
        resources: snapshot.resources,
        population: snapshot.population,
        liveAgents: snapshot.liveAgents
      });
    }
    this.ticksSeen += 1;
  }

  onRevision(record: RevisionRecord): void {
    if (!this.recordRevisions || !record.switched) {
      return;
    }
    this.revisions.push({
      time: record.time,
      agentId: record.agentId,
      fromTask: record.fromTask,
      toTask: record.toTask
    });
  }

  onFailure(record: FailureRecord): void {
    this.events.push({
      time: record.time,
      type: 'failure',
      description: `agent ${record.agentId} on task ${record.task} removed (${record.cause})`
    });
  }

  onGrowthRateChange(change: GrowthRateChange): void {
    this.events.push({
      time: change.time,
      type: 'growth-rate',
      description: `task ${change.task} growth rate ${change.previousRate} -> ${change.rate}`
    });
  }

  onStateChange(transition: StateTransition): void {
    const suffix = transition.reason ? ` (${transition.reason})` : '';
    this.events.push({
      time: transition.time,
      type: 'state',
      description: `${transition.from} -> ${transition.to}${suffix}`
    });
  }

  /** Time-weighted mean population share per task over samples at or after `from`. */
  averagePopulation(from = 0): number[] {
    const window = this.samples.filter((sample) => sample.time >= from);
    const first = window[0];
    if (!first) {
      return [];
    }
    const totals = first.population.map(() => 0);
    if (window.length === 1) {
      return first.population.slice();
    }
    let span = 0;
    for (let index = 1; index < window.length; index += 1) {
      const previous = window[index - 1];
      const dt = window[index].time - previous.time;
      span += dt;
      previous.population.forEach((share, task) => {
        totals[task] += share * dt;
      });
    }
    return span > 0 ? totals.map((total) => total / span) : first.population.slice();
  }

  clear(): void {
    this.samples.length = 0;
    this.revisions.length = 0;
    this.events.length = 0;
    this.ticksSeen = 0;
  }
}
