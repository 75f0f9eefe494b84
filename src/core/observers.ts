import { createLogger, type Logger } from '../utils/telemetry';
import type {
  FailureRecord,
  GrowthRateChange,
  PopulationSnapshot,
  RevisionRecord,
  SimulationObserver,
  StateTransition
} from './types';

export interface LoggingObserverOptions {
  readonly logger?: Logger;
  /** Log every n-th tick at info level; others go to debug. */
  readonly tickEvery?: number;
}

export class LoggingObserver implements SimulationObserver {
  private readonly logger: Logger;
  private readonly tickEvery: number;
  private ticks = 0;

  constructor(options: LoggingObserverOptions = {}) {
    this.logger = options.logger ?? createLogger('simulation-trace');
    this.tickEvery = Math.max(1, Math.floor(options.tickEvery ?? 100));
  }

  onStateChange(transition: StateTransition): void {
    this.logger.info(transition, 'state_change');
  }

  onTick(snapshot: PopulationSnapshot): void {
    const payload = {
      time: snapshot.time,
      resources: snapshot.resources,
      population: snapshot.population,
      liveAgents: snapshot.liveAgents
    };
    if (this.ticks % this.tickEvery === 0) {
      this.logger.info(payload, 'tick');
    } else {
      this.logger.debug(payload, 'tick');
    }
    this.ticks += 1;
  }

  onRevision(record: RevisionRecord): void {
    if (record.switched) {
      this.logger.debug(
        { time: record.time, agentId: record.agentId, fromTask: record.fromTask, toTask: record.toTask },
        'task_switch'
      );
    }
  }

  onFailure(record: FailureRecord, snapshot: PopulationSnapshot): void {
    this.logger.warn({ ...record, liveAgents: snapshot.liveAgents }, 'agent_failure');
  }

  onGrowthRateChange(change: GrowthRateChange): void {
    this.logger.info(change, 'growth_rate_change');
  }
}
