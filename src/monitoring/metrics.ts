import { Counter, Gauge, Registry } from 'prom-client';
import { populationVariance } from '../core/convergence';
import type {
  FailureRecord,
  GrowthRateChange,
  PopulationSnapshot,
  RevisionRecord,
  SimulationObserver
} from '../core/types';

export class SimulationMetrics implements SimulationObserver {
  private readonly registry = new Registry();
  private readonly resourceGauge: Gauge<'task'>;
  private readonly shareGauge: Gauge<'task'>;
  private readonly growthGauge: Gauge<'task'>;
  private readonly liveAgentsGauge: Gauge<string>;
  private readonly varianceGauge: Gauge<string>;
  private readonly timeGauge: Gauge<string>;
  private readonly revisionCounter: Counter<'outcome'>;
  private readonly failureCounter: Counter<string>;

  constructor(component = 'popgame-simulator') {
    this.registry.setDefaultLabels({ component });
    this.resourceGauge = new Gauge({
      name: 'popgame_resource_level',
      help: 'Resource level q of each task.',
      labelNames: ['task'],
      registers: [this.registry],
    });
    this.shareGauge = new Gauge({
      name: 'popgame_population_share',
      help: 'Share x of live agents assigned to each task.',
      labelNames: ['task'],
      registers: [this.registry],
    });
    this.growthGauge = new Gauge({
      name: 'popgame_growth_rate',
      help: 'Current growth rate w of each task.',
      labelNames: ['task'],
      registers: [this.registry],
    });
    this.liveAgentsGauge = new Gauge({
      name: 'popgame_live_agents',
      help: 'Number of agents that have not failed.',
      registers: [this.registry],
    });
    this.varianceGauge = new Gauge({
      name: 'popgame_population_variance',
      help: 'Variance of the population shares across tasks.',
      registers: [this.registry],
    });
    this.timeGauge = new Gauge({
      name: 'popgame_simulation_time_seconds',
      help: 'Simulated time of the latest observation.',
      registers: [this.registry],
    });
    this.revisionCounter = new Counter({
      name: 'popgame_revisions_total',
      help: 'Revision opportunities processed, by outcome (switch or stay).',
      labelNames: ['outcome'],
      registers: [this.registry],
    });
    this.failureCounter = new Counter({
      name: 'popgame_agent_failures_total',
      help: 'Agents permanently removed from the population.',
      registers: [this.registry],
    });
  }

  update(snapshot: PopulationSnapshot): void {
    snapshot.resources.forEach((level, task) => this.resourceGauge.set({ task: String(task) }, level));
    snapshot.population.forEach((share, task) => this.shareGauge.set({ task: String(task) }, share));
    snapshot.growthRates.forEach((rate, task) => this.growthGauge.set({ task: String(task) }, rate));
    this.liveAgentsGauge.set(snapshot.liveAgents);
    this.varianceGauge.set(populationVariance(snapshot.population));
    this.timeGauge.set(snapshot.time);
  }

  onTick(snapshot: PopulationSnapshot): void {
    this.update(snapshot);
  }

  onRevision(record: RevisionRecord): void {
    this.revisionCounter.inc({ outcome: record.switched ? 'switch' : 'stay' });
  }

  onFailure(_record: FailureRecord, snapshot: PopulationSnapshot): void {
    this.failureCounter.inc();
    this.update(snapshot);
  }

  onGrowthRateChange(_change: GrowthRateChange, snapshot: PopulationSnapshot): void {
    this.update(snapshot);
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
