import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { NormalisedSimulationConfig } from '../config';
import { SimulationStateError } from '../errors';
import { payoffVector } from '../models/payoff';
import { reviseTask } from '../models/revisionProtocol';
import { DeterministicRandom } from '../utils/random';
import { createLogger, type Logger } from '../utils/telemetry';
import { ConvergenceMonitor } from './convergence';
import { EventQueue, SimulationEvent } from './eventQueue';
import { PopulationStateTracker } from './populationState';
import { RevisionClock } from './revisionClock';
import type {
  AgentObservation,
  Directive,
  EngineState,
  FailureCause,
  FailureRecord,
  PlatformBridge,
  PopulationSnapshot,
  RevisionRecord,
  SimulationObserver,
  SimulationSummary,
  StateTransition,
  TerminationReason
} from './types';

export interface SimulationEngineOptions {
  readonly observers?: readonly SimulationObserver[];
  readonly platform?: PlatformBridge;
  readonly logger?: Logger;
}

export interface RunAsyncOptions {
  readonly signal?: AbortSignal;
  /** Number of events processed between yields to the event loop. */
  readonly yieldEvery?: number;
}

type EventOf<K extends SimulationEvent['kind']> = Extract<SimulationEvent, { kind: K }>;

/**
 * Single-threaded population-game simulator.
 *
 * Resource integration ticks, per-agent revision events and scheduled
 * environment changes share one time-ordered queue. Before any event runs the
 * resource levels are integrated up to its timestamp, so a revision always
 * reads the state current at that instant, and every read-decide-apply
 * sequence completes before the next event is taken.
 *
 * States: idle → running → converged | terminated. Both end states are final.
 */
export class SimulationEngine {
  private status: EngineState = 'idle';
  private endReason: TerminationReason | 'converged' | null = null;
  private readonly tracker: PopulationStateTracker;
  private readonly clock: RevisionClock;
  private readonly queue = new EventQueue();
  private readonly decisionStreams = new Map<number, DeterministicRandom>();
  private readonly monitor: ConvergenceMonitor | null;
  private readonly observers: SimulationObserver[];
  private readonly platform: PlatformBridge | undefined;
  private readonly logger: Logger;
  private stopRequested = false;
  private tickIndex = 0;
  private lastTickTime: number | null = null;
  private convergenceTime: number | null = null;
  private peakQueue = 0;
  private eventCount = 0;
  private revisionCount = 0;
  private switchCount = 0;
  private failureCount = 0;
  private mismatchCount = 0;

  constructor(
    private readonly config: NormalisedSimulationConfig,
    options: SimulationEngineOptions = {}
  ) {
    this.tracker = new PopulationStateTracker({
      params: config.taskParams,
      growthRates: config.tasks.growthRates,
      initialResources: config.initialResources,
      initialTasks: config.initialTasks
    });
    this.clock = new RevisionClock(config.revision.rate, config.seed);
    this.monitor = config.convergence ? new ConvergenceMonitor(config.convergence) : null;
    this.observers = options.observers ? [...options.observers] : [];
    this.platform = options.platform;
    this.logger = options.logger ?? createLogger('simulation-engine');
  }

  get state(): EngineState {
    return this.status;
  }

  get time(): number {
    return this.tracker.currentTime;
  }

  get pendingEvents(): number {
    return this.queue.size;
  }

  /** Largest number of simultaneously pending events seen so far. */
  get peakPendingEvents(): number {
    return this.peakQueue;
  }

  addObserver(observer: SimulationObserver): void {
    this.observers.push(observer);
  }

  snapshot(): PopulationSnapshot {
    return this.tracker.snapshot();
  }

  /** Payoff vector for the present state; recomputed on every call. */
  currentPayoffs(): number[] {
    const snapshot = this.tracker.snapshot();
    return payoffVector(
      {
        params: this.tracker.consumptionParams,
        growthRates: snapshot.growthRates,
        resources: snapshot.resources,
        population: snapshot.population
      },
      this.config.payoff
    );
  }

  taskOf(agentId: number): number {
    return this.tracker.taskOf(agentId);
  }

  isAlive(agentId: number): boolean {
    return this.tracker.isAlive(agentId);
  }

  start(): void {
    if (this.status !== 'idle') {
      throw new SimulationStateError(`Cannot start a simulation that is ${this.status}`);
    }
    for (const agentId of this.tracker.liveAgentIds()) {
      this.enqueue({ kind: 'revision', agentId, time: this.clock.schedule(agentId, 0) });
    }
    this.scheduleNextTick();
    for (const change of this.config.schedule.growthRateChanges) {
      this.enqueue({ kind: 'growth-rate', time: change.time, task: change.task, rate: change.rate });
    }
    for (const failure of this.config.schedule.failures) {
      this.enqueue({ kind: 'failure', time: failure.time, agents: failure.agents, count: failure.count });
    }
    this.transition('running');
  }

  /**
   * Processes the earliest pending event. Returns true while the simulation
   * keeps running; calling it after a final state throws.
   */
  step(): boolean {
    if (this.status === 'idle') {
      throw new SimulationStateError('Call start() before stepping the simulation');
    }
    if (this.status !== 'running') {
      throw new SimulationStateError(`Simulation already ${this.status}`);
    }
    if (this.stopRequested) {
      this.transition('terminated', 'stopped');
      return false;
    }

    try {
      const next = this.queue.peek();
      if (!next || next.time > this.config.horizon) {
        this.finishAtHorizon();
        return false;
      }
      this.queue.pop();
      this.tracker.applyResourceIntegration(next.time, this.config.dynamics.maxStep);
      this.execute(next);
      this.eventCount += 1;
    } catch (error) {
      this.logger.error({ err: error, time: this.tracker.currentTime }, 'Simulation aborted');
      if (this.status === 'running') {
        this.transition('terminated', 'error');
      }
      throw error;
    }
    return this.status === 'running';
  }

  run(): SimulationSummary {
    this.ensureRunning();
    while (this.step()) {
      // keep stepping until a final state is reached
    }
    return this.summary();
  }

  async runAsync(options: RunAsyncOptions = {}): Promise<SimulationSummary> {
    const yieldEvery = Math.max(1, options.yieldEvery ?? 1000);
    this.ensureRunning();
    const onAbort = () => this.stop();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    try {
      if (options.signal?.aborted) {
        this.stop();
      }
      let sinceYield = 0;
      while (this.step()) {
        sinceYield += 1;
        if (sinceYield >= yieldEvery) {
          sinceYield = 0;
          await yieldToEventLoop();
        }
      }
      return this.summary();
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * External stop signal. A running simulation finishes the event in flight
   * and terminates at the next step boundary; an idle one terminates at once.
   */
  stop(): void {
    if (this.status === 'idle') {
      this.transition('terminated', 'stopped');
      return;
    }
    if (this.status === 'running') {
      this.stopRequested = true;
    }
  }

  /** Observation pushed by the physical platform for one agent. */
  observe(observation: AgentObservation): void {
    if (this.status === 'converged' || this.status === 'terminated') {
      this.logger.debug({ agentId: observation.agentId }, 'Ignoring observation after the simulation ended');
      return;
    }
    if (!this.tracker.isAlive(observation.agentId)) {
      return;
    }
    if (!observation.alive) {
      this.removeAgent(observation.agentId, 'observed');
      return;
    }
    const tracked = this.tracker.taskOf(observation.agentId);
    if (tracked !== observation.task) {
      this.mismatchCount += 1;
      this.logger.warn(
        { agentId: observation.agentId, tracked, reported: observation.task, time: this.tracker.currentTime },
        'Platform reports a task that differs from the tracked assignment'
      );
    }
  }

  summary(): SimulationSummary {
    return {
      state: this.status,
      reason: this.endReason ?? 'horizon',
      time: this.tracker.currentTime,
      events: this.eventCount,
      revisions: this.revisionCount,
      switches: this.switchCount,
      failures: this.failureCount,
      taskMismatches: this.mismatchCount,
      convergenceTime: this.convergenceTime,
      final: this.tracker.snapshot()
    };
  }

  private ensureRunning(): void {
    if (this.status === 'idle') {
      this.start();
    } else if (this.status !== 'running') {
      throw new SimulationStateError(`Simulation already ${this.status}`);
    }
  }

  private execute(event: SimulationEvent): void {
    switch (event.kind) {
      case 'tick':
        this.handleTick();
        break;
      case 'revision':
        this.handleRevision(event);
        break;
      case 'failure':
        this.handleFailure(event);
        break;
      case 'growth-rate':
        this.handleGrowthRate(event);
        break;
    }
  }

  private handleTick(): void {
    this.emitTick();
    if (this.status === 'running') {
      this.scheduleNextTick();
    }
  }

  private emitTick(): void {
    for (const observation of this.platform?.collectObservations?.(this.tracker.currentTime) ?? []) {
      this.observe(observation);
    }
    const snapshot = this.tracker.snapshot();
    this.lastTickTime = snapshot.time;
    this.notify((observer) => observer.onTick?.(snapshot));
    if (!this.monitor) {
      return;
    }
    const holdStart = this.monitor.evaluate(snapshot, this.currentPayoffs());
    if (holdStart !== null) {
      this.convergenceTime = holdStart;
      this.queue.clear();
      this.transition('converged', 'converged');
    }
  }

  private handleRevision(event: EventOf<'revision'>): void {
    const { agentId } = event;
    if (!this.tracker.isAlive(agentId)) {
      return;
    }
    const payoffs = this.currentPayoffs();
    const fromTask = this.tracker.taskOf(agentId);
    const outcome = reviseTask(fromTask, payoffs, this.config.revision.rho, this.decisionStream(agentId));
    this.tracker.applyTaskChange(agentId, outcome.nextTask);
    this.revisionCount += 1;
    if (outcome.switched) {
      this.switchCount += 1;
    }

    const directive: Directive = outcome.switched
      ? { kind: 'reassign', agentId, fromTask, toTask: outcome.nextTask, time: event.time }
      : { kind: 'no-change', agentId, task: fromTask, time: event.time };
    this.platform?.dispatch?.(directive);

    const record: RevisionRecord = {
      time: event.time,
      agentId,
      fromTask,
      toTask: outcome.nextTask,
      switched: outcome.switched,
      payoffs,
      outcome
    };
    const after = this.tracker.snapshot();
    this.notify((observer) => observer.onRevision?.(record, after));
    this.enqueue({ kind: 'revision', agentId, time: this.clock.schedule(agentId, event.time) });
  }

  private handleFailure(event: EventOf<'failure'>): void {
    const targets = event.agents ?? this.tracker.liveAgentIds().slice(0, event.count ?? 0);
    for (const agentId of targets) {
      this.removeAgent(agentId, 'scheduled');
    }
  }

  private handleGrowthRate(event: EventOf<'growth-rate'>): void {
    const previousRate = this.tracker.setGrowthRate(event.task, event.rate);
    const change = { time: event.time, task: event.task, previousRate, rate: event.rate };
    this.logger.info(change, 'Growth rate changed');
    const snapshot = this.tracker.snapshot();
    this.notify((observer) => observer.onGrowthRateChange?.(change, snapshot));
  }

  private removeAgent(agentId: number, cause: FailureCause): void {
    const task = this.tracker.removeAgent(agentId);
    if (task === null) {
      return;
    }
    this.clock.retire(agentId);
    this.decisionStreams.delete(agentId);
    this.failureCount += 1;
    const record: FailureRecord = { time: this.tracker.currentTime, agentId, task, cause };
    this.logger.warn({ ...record, liveAgents: this.tracker.liveAgents }, 'Agent removed from the population');
    const snapshot = this.tracker.snapshot();
    this.notify((observer) => observer.onFailure?.(record, snapshot));
  }

  private finishAtHorizon(): void {
    this.tracker.applyResourceIntegration(this.config.horizon, this.config.dynamics.maxStep);
    if (this.lastTickTime !== this.config.horizon) {
      this.emitTick();
    }
    if (this.status === 'running') {
      this.transition('terminated', 'horizon');
    }
  }

  private scheduleNextTick(): void {
    this.tickIndex += 1;
    this.enqueue({ kind: 'tick', time: this.tickIndex * this.config.dynamics.tickInterval });
  }

  private enqueue(event: SimulationEvent): void {
    this.queue.push(event);
    this.peakQueue = Math.max(this.peakQueue, this.queue.size);
  }

  private decisionStream(agentId: number): DeterministicRandom {
    let stream = this.decisionStreams.get(agentId);
    if (!stream) {
      stream = DeterministicRandom.forAgent(this.config.seed, agentId, 'decision');
      this.decisionStreams.set(agentId, stream);
    }
    return stream;
  }

  private transition(to: EngineState, reason?: TerminationReason | 'converged'): void {
    const transition: StateTransition = { time: this.tracker.currentTime, from: this.status, to, reason };
    this.status = to;
    if (reason) {
      this.endReason = reason;
    }
    this.logger.info(transition, 'Simulation state changed');
    this.notify((observer) => observer.onStateChange?.(transition));
  }

  private notify(callback: (observer: SimulationObserver) => void): void {
    for (const observer of this.observers) {
      callback(observer);
    }
  }
}
