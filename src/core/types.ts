import type { RevisionOutcome } from '../models/revisionProtocol';

export type EngineState = 'idle' | 'running' | 'converged' | 'terminated';

export type TerminationReason = 'horizon' | 'stopped' | 'error';

export interface PopulationSnapshot {
  readonly time: number;
  readonly resources: readonly number[];
  /** Share of live agents per task; all zeros once every agent has failed. */
  readonly population: readonly number[];
  readonly counts: readonly number[];
  readonly growthRates: readonly number[];
  readonly liveAgents: number;
}

export interface AgentObservation {
  readonly agentId: number;
  /** Task the platform reports the agent to be serving. */
  readonly task: number;
  readonly alive: boolean;
}

export type Directive =
  | { readonly kind: 'reassign'; readonly agentId: number; readonly fromTask: number; readonly toTask: number; readonly time: number }
  | { readonly kind: 'no-change'; readonly agentId: number; readonly task: number; readonly time: number };

/** Physical platform side of the core: observations in, directives out. */
export interface PlatformBridge {
  collectObservations?(time: number): readonly AgentObservation[];
  dispatch?(directive: Directive): void;
}

export interface RevisionRecord {
  readonly time: number;
  readonly agentId: number;
  readonly fromTask: number;
  readonly toTask: number;
  readonly switched: boolean;
  readonly payoffs: readonly number[];
  readonly outcome: RevisionOutcome;
}

export type FailureCause = 'scheduled' | 'observed';

export interface FailureRecord {
  readonly time: number;
  readonly agentId: number;
  readonly task: number;
  readonly cause: FailureCause;
}

export interface GrowthRateChange {
  readonly time: number;
  readonly task: number;
  readonly previousRate: number;
  readonly rate: number;
}

export interface StateTransition {
  readonly time: number;
  readonly from: EngineState;
  readonly to: EngineState;
  readonly reason?: TerminationReason | 'converged';
}

export interface SimulationObserver {
  onStateChange?(transition: StateTransition): void;
  onTick?(snapshot: PopulationSnapshot): void;
  onRevision?(record: RevisionRecord, snapshot: PopulationSnapshot): void;
  onFailure?(record: FailureRecord, snapshot: PopulationSnapshot): void;
  onGrowthRateChange?(change: GrowthRateChange, snapshot: PopulationSnapshot): void;
}

export interface SimulationSummary {
  readonly state: EngineState;
  readonly reason: TerminationReason | 'converged';
  readonly time: number;
  readonly events: number;
  readonly revisions: number;
  readonly switches: number;
  readonly failures: number;
  readonly taskMismatches: number;
  readonly convergenceTime: number | null;
  readonly final: PopulationSnapshot;
}
