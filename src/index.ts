export * from './errors';
export * from './config';
export * from './analysis';
export * from './models/consumption';
export * from './models/resourceDynamics';
export * from './models/payoff';
export * from './models/revisionProtocol';
export * from './utils/random';
export { createLogger } from './utils/telemetry';
export type { Logger } from './utils/telemetry';
export * from './core/types';
export * from './core/populationState';
export * from './core/revisionClock';
export * from './core/eventQueue';
export * from './core/convergence';
export * from './core/trace';
export * from './core/observers';
export * from './core/engine';
export { SimulationMetrics } from './monitoring/metrics';
