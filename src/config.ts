import { promises as fs } from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { ConsumptionParams, stiffnessBound } from './models/consumption';
import { payoffVector } from './models/payoff';
import { maxSafeRho, switchProbabilities } from './models/revisionProtocol';
import { createLogger } from './utils/telemetry';

const logger = createLogger('config-loader');

/** RK4 is unstable beyond h·|∂f/∂q| ≈ 2.78; keep a margin. */
export const MAX_STABLE_STEP_PRODUCT = 2.5;
/** Above this product the step noticeably distorts the continuous dynamics. */
export const ACCURATE_STEP_PRODUCT = 0.1;

const finite = z.number().finite();
const positive = finite.positive();
const nonNegative = finite.min(0);
const taskIndex = z.number().int().min(0);

const failureSchema = z
  .object({
    time: nonNegative,
    agents: z.array(z.number().int().min(0)).min(1).optional(),
    count: z.number().int().min(1).optional()
  })
  .refine((value) => (value.agents === undefined) !== (value.count === undefined), {
    message: 'A failure entry needs exactly one of "agents" or "count"'
  });

const configSchema = z.object({
  seed: z.number().int().min(0).max(0xffffffff).default(1337),
  horizon: positive,
  agents: z.object({
    count: z.number().int().min(1),
    initialAssignment: z
      .union([z.enum(['round-robin', 'first-task']), z.array(taskIndex)])
      .default('round-robin')
  }),
  tasks: z.object({
    count: z.number().int().min(1),
    consumption: z.object({
      R: z.array(positive),
      alpha: z.array(positive),
      beta: z.array(finite)
    }),
    growthRates: z.array(nonNegative),
    initialResources: z.array(finite).optional()
  }),
  revision: z.object({
    rate: positive,
    rho: positive,
    payoffBound: positive.optional()
  }),
  payoff: z
    .object({
      nu: nonNegative.default(0),
      referenceLevel: finite.default(0)
    })
    .default({}),
  dynamics: z
    .object({
      tickInterval: positive.default(0.1),
      maxStep: positive.default(0.01)
    })
    .default({}),
  convergence: z
    .object({
      metric: z.enum(['population-variance', 'payoff-gap']),
      threshold: nonNegative,
      holdDuration: nonNegative
    })
    .optional(),
  schedule: z
    .object({
      growthRateChanges: z.array(z.object({ time: nonNegative, task: taskIndex, rate: nonNegative })).default([]),
      failures: z.array(failureSchema).default([])
    })
    .default({})
});

export type SimulationConfigInput = z.input<typeof configSchema>;
export type SimulationConfig = z.infer<typeof configSchema>;

export interface NormalisedSimulationConfig extends SimulationConfig {
  readonly taskParams: readonly ConsumptionParams[];
  readonly initialTasks: readonly number[];
  readonly initialResources: readonly number[];
}

export function resolveInitialTasks(
  assignment: SimulationConfig['agents']['initialAssignment'],
  agentCount: number,
  taskCount: number
): number[] {
  if (assignment === 'round-robin') {
    return Array.from({ length: agentCount }, (_, agentId) => agentId % taskCount);
  }
  if (assignment === 'first-task') {
    return new Array<number>(agentCount).fill(0);
  }
  return assignment.slice();
}

function collectIssues(config: SimulationConfig): string[] {
  const issues: string[] = [];
  const taskCount = config.tasks.count;
  const perTask: Array<[string, readonly unknown[] | undefined]> = [
    ['tasks.consumption.R', config.tasks.consumption.R],
    ['tasks.consumption.alpha', config.tasks.consumption.alpha],
    ['tasks.consumption.beta', config.tasks.consumption.beta],
    ['tasks.growthRates', config.tasks.growthRates],
    ['tasks.initialResources', config.tasks.initialResources]
  ];
  for (const [field, values] of perTask) {
    if (values !== undefined && values.length !== taskCount) {
      issues.push(`${field} has ${values.length} entries but tasks.count is ${taskCount}`);
    }
  }

  const assignment = config.agents.initialAssignment;
  if (Array.isArray(assignment)) {
    if (assignment.length !== config.agents.count) {
      issues.push(`agents.initialAssignment has ${assignment.length} entries but agents.count is ${config.agents.count}`);
    }
    assignment.forEach((task, agentId) => {
      if (task >= taskCount) {
        issues.push(`agents.initialAssignment[${agentId}] refers to unknown task ${task}`);
      }
    });
  }

  config.schedule.growthRateChanges.forEach((change, index) => {
    if (change.task >= taskCount) {
      issues.push(`schedule.growthRateChanges[${index}] refers to unknown task ${change.task}`);
    }
  });
  config.schedule.failures.forEach((failure, index) => {
    for (const agentId of failure.agents ?? []) {
      if (agentId >= config.agents.count) {
        issues.push(`schedule.failures[${index}] refers to unknown agent ${agentId}`);
      }
    }
    if (failure.count !== undefined && failure.count > config.agents.count) {
      issues.push(`schedule.failures[${index}] removes ${failure.count} agents but only ${config.agents.count} exist`);
    }
  });

  if (config.revision.payoffBound !== undefined) {
    const ceiling = maxSafeRho(taskCount, config.revision.payoffBound);
    if (config.revision.rho > ceiling) {
      issues.push(
        `revision.rho=${config.revision.rho} exceeds ${ceiling} allowed by payoffBound=${config.revision.payoffBound}`
      );
    }
  }
  return issues;
}

function buildTaskParams(config: SimulationConfig): ConsumptionParams[] {
  const { R, alpha, beta } = config.tasks.consumption;
  return Array.from({ length: config.tasks.count }, (_, task) => ({
    R: R[task],
    alpha: alpha[task],
    beta: beta[task]
  }));
}

function checkStepSize(config: SimulationConfig, taskParams: readonly ConsumptionParams[]): string[] {
  const stiffness = stiffnessBound(taskParams, config.agents.count);
  const product = config.dynamics.maxStep * stiffness;
  if (product > MAX_STABLE_STEP_PRODUCT) {
    return [
      `dynamics.maxStep=${config.dynamics.maxStep} is outside the RK4 stability region for the fastest resource rate ${stiffness}`
    ];
  }
  if (product > ACCURATE_STEP_PRODUCT) {
    logger.warn(
      { maxStep: config.dynamics.maxStep, stiffness, product },
      'Integration step is coarse relative to the fastest resource time constant'
    );
  }
  return [];
}

function checkInitialPayoffs(config: NormalisedSimulationConfig): string[] {
  const counts = new Array<number>(config.tasks.count).fill(0);
  for (const task of config.initialTasks) {
    counts[task] += 1;
  }
  const population = counts.map((count) => count / config.initialTasks.length);
  const payoffs = payoffVector(
    {
      params: config.taskParams,
      growthRates: config.tasks.growthRates,
      resources: config.initialResources,
      population
    },
    config.payoff
  );
  const issues: string[] = [];
  counts.forEach((count, task) => {
    if (count === 0) {
      return;
    }
    try {
      switchProbabilities(task, payoffs, config.revision.rho);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      issues.push(...error.issues);
    }
  });
  return issues;
}

/** Validates raw input and resolves derived fields; throws ConfigurationError. */
export function parseSimulationConfig(input: unknown): NormalisedSimulationConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid simulation configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  const config = result.data;
  const issues = collectIssues(config);
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid simulation configuration', issues);
  }

  const taskParams = buildTaskParams(config);
  const stepIssues = checkStepSize(config, taskParams);
  if (stepIssues.length > 0) {
    throw new ConfigurationError('Invalid simulation configuration', stepIssues);
  }

  const normalised: NormalisedSimulationConfig = {
    ...config,
    taskParams,
    initialTasks: resolveInitialTasks(config.agents.initialAssignment, config.agents.count, config.tasks.count),
    initialResources: config.tasks.initialResources ?? new Array<number>(config.tasks.count).fill(0)
  };
  const payoffIssues = checkInitialPayoffs(normalised);
  if (payoffIssues.length > 0) {
    throw new ConfigurationError('Revision protocol constant rejects the initial state', payoffIssues);
  }
  return normalised;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function applyEnvironmentOverrides(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const result: RawConfig = { ...raw };
  if (env.POPGAME_SEED) {
    result.seed = Number.parseInt(env.POPGAME_SEED, 10);
  }
  if (env.POPGAME_HORIZON) {
    result.horizon = Number.parseFloat(env.POPGAME_HORIZON);
  }
  return result;
}

export async function loadSimulationConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<NormalisedSimulationConfig> {
  const resolved = path.resolve(configPath);
  const raw = await fs.readFile(resolved, 'utf8');
  const extension = path.extname(resolved).toLowerCase();
  let parsed: unknown;
  try {
    parsed = extension === '.yml' || extension === '.yaml' ? yaml.load(raw) : JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse configuration (${resolved})`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }
  logger.debug({ location: resolved }, 'Loaded simulation configuration');
  return parseSimulationConfig(applyEnvironmentOverrides(parsed, env));
}
