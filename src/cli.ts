#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import yargs from 'yargs';
import { equilibriumReport } from './analysis';
import { loadSimulationConfig } from './config';
import { SimulationEngine } from './core/engine';
import { LoggingObserver } from './core/observers';
import { ConfigurationError } from './errors';
import { SimulationMetrics } from './monitoring/metrics';
import { createLogger } from './utils/telemetry';

const logger = createLogger('popgame-cli');

interface Overrides {
  seed?: number;
  horizon?: number;
}

function overrideEnv(overrides: Overrides): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env };
  if (overrides.seed !== undefined) {
    env.POPGAME_SEED = String(overrides.seed);
  }
  if (overrides.horizon !== undefined) {
    env.POPGAME_HORIZON = String(overrides.horizon);
  }
  return env;
}

function reportFailure(error: unknown): void {
  if (error instanceof ConfigurationError) {
    console.error(error.message);
  } else {
    logger.error({ err: error }, 'command_failed');
  }
  process.exitCode = 1;
}

yargs(hideBin(process.argv))
  .scriptName('popgame')
  .command(
    'run',
    'Run a configured scenario to its horizon (or convergence) and print the summary',
    (cmd) =>
      cmd
        .option('config', {
          type: 'string',
          demandOption: true,
          describe: 'Path to a JSON or YAML scenario file.'
        })
        .option('seed', { type: 'number', describe: 'Override the scenario seed.' })
        .option('horizon', { type: 'number', describe: 'Override the simulated horizon.' })
        .option('metrics', {
          type: 'boolean',
          default: false,
          describe: 'Print Prometheus exposition text after the run.'
        })
        .option('log-every', {
          type: 'number',
          default: 100,
          describe: 'Log one tick out of every n at info level.'
        }),
    async (args) => {
      try {
        const config = await loadSimulationConfig(args.config, overrideEnv(args));
        const metrics = new SimulationMetrics();
        const engine = new SimulationEngine(config, {
          observers: [new LoggingObserver({ tickEvery: args['log-every'] }), metrics]
        });
        const controller = new AbortController();
        const onSignal = () => controller.abort();
        process.once('SIGINT', onSignal);
        try {
          const summary = await engine.runAsync({ signal: controller.signal });
          console.log(JSON.stringify(summary, null, 2));
        } finally {
          process.removeListener('SIGINT', onSignal);
        }
        if (args.metrics) {
          console.log(await metrics.render());
        }
      } catch (error) {
        reportFailure(error);
      }
    }
  )
  .command(
    'validate',
    'Validate a scenario file without running it',
    (cmd) =>
      cmd.option('config', {
        type: 'string',
        demandOption: true
      }),
    async (args) => {
      try {
        const config = await loadSimulationConfig(args.config);
        console.log(
          JSON.stringify(
            {
              valid: true,
              seed: config.seed,
              horizon: config.horizon,
              agents: config.agents.count,
              tasks: config.tasks.count
            },
            null,
            2
          )
        );
      } catch (error) {
        reportFailure(error);
      }
    }
  )
  .command(
    'equilibrium',
    'Print the closed-form resource equilibrium for the uniform and initial splits',
    (cmd) =>
      cmd.option('config', {
        type: 'string',
        demandOption: true
      }),
    async (args) => {
      try {
        const config = await loadSimulationConfig(args.config);
        console.log(JSON.stringify(equilibriumReport(config), null, 2));
      } catch (error) {
        reportFailure(error);
      }
    }
  )
  .demandCommand()
  .strict()
  .help()
  .parseAsync()
  .catch(reportFailure);
