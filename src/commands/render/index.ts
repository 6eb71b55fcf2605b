import chalk from 'chalk';
import {Command, InvalidArgumentError, Option} from 'commander';

import {formatConfig, loadConfig, type RendererConfig} from '../../lib/config.js';
import {errorMessage} from '../../lib/errors.js';
import {GitCloner} from '../../lib/git/clone.js';
import {HelmTemplater} from '../../lib/helm/template.js';
import {ConsoleLogger, LOG_LEVELS, type LogLevel, type Logger} from '../../lib/logger.js';
import {findMissingCommands, type MissingCommand} from '../../lib/requirements.js';
import {run, type RunOptions, type RunSummary} from '../../lib/run.js';

export interface RenderCommandOptions {
  values: string[];
  outputDir?: string;
  logLevel?: LogLevel;
  concurrency?: number;
}

export interface RenderCommandDeps {
  version: string;
  loadConfig: () => RendererConfig;
  findMissingCommands: (binaries: {helm: string; git: string}) => Promise<MissingCommand[]>;
  run: (options: RunOptions) => Promise<RunSummary>;
  createLogger: (level: LogLevel) => Logger;
}

const defaultDeps: RenderCommandDeps = {
  version: '0.0.0',
  loadConfig: () => loadConfig(),
  findMissingCommands,
  run,
  createLogger: (level) => new ConsoleLogger(level),
};

/** Accumulates repeated flags; each occurrence may also be a comma-separated list. */
function collect(value: string, previous: string[]): string[] {
  return [...previous, ...value.split(',')];
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('must be a positive integer.');
  }
  return n;
}

/**
 * Merge command-line flags over the loaded configuration.
 */
export function resolveSettings(config: RendererConfig, options: RenderCommandOptions): RendererConfig {
  return {
    ...config,
    outputDir: options.outputDir ?? config.outputDir,
    logLevel: options.logLevel ?? config.logLevel,
    concurrency: options.concurrency ?? config.concurrency,
  };
}

/**
 * Run a render from parsed command-line options. Returns the process exit
 * code; every failure has already been logged.
 */
export async function executeRender(
  chartPath: string,
  options: RenderCommandOptions,
  deps: RenderCommandDeps
): Promise<number> {
  let logger = deps.createLogger(options.logLevel ?? 'warn');

  try {
    const settings = resolveSettings(deps.loadConfig(), options);
    logger = deps.createLogger(settings.logLevel);
    logger.debug(`effective configuration:\n${formatConfig(settings)}`);

    const missing = await deps.findMissingCommands({
      helm: settings.helmBinary,
      git: settings.gitBinary,
    });
    if (missing.length > 0) {
      for (const cmd of missing) {
        logger.error(`${cmd.name} is required`);
        console.error('  ' + chalk.blue(cmd.installUrl));
      }
      return 1;
    }

    const summary = await deps.run({
      chartPath,
      valuesFiles: options.values,
      outputDir: settings.outputDir,
      concurrency: settings.concurrency,
      templater: new HelmTemplater(settings.helmBinary),
      cloner: new GitCloner(settings.gitBinary),
      logger,
    });

    console.log(
      chalk.green('✓'),
      `rendered ${summary.applications} application(s) into ${summary.outputDir}`
    );
    return 0;
  } catch (error) {
    logger.error(`application failed: ${errorMessage(error)}`);
    return 1;
  }
}

export function createRenderCommand(overrides: Partial<RenderCommandDeps> = {}): Command {
  const deps = {...defaultDeps, ...overrides};
  const command = new Command('aoa-render');

  command
    .description('Render an Argo CD app-of-apps chart into per-application manifests')
    .version(`aoa-render version: ${deps.version}`, '-v, --version', 'Print version information and exit')
    .argument('<CHART_PATH>', 'Path to the app-of-apps Helm chart')
    .option(
      '-f, --values <file>',
      'Values file(s) for the app-of-apps chart (comma-separated or repeated)',
      collect,
      []
    )
    .option('-o, --output-dir <dir>', 'Directory to save rendered manifests (default: "rendered")')
    .addOption(
      new Option('-l, --log-level <level>', 'Log level (default: "warn")').choices(LOG_LEVELS)
    )
    .option(
      '-c, --concurrency <n>',
      'Maximum number of applications rendered at once (default: 10)',
      parsePositiveInt
    )
    .action(async (chartPath: string, options: RenderCommandOptions) => {
      const code = await executeRender(chartPath, options, deps);
      if (code !== 0) {
        process.exit(code);
      }
    });

  return command;
}
