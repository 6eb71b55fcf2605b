import fs from 'fs';
import os from 'os';
import path from 'path';
import {parse as parseYaml, stringify as stringifyYaml} from 'yaml';

import {errorMessage} from './errors.js';
import {isLogLevel, type LogLevel} from './logger.js';
import {DEFAULT_CONCURRENCY} from './renderer.js';

export const CONFIG_FILE_NAME = '.aoarc.yaml';

export interface RendererConfig {
  outputDir: string;
  logLevel: LogLevel;
  concurrency: number;
  helmBinary: string;
  gitBinary: string;
}

export interface ConfigSources {
  homeDir?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function defaultConfig(): RendererConfig {
  return {
    outputDir: 'rendered',
    logLevel: 'warn',
    concurrency: DEFAULT_CONCURRENCY,
    helmBinary: 'helm',
    gitBinary: 'git',
  };
}

export function getConfigPaths(sources: ConfigSources = {}): {user: string; project: string} {
  return {
    user: path.join(sources.homeDir ?? os.homedir(), CONFIG_FILE_NAME),
    project: path.join(sources.cwd ?? process.cwd(), CONFIG_FILE_NAME),
  };
}

function parseConcurrency(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : undefined;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Overlay the recognised keys of `layer` onto `config`. Invalid values are
 * skipped so the earlier layer's value stands.
 */
function applyLayer(config: RendererConfig, layer: Record<string, unknown>): RendererConfig {
  const next = {...config};

  const outputDir = nonEmptyString(layer.outputDir);
  if (outputDir) {
    next.outputDir = outputDir;
  }
  if (typeof layer.logLevel === 'string') {
    const level = layer.logLevel.trim().toLowerCase();
    if (isLogLevel(level)) {
      next.logLevel = level;
    }
  }
  const concurrency = parseConcurrency(layer.concurrency);
  if (concurrency !== undefined) {
    next.concurrency = concurrency;
  }
  const helmBinary = nonEmptyString(layer.helmBinary);
  if (helmBinary) {
    next.helmBinary = helmBinary;
  }
  const gitBinary = nonEmptyString(layer.gitBinary);
  if (gitBinary) {
    next.gitBinary = gitBinary;
  }

  return next;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(`Invalid YAML in ${filePath}: ${errorMessage(error)}`, {cause: error});
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Load settings from defaults, ~/.aoarc.yaml, ./.aoarc.yaml and AOA_*
 * environment variables, in that order. Command-line flags are applied
 * on top by the caller.
 */
export function loadConfig(sources: ConfigSources = {}): RendererConfig {
  const env = sources.env ?? process.env;
  const paths = getConfigPaths(sources);

  let config = defaultConfig();
  config = applyLayer(config, readConfigFile(paths.user));
  config = applyLayer(config, readConfigFile(paths.project));
  config = applyLayer(config, {
    outputDir: env.AOA_OUTPUT_DIR,
    logLevel: env.AOA_LOG_LEVEL,
    concurrency: env.AOA_CONCURRENCY,
    helmBinary: env.AOA_HELM_BINARY,
    gitBinary: env.AOA_GIT_BINARY,
  });

  return config;
}

export function formatConfig(config: RendererConfig): string {
  return stringifyYaml(config);
}
