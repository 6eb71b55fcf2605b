import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import {parseApplications} from './argo/parser.js';
import type {ApplicationDescriptor} from './argo/types.js';
import {errorMessage} from './errors.js';
import type {Cloner} from './git/clone.js';
import type {Templater} from './helm/template.js';
import type {Logger} from './logger.js';
import {ApplicationRenderer, DEFAULT_CONCURRENCY} from './renderer.js';

export const ROOT_RELEASE_NAME = 'app-of-apps';

export interface RunOptions {
  chartPath: string;
  valuesFiles: string[];
  outputDir: string;
  concurrency?: number;
  templater: Templater;
  cloner: Cloner;
  logger: Logger;
}

export interface RunSummary {
  applications: number;
  outputDir: string;
  clones: number;
}

async function renderAndParseAppOfApps(options: RunOptions): Promise<ApplicationDescriptor[]> {
  const {logger} = options;

  logger.info("rendering the main 'app-of-apps' chart...");
  let manifests: Buffer;
  try {
    manifests = await options.templater.template({
      releaseName: ROOT_RELEASE_NAME,
      chartPath: options.chartPath,
      valuesFiles: options.valuesFiles,
    });
  } catch (error) {
    throw new Error(`failed to render app-of-apps chart: ${errorMessage(error)}`, {cause: error});
  }

  logger.info('parsing for argo cd applications...');
  const applications = parseApplications(manifests, logger);
  logger.info(`found ${applications.length} applications to process`);
  return applications;
}

/**
 * Render the app-of-apps chart, resolve its Applications and render each
 * of them into `outputDir`. Clones live in a temporary workspace that is
 * removed however the run ends.
 */
export async function run(options: RunOptions): Promise<RunSummary> {
  const {logger} = options;

  let workspace: string;
  try {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'argo-charts-'));
  } catch (error) {
    throw new Error(`failed to create temp directory: ${errorMessage(error)}`, {cause: error});
  }
  logger.info(`using temporary directory for clones: ${workspace}`);

  try {
    try {
      await fs.mkdir(options.outputDir, {recursive: true});
    } catch (error) {
      throw new Error(
        `failed to create output directory ${options.outputDir}: ${errorMessage(error)}`,
        {cause: error}
      );
    }

    let applications: ApplicationDescriptor[];
    try {
      applications = await renderAndParseAppOfApps(options);
    } catch (error) {
      throw new Error(`initialization failed: ${errorMessage(error)}`, {cause: error});
    }

    const renderer = new ApplicationRenderer({
      workspace,
      outputDir: options.outputDir,
      templater: options.templater,
      cloner: options.cloner,
      logger,
      concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
    });
    await renderer.renderAll(applications);

    return {
      applications: applications.length,
      outputDir: options.outputDir,
      clones: renderer.clones,
    };
  } finally {
    await fs.rm(workspace, {recursive: true, force: true});
  }
}
