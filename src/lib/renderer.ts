import fs from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';

import type {ApplicationDescriptor} from './argo/types.js';
import {CloneCache} from './cloneCache.js';
import {AggregateRenderError, ApplicationRenderError, errorMessage, type RenderStage} from './errors.js';
import type {Cloner} from './git/clone.js';
import {cacheKey, normalizeRepoUrl} from './git/normalize.js';
import type {Templater} from './helm/template.js';
import type {Logger} from './logger.js';

export const DEFAULT_CONCURRENCY = 10;

export interface RendererOptions {
  /** Directory that receives the `clone-<n>` checkouts. */
  workspace: string;
  outputDir: string;
  templater: Templater;
  cloner: Cloner;
  logger: Logger;
  concurrency?: number;
}

/**
 * Build the `--set` overrides for one application. The resolved instance
 * and env always replace any setter with the same key.
 */
export function buildOverrides(app: ApplicationDescriptor): Map<string, string> {
  const overrides = new Map(app.setters);
  if (app.instance) {
    overrides.set('global.instance', app.instance);
  }
  if (app.env) {
    overrides.set('global.env', app.env);
  }
  return overrides;
}

/**
 * `<root>[/<env>][/<instance>]`
 */
export function outputDirFor(root: string, app: ApplicationDescriptor): string {
  const parts = [root];
  if (app.env) {
    parts.push(app.env);
  }
  if (app.instance) {
    parts.push(app.instance);
  }
  return path.join(...parts);
}

/**
 * Renders child applications concurrently, sharing clones between
 * applications that point at the same repository and revision.
 */
export class ApplicationRenderer {
  private readonly cache: CloneCache;
  private readonly concurrency: number;

  constructor(private readonly options: RendererOptions) {
    this.cache = new CloneCache(options.workspace);
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  /** Distinct repository checkouts made so far. */
  get clones(): number {
    return this.cache.size;
  }

  /**
   * Render every application. All of them run to completion; failures are
   * logged as they happen and then reported together as one
   * AggregateRenderError.
   */
  async renderAll(applications: readonly ApplicationDescriptor[]): Promise<void> {
    const limit = pLimit(this.concurrency);
    const results = await Promise.all(
      applications.map((app) => limit(() => this.renderOne(app)))
    );

    const failures = results.filter((r): r is ApplicationRenderError => r !== undefined);
    if (failures.length > 0) {
      this.options.logger.error(`completed with ${failures.length} error(s)`);
      throw new AggregateRenderError(failures);
    }
  }

  /**
   * Runs one application through clone, render and write. Never rejects:
   * a failure comes back as the returned error.
   */
  async renderOne(app: ApplicationDescriptor): Promise<ApplicationRenderError | undefined> {
    const log = this.options.logger.child({application: app.name});
    let stage: RenderStage = 'clone';

    try {
      log.info('processing application...');
      const overrides = buildOverrides(app);
      log.info(`found ${app.setters.size} --set values and ${app.valuesFiles.length} --values files`);

      const repository = normalizeRepoUrl(app.repoURL);
      const key = cacheKey(app.repoURL, app.targetRevision);
      const {path: checkout, cached} = await this.cache.acquire(key, async (destination) => {
        log.info(`cloning ${key} to ${destination}`);
        try {
          await this.options.cloner.clone(
            {repository, revision: app.targetRevision, destination},
            log
          );
        } catch (error) {
          throw new Error(`failed to clone repo: ${errorMessage(error)}`, {cause: error});
        }
      });
      if (cached) {
        log.info(`using cached repository from path: ${checkout}`);
      }

      stage = 'render';
      const servicePath = path.join(checkout, app.path);
      let manifests: Buffer;
      try {
        manifests = await this.options.templater.template({
          releaseName: app.name,
          chartPath: path.join(servicePath, '.helm'),
          valuesFiles: app.valuesFiles.map((file) => path.join(servicePath, file)),
          setValues: overrides,
        });
      } catch (error) {
        throw new Error(`failed to render chart: ${errorMessage(error)}`, {cause: error});
      }

      stage = 'write';
      const targetDir = outputDirFor(this.options.outputDir, app);
      const outputFile = path.join(targetDir, `${app.name}.yaml`);
      try {
        await fs.mkdir(targetDir, {recursive: true});
        await fs.writeFile(outputFile, manifests);
      } catch (error) {
        throw new Error(`failed to write manifest to ${outputFile}: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      log.info(`successfully rendered and saved manifest to ${outputFile}`);
      return undefined;
    } catch (error) {
      const failure = new ApplicationRenderError(
        app.name,
        stage,
        `application '${app.name}': ${errorMessage(error)}`,
        {cause: error}
      );
      log.error(`${stage} failed: ${errorMessage(error)}`);
      return failure;
    }
  }
}
