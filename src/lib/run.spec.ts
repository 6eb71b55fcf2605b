import {describe, it, expect, jest, beforeEach, afterEach} from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';

import {AggregateRenderError} from './errors.js';
import type {Cloner} from './git/clone.js';
import type {Templater, TemplateOptions} from './helm/template.js';
import {silentLogger} from './logger.js';
import {run, ROOT_RELEASE_NAME} from './run.js';

const APP_OF_APPS = `
apiVersion: v1
kind: ConfigMap
metadata:
  name: not-an-app
---
apiVersion: argoproj.io/v1alpha1
kind: Application
metadata:
  name: dev-inf1-my-service
  labels:
    env: dev
    instance: inf1
  annotations:
    rawRepository: "https://git.example.com/org/repo"
    rawPath: "stable/svc"
spec:
  source:
    targetRevision: master
    plugin:
      env:
        - name: WERF_SET_REPLICA_COUNT
          value: "global.replicaCount=3"
---
apiVersion: argoproj.io/v1alpha1
kind: Application
metadata:
  name: shared-repo
  annotations:
    rawRepository: "git@git.example.com:org/repo"
spec:
  source:
    targetRevision: master
`;

describe('run', () => {
  let tempDir: string;
  let outputDir: string;
  let cloneDestinations: string[];
  let cloner: jest.Mocked<Cloner>;
  let templater: jest.Mocked<Templater>;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aoa-run-'));
    outputDir = path.join(tempDir, 'output');
    cloneDestinations = [];
    cloner = {
      clone: jest.fn<Cloner['clone']>().mockImplementation(async ({destination}) => {
        cloneDestinations.push(destination);
        fs.mkdirSync(destination, {recursive: true});
      }),
    };
    templater = {
      template: jest.fn<Templater['template']>().mockImplementation(async ({releaseName}: TemplateOptions) =>
        Buffer.from(releaseName === ROOT_RELEASE_NAME ? APP_OF_APPS : `kind: FakedOutput\nname: ${releaseName}\n`)
      ),
    };
  });

  afterEach(() => {
    fs.rmSync(tempDir, {recursive: true, force: true});
  });

  it('renders every application of the app-of-apps chart', async () => {
    const summary = await run({
      chartPath: '/charts/app-of-apps',
      valuesFiles: ['values/prod.yaml'],
      outputDir,
      templater,
      cloner,
      logger: silentLogger,
    });

    expect(summary).toEqual({applications: 2, outputDir, clones: 1});
    expect(templater.template).toHaveBeenNthCalledWith(1, {
      releaseName: 'app-of-apps',
      chartPath: '/charts/app-of-apps',
      valuesFiles: ['values/prod.yaml'],
    });

    const childCall = templater.template.mock.calls.find(([options]) => options.releaseName === 'dev-inf1-my-service');
    expect(childCall?.[0].setValues).toEqual(
      new Map([
        ['global.replicaCount', '3'],
        ['global.instance', 'inf1'],
        ['global.env', 'dev'],
      ])
    );
    expect(childCall?.[0].chartPath).toBe(path.join(cloneDestinations[0], 'stable', 'svc', '.helm'));

    expect(fs.readFileSync(path.join(outputDir, 'dev', 'inf1', 'dev-inf1-my-service.yaml'), 'utf-8')).toBe(
      'kind: FakedOutput\nname: dev-inf1-my-service\n'
    );
    expect(fs.readFileSync(path.join(outputDir, 'shared-repo.yaml'), 'utf-8')).toBe(
      'kind: FakedOutput\nname: shared-repo\n'
    );
  });

  it('clones into a temporary workspace that is removed afterwards', async () => {
    await run({chartPath: 'chart', valuesFiles: [], outputDir, templater, cloner, logger: silentLogger});

    expect(cloneDestinations).toHaveLength(1);
    expect(path.basename(cloneDestinations[0])).toBe('clone-1');
    expect(path.basename(path.dirname(cloneDestinations[0]))).toMatch(/^argo-charts-/);
    expect(fs.existsSync(path.dirname(cloneDestinations[0]))).toBe(false);
  });

  it('removes the workspace when applications fail', async () => {
    cloner.clone.mockImplementation(async ({destination}) => {
      cloneDestinations.push(destination);
      throw new Error('authentication failed');
    });

    const error = await run({
      chartPath: 'chart',
      valuesFiles: [],
      outputDir,
      templater,
      cloner,
      logger: silentLogger,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AggregateRenderError);
    if (error instanceof AggregateRenderError) {
      expect(error.failureCount).toBe(2);
    }
    expect(fs.existsSync(path.dirname(cloneDestinations[0]))).toBe(false);
  });

  it('fails before rendering children when the root chart fails', async () => {
    templater.template.mockRejectedValue(new Error('Chart.yaml file is missing'));

    await expect(
      run({chartPath: 'chart', valuesFiles: [], outputDir, templater, cloner, logger: silentLogger})
    ).rejects.toThrow('initialization failed: failed to render app-of-apps chart: Chart.yaml file is missing');
    expect(cloner.clone).not.toHaveBeenCalled();
  });

  it('fails before rendering children when an application is invalid', async () => {
    templater.template.mockResolvedValue(
      Buffer.from(`
apiVersion: argoproj.io/v1alpha1
kind: Application
metadata:
  name: conflicted
  labels: {env: dev}
spec:
  source:
    repoURL: https://git.example.com/org/repo
    plugin:
      env:
        - {name: WERF_SET_ENV, value: "global.env=prod"}
`)
    );

    await expect(
      run({chartPath: 'chart', valuesFiles: [], outputDir, templater, cloner, logger: silentLogger})
    ).rejects.toThrow(
      "initialization failed: application 'conflicted' is invalid: conflicting values for 'env': label is 'dev', plugin.env is 'prod'"
    );
    expect(cloner.clone).not.toHaveBeenCalled();
  });

  it('fails when the output directory cannot be created', async () => {
    const blocker = path.join(tempDir, 'file');
    fs.writeFileSync(blocker, '');

    await expect(
      run({
        chartPath: 'chart',
        valuesFiles: [],
        outputDir: path.join(blocker, 'out'),
        templater,
        cloner,
        logger: silentLogger,
      })
    ).rejects.toThrow(`failed to create output directory ${path.join(blocker, 'out')}`);
    expect(templater.template).not.toHaveBeenCalled();
  });
});
