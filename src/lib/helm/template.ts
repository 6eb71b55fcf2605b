import Debug from 'debug';
import execa from 'execa';

import {errorMessage} from '../errors.js';

const debug = Debug('aoa:helm');

export interface TemplateOptions {
  releaseName: string;
  chartPath: string;
  valuesFiles?: readonly string[];
  setValues?: ReadonlyMap<string, string>;
}

/**
 * Renders a chart directory into raw manifest bytes.
 */
export interface Templater {
  template(options: TemplateOptions): Promise<Buffer>;
}

export function buildTemplateArgs({
  releaseName,
  chartPath,
  valuesFiles = [],
  setValues = new Map<string, string>(),
}: TemplateOptions): string[] {
  const args = ['template', releaseName, chartPath];

  for (const file of valuesFiles) {
    args.push('--values', file);
  }

  const keys = [...setValues.keys()].sort();
  for (const key of keys) {
    args.push('--set', `${key}=${setValues.get(key) ?? ''}`);
  }

  return args;
}

export class HelmTemplater implements Templater {
  constructor(private readonly helmBinary = 'helm') {}

  async template(options: TemplateOptions): Promise<Buffer> {
    const args = buildTemplateArgs(options);
    debug('%s %o', this.helmBinary, args);

    try {
      const {stdout} = await execa(this.helmBinary, args, {
        encoding: null,
        stripFinalNewline: false,
      });
      return stdout;
    } catch (error) {
      throw new Error(`helm template failed for ${options.chartPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
