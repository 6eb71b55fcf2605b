import Debug from 'debug';
import execa from 'execa';

import {errorMessage} from '../errors.js';
import type {Logger} from '../logger.js';

const debug = Debug('aoa:git');

export interface CloneOptions {
  repository: string;
  revision: string;
  destination: string;
}

/**
 * Materializes one revision of a repository on disk.
 */
export interface Cloner {
  clone(options: CloneOptions, logger: Logger): Promise<void>;
}

/**
 * Shallow, single-branch clone through the git binary.
 */
export class GitCloner implements Cloner {
  constructor(private readonly gitBinary = 'git') {}

  async clone({repository, revision, destination}: CloneOptions, logger: Logger): Promise<void> {
    const log = logger.child({repo: repository, revision});
    const args = [
      'clone',
      '--depth',
      '1',
      '--single-branch',
      '--branch',
      revision,
      repository,
      destination,
    ];

    log.info('cloning repository...');
    debug('%s %o', this.gitBinary, args);

    try {
      await execa(this.gitBinary, args, {
        env: {GIT_TERMINAL_PROMPT: '0'},
      });
    } catch (error) {
      throw new Error(
        `git clone failed for ${repository} (revision ${revision}): ${errorMessage(error)}`,
        {cause: error}
      );
    }

    log.info('successfully cloned repository');
  }
}
