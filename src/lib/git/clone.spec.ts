import {describe, it, expect, jest, beforeEach} from '@jest/globals';
import execa, {type ExecaReturnValue} from 'execa';

import {silentLogger} from '../logger.js';
import {GitCloner} from './clone.js';

jest.mock('execa');

const mockExeca = jest.mocked(execa);

// The mock takes the type of execa's last overload, which yields Buffers.
const ok: ExecaReturnValue<Buffer> = {
  command: 'git clone',
  escapedCommand: 'git clone',
  exitCode: 0,
  stdout: Buffer.from(''),
  stderr: Buffer.from(''),
  failed: false,
  timedOut: false,
  killed: false,
  isCanceled: false,
};

describe('GitCloner', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('makes a shallow single-branch clone of the revision', async () => {
    mockExeca.mockResolvedValue(ok);

    await new GitCloner().clone(
      {
        repository: 'git@git.example.com:org/repo',
        revision: 'release-1',
        destination: '/tmp/argo-charts-x/clone-1',
      },
      silentLogger
    );

    expect(mockExeca).toHaveBeenCalledWith(
      'git',
      [
        'clone',
        '--depth',
        '1',
        '--single-branch',
        '--branch',
        'release-1',
        'git@git.example.com:org/repo',
        '/tmp/argo-charts-x/clone-1',
      ],
      {env: {GIT_TERMINAL_PROMPT: '0'}}
    );
  });

  it('names the repository and revision when the clone fails', async () => {
    mockExeca.mockRejectedValue(new Error('Remote branch nope not found in upstream origin'));

    await expect(
      new GitCloner('/usr/local/bin/git').clone(
        {repository: 'git@git.example.com:org/repo', revision: 'nope', destination: '/tmp/c'},
        silentLogger
      )
    ).rejects.toThrow(
      'git clone failed for git@git.example.com:org/repo (revision nope): Remote branch nope not found in upstream origin'
    );
    expect(mockExeca.mock.calls[0][0]).toBe('/usr/local/bin/git');
  });
});
