import execa from 'execa';

interface RequiredCommand {
  name: string;
  command: string;
  args: string[];
  installUrl: string;
}

export interface MissingCommand {
  name: string;
  installUrl: string;
}

/**
 * Check if a command exists and is executable by running it with specified args
 */
export async function checkCommandExists(
  command: string,
  args: string[] = ['--version']
): Promise<boolean> {
  try {
    await execa(command, args);
    return true;
  } catch {
    return false;
  }
}

/**
 * Return the tools a render needs that cannot be executed, in check order.
 */
export async function findMissingCommands(binaries: {
  helm: string;
  git: string;
}): Promise<MissingCommand[]> {
  const required: RequiredCommand[] = [
    {
      name: 'helm',
      command: binaries.helm,
      args: ['version', '--short'],
      installUrl: 'https://helm.sh/docs/intro/install/',
    },
    {
      name: 'git',
      command: binaries.git,
      args: ['version'],
      installUrl: 'https://git-scm.com/downloads',
    },
  ];

  const missing: MissingCommand[] = [];
  for (const cmd of required) {
    if (!(await checkCommandExists(cmd.command, cmd.args))) {
      missing.push({name: cmd.name, installUrl: cmd.installUrl});
    }
  }
  return missing;
}
