#!/usr/bin/env node

import chalk from 'chalk';
import fs from 'fs';
import path from 'path';

import {createRenderCommand} from './commands/render/index.js';
import {errorMessage} from './lib/errors.js';

function readVersion(): string {
  const packageJsonPath = path.join(__dirname, '..', 'package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return 'dev';
}

async function main() {
  const program = createRenderCommand({version: readVersion()});
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error(chalk.red('✗ error:'), 'failed to start aoa-render:', errorMessage(error));
  process.exit(1);
});
