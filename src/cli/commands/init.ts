/**
 * Init command - creates an octoterm.yaml configuration file.
 *
 * The generated config lists every option with comments. The token itself is
 * never written; the file only names the environment variable holding it.
 */

import { Command } from 'commander';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { generateDefaultConfig } from '../../config/loader.js';
import { PATHS } from '../../constants.js';
import { InvalidInputError } from '../../errors/types.js';
import * as output from '../output.js';
import { failCommand } from './shared.js';

interface InitOptions {
  force?: boolean;
  global?: boolean;
}

/**
 * Write the default configuration.
 *
 * @returns The path written
 * @throws InvalidInputError when the file exists and `force` is not set
 */
export function writeDefaultConfig(dir: string, force = false): string {
  const configPath = join(dir, PATHS.DEFAULT_CONFIG_FILENAME);
  if (existsSync(configPath) && !force) {
    throw new InvalidInputError(`Config file already exists: ${configPath}. Use --force to overwrite.`);
  }
  mkdirSync(dir, { recursive: true });
  writeFileSync(configPath, generateDefaultConfig());
  return configPath;
}

export const initCommand = new Command('init')
  .description('Create an octoterm.yaml configuration file')
  .option('-f, --force', 'Overwrite existing config file')
  .option('-g, --global', `Write to ~/${PATHS.CONFIG_DIR} instead of the current directory`)
  .action((options: InitOptions) => {
    try {
      const dir = options.global ? join(homedir(), PATHS.CONFIG_DIR) : process.cwd();
      const configPath = writeDefaultConfig(dir, options.force);
      output.success(`Created ${configPath}`);
      output.newline();
      output.info('Next steps:');
      output.info('  1. Export GITHUB_USERNAME and GITHUB_TOKEN (or put them in .env)');
      output.info('  2. Run: octoterm whoami');
    } catch (error) {
      failCommand(error);
    }
  });
