/**
 * Repository commands: list, create, delete.
 */

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { InvalidInputError } from '../../errors/types.js';
import * as output from '../output.js';
import { formatRepositoryLine } from '../output/github-formatters.js';
import { runGitHubCommand } from './shared.js';

interface CreateOptions {
  private?: boolean;
  description?: string;
  readme: boolean;
  readmeFile?: string;
}

const listCommand = new Command('list')
  .description('List repositories of the authenticated account')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    await runGitHubCommand(
      command,
      async ({ client }) => {
        const repos = await client.listRepositories();
        if (options.json) {
          output.json(repos);
          return;
        }
        if (repos.length === 0) {
          output.info('No repositories');
          return;
        }
        for (const repo of repos) {
          output.info(formatRepositoryLine(repo));
        }
      },
      options
    );
  });

const createCommand = new Command('create')
  .description('Create a repository')
  .argument('<name>', 'Repository name')
  .option('--private', 'Make the repository private')
  .option('-d, --description <text>', 'Repository description')
  .option('--no-readme', 'Create an empty repository without an initial commit')
  .option('--readme-file <path>', 'Replace the generated README.md with this file')
  .action(async (name: string, options: CreateOptions, command: Command) => {
    await runGitHubCommand(command, async ({ client }) => {
      if (options.readmeFile && !options.readme) {
        throw new InvalidInputError('--readme-file cannot be combined with --no-readme');
      }
      const readme = options.readmeFile
        ? await readFile(resolve(options.readmeFile), 'utf-8')
        : undefined;

      const created = await client.createRepository({
        name,
        private: options.private ?? false,
        description: options.description,
        autoInit: options.readme,
        readme,
      });
      output.success(`Created repository: ${created.repository.html_url}`);
      if (created.readme) {
        output.success('README.md updated');
      }
      if (created.readmeError) {
        output.warn(`README.md not updated: ${created.readmeError.message}`);
      }
    });
  });

const deleteCommand = new Command('delete')
  .description('Delete a repository')
  .argument('<name>', 'Repository name')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (name: string, options: { yes?: boolean }, command: Command) => {
    await runGitHubCommand(command, async (ctx) => {
      const fullName = `${ctx.client.owner}/${name}`;
      if (!options.yes) {
        if (!ctx.interactive) {
          throw new InvalidInputError(`Refusing to delete ${fullName} without confirmation; pass --yes`);
        }
        const answer = await ctx
          .prompter()
          .ask(`Are you sure you want to delete ${fullName}? Type 'yes' to confirm: `);
        if (answer !== 'yes') {
          output.info('Deletion cancelled');
          return;
        }
      }
      await ctx.client.deleteRepository(name);
      output.success(`Deleted repository: ${fullName}`);
    });
  });

export const repoCommand = new Command('repo')
  .description('Manage repositories')
  .addCommand(listCommand)
  .addCommand(createCommand)
  .addCommand(deleteCommand);
