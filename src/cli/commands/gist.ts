import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { basename, resolve } from 'path';
import * as output from '../output.js';
import { formatGistLine } from '../output/github-formatters.js';
import { runGitHubCommand } from './shared.js';

interface CreateOptions {
  description: string;
  public?: boolean;
}

const listCommand = new Command('list')
  .description('List gists of the authenticated account')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    await runGitHubCommand(
      command,
      async ({ client }) => {
        const gists = await client.listGists();
        if (options.json) {
          output.json(gists);
          return;
        }
        if (gists.length === 0) {
          output.info('No gists');
          return;
        }
        for (const gist of gists) {
          output.info(formatGistLine(gist));
        }
      },
      options
    );
  });

const createCommand = new Command('create')
  .description('Create a gist from local files')
  .argument('<files...>', 'Files to include')
  .option('-d, --description <text>', 'Gist description', '')
  .option('--public', 'Make the gist public')
  .action(async (files: string[], options: CreateOptions, command: Command) => {
    await runGitHubCommand(command, async ({ client }) => {
      const contents: Record<string, string> = {};
      for (const file of files) {
        contents[basename(file)] = await readFile(resolve(file), 'utf-8');
      }
      const gist = await client.createGist({
        description: options.description,
        public: options.public ?? false,
        files: contents,
      });
      output.success(`Created gist: ${gist.html_url}`);
    });
  });

export const gistCommand = new Command('gist')
  .description('Create and list gists')
  .addCommand(listCommand)
  .addCommand(createCommand);
