/**
 * File commands: upload to and download from a repository.
 */

import { Command } from 'commander';
import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { basename, resolve } from 'path';
import { GITHUB } from '../../constants.js';
import { InvalidInputError } from '../../errors/types.js';
import * as output from '../output.js';
import { runGitHubCommand } from './shared.js';

interface UploadOptions {
  dest?: string;
  branch: string;
  message?: string;
}

interface DownloadOptions {
  out?: string;
  ref?: string;
}

const uploadCommand = new Command('upload')
  .description('Create or update a file in a repository')
  .argument('<repo>', 'Repository name')
  .argument('<source>', 'Local file to upload')
  .option('--dest <path>', 'Destination path in the repository (default: file name)')
  .option('-b, --branch <branch>', 'Target branch', GITHUB.DEFAULT_BRANCH)
  .option('-m, --message <text>', 'Commit message')
  .action(async (repo: string, source: string, options: UploadOptions, command: Command) => {
    await runGitHubCommand(command, async ({ client }) => {
      const sourcePath = resolve(source);
      if (!existsSync(sourcePath)) {
        throw new InvalidInputError(`File not found: ${source}`);
      }
      const content = await readFile(sourcePath);
      const result = await client.putFile({
        repo,
        path: options.dest ?? basename(source),
        content,
        message: options.message ?? `Upload ${basename(source)}`,
        branch: options.branch,
      });
      output.success('File uploaded');
      output.keyValue('URL', result.content.html_url);
      output.keyValue('Commit', result.commit.sha);
    });
  });

const downloadCommand = new Command('download')
  .description('Download a file from a repository')
  .argument('<repo>', 'Repository name')
  .argument('<path>', 'File path in the repository')
  .option('-o, --out <path>', 'Where to save the file (default: file name)')
  .option('--ref <ref>', 'Branch, tag or commit')
  .action(async (repo: string, path: string, options: DownloadOptions, command: Command) => {
    await runGitHubCommand(command, async ({ client }) => {
      const file = await client.getFile(repo, path, options.ref);
      const target = options.out ?? basename(file.path);
      await writeFile(resolve(target), file.data);
      output.success(`File saved to: ${target} (${file.size} bytes)`);
    });
  });

export const fileCommand = new Command('file')
  .description('Upload and download repository files')
  .addCommand(uploadCommand)
  .addCommand(downloadCommand);
