/**
 * Interactive menu.
 *
 * Numbered operations against the authenticated account. A failing item is
 * reported and the menu continues; a rejected token ends the run.
 */

import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { basename, resolve } from 'path';
import type { Prompter } from '../auth/prompt.js';
import { GITHUB } from '../constants.js';
import {
  InputAbortedError,
  InvalidInputError,
  NetworkError,
  UnauthorizedError,
} from '../errors/types.js';
import type { GitHubClient, MutationOptions } from '../github/client.js';
import type { IssueState, Repository } from '../github/types.js';
import * as output from './output.js';
import {
  formatGistLine,
  formatIssueLine,
  formatNotificationLine,
  formatRepositoryLine,
  formatWorkflowLine,
  userProfileFields,
} from './output/github-formatters.js';
import { printError } from './utils/error-hints.js';

/**
 * What a menu action works with.
 */
export interface MenuContext {
  client: GitHubClient;
  prompter: Prompter;
  /** Directory local paths resolve against (default cwd) */
  cwd?: string;
}

interface MenuEntry {
  key: string;
  label: string;
  run: (ctx: MenuContext) => Promise<void>;
}

interface MenuGroup {
  title: string;
  entries: MenuEntry[];
}

const RULE = '='.repeat(60);
const ISSUE_STATES: readonly IssueState[] = ['open', 'closed', 'all'];

/**
 * Ask a question whose answer must not be empty.
 */
async function askRequired(prompter: Prompter, question: string, label: string): Promise<string> {
  const answer = await prompter.ask(question);
  if (!answer) {
    throw new InvalidInputError(`${label} is required`);
  }
  return answer;
}

async function askYesNo(prompter: Prompter, question: string): Promise<boolean> {
  const answer = await prompter.ask(`${question} (yes/no): `);
  return answer.toLowerCase() === 'yes';
}

function localPath(ctx: MenuContext, path: string): string {
  return resolve(ctx.cwd ?? process.cwd(), path);
}

/**
 * Run a mutating call once. On a network failure the change may or may not
 * have reached GitHub, so repeating it needs the operator's confirmation.
 */
export async function confirmRetryOnNetworkError<T>(
  prompter: Prompter,
  description: string,
  fn: (options: MutationOptions) => Promise<T>
): Promise<T> {
  try {
    return await fn({});
  } catch (error) {
    if (!(error instanceof NetworkError)) {
      throw error;
    }
    output.warn(`${description} failed: ${error.message}`);
    output.warn('GitHub may or may not have applied the change.');
    if (!(await askYesNo(prompter, 'Retry?'))) {
      throw error;
    }
    return fn({ allowRetry: true });
  }
}

/**
 * Read README text typed at the prompt. Two consecutive empty lines end it.
 */
async function readTypedContent(prompter: Prompter): Promise<string> {
  output.info('\nEnter README content (press Enter twice when done):');
  const lines: string[] = [];
  // eslint-disable-next-line no-constant-condition
  while (true) {
    const line = await prompter.askRaw('');
    if (line === '' && lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
      break;
    }
    lines.push(line);
  }
  return lines.join('\n');
}

async function askReadmeContent(ctx: MenuContext): Promise<string | undefined> {
  if (!(await askYesNo(ctx.prompter, 'Customize README content?'))) {
    return undefined;
  }
  output.info('\nREADME content:');
  output.numberedList(['Type content directly', 'Load from file']);
  const choice = await ctx.prompter.ask('Choose option: ');

  if (choice === '1') {
    return readTypedContent(ctx.prompter);
  }
  if (choice === '2') {
    const path = await askRequired(ctx.prompter, 'Enter path to README file: ', 'README path');
    try {
      const content = await readFile(localPath(ctx, path), 'utf-8');
      output.success('README content loaded from file');
      return content;
    } catch (error) {
      printError(error);
      output.warn('Keeping the generated README.');
      return undefined;
    }
  }
  output.warn('Unknown option, keeping the generated README.');
  return undefined;
}

// ==========================================================================
// Repository operations
// ==========================================================================

async function listRepositories(ctx: MenuContext): Promise<void> {
  output.info(`\nRepositories for ${ctx.client.owner}:\n`);
  const repos = await ctx.client.listRepositories();
  if (repos.length === 0) {
    output.info('  No repositories');
    return;
  }
  for (const repo of repos) {
    output.info(`  ${formatRepositoryLine(repo)}`);
  }
}

async function createRepository(ctx: MenuContext): Promise<void> {
  const { prompter, client } = ctx;
  const name = await askRequired(prompter, '\nEnter repository name: ', 'Repository name');
  const isPrivate = await askYesNo(prompter, 'Make private?');
  const description = await prompter.ask('Enter description (optional): ');
  const addReadme = await askYesNo(prompter, 'Add README.md?');
  const readme = addReadme ? await askReadmeContent(ctx) : undefined;

  output.info(`\nCreating repository '${name}'...`);
  const { repository } = await confirmRetryOnNetworkError(prompter, 'Create repository', (options) =>
    client.createRepository({ name, private: isPrivate, description, autoInit: addReadme }, options)
  );
  output.success(`Created repository: ${repository.html_url}`);
  if (readme !== undefined) {
    await replaceReadme(ctx, repository, readme);
  }
}

/**
 * Second step of repository creation. The repository already exists, so a
 * failure here is reported and the menu moves on.
 */
async function replaceReadme(ctx: MenuContext, repository: Repository, content: string): Promise<void> {
  try {
    await confirmRetryOnNetworkError(ctx.prompter, 'Update README', (options) =>
      ctx.client.replaceReadme(repository, content, options)
    );
    output.success('README.md updated');
  } catch (error) {
    if (error instanceof UnauthorizedError || error instanceof InputAbortedError) {
      throw error;
    }
    printError(error);
    output.warn(`${repository.full_name} was created with the generated README.md`);
  }
}

async function deleteRepository(ctx: MenuContext): Promise<void> {
  const { prompter, client } = ctx;
  const name = await askRequired(prompter, '\nEnter repository name to delete: ', 'Repository name');
  const answer = await prompter.ask(
    `Are you sure you want to delete ${client.owner}/${name}? Type 'yes' to confirm: `
  );
  if (answer !== 'yes') {
    output.info('Deletion cancelled');
    return;
  }
  await confirmRetryOnNetworkError(prompter, 'Delete repository', (options) =>
    client.deleteRepository(name, options)
  );
  output.success(`Deleted repository: ${client.owner}/${name}`);
}

async function uploadFile(ctx: MenuContext): Promise<void> {
  const { prompter, client } = ctx;
  const repo = await askRequired(prompter, '\nEnter repository name: ', 'Repository name');
  const branch = (await prompter.ask(`Enter branch (default: ${GITHUB.DEFAULT_BRANCH}): `)) || GITHUB.DEFAULT_BRANCH;
  const source = await askRequired(prompter, 'Enter the path of the file to upload: ', 'File path');
  const sourcePath = localPath(ctx, source);
  if (!existsSync(sourcePath)) {
    throw new InvalidInputError(`File not found: ${source}`);
  }
  const destination =
    (await prompter.ask(`Enter destination path in repo (default: ${basename(source)}): `)) ||
    basename(source);
  const message =
    (await prompter.ask('Enter commit message: ')) || `Upload ${basename(source)}`;

  const content = await readFile(sourcePath);
  output.info(`\nUploading ${source} to ${repo}...`);
  const result = await confirmRetryOnNetworkError(prompter, 'Upload', (options) =>
    client.putFile({ repo, path: destination, content, message, branch }, options)
  );
  output.success('File uploaded');
  output.keyValue('URL', result.content.html_url);
}

async function downloadFile(ctx: MenuContext): Promise<void> {
  const { prompter, client } = ctx;
  const repo = await askRequired(prompter, '\nEnter repository name: ', 'Repository name');
  const path = await askRequired(prompter, 'Enter file path in repository: ', 'File path');

  output.info(`\nDownloading ${path} from ${repo}...`);
  const file = await client.getFile(repo, path);
  const target =
    (await prompter.ask(`Enter path to save file (default: ${basename(file.path)}): `)) ||
    basename(file.path);
  await writeFile(localPath(ctx, target), file.data);
  output.success(`File saved to: ${target}`);
}

// ==========================================================================
// Workflow operations
// ==========================================================================

async function listWorkflows(ctx: MenuContext): Promise<void> {
  const repo = await askRequired(ctx.prompter, '\nEnter repository name: ', 'Repository name');
  output.info(`\nWorkflows for ${repo}:\n`);
  const workflows = await ctx.client.listWorkflows(repo);
  if (workflows.length === 0) {
    output.info('  No workflows');
    return;
  }
  for (const workflow of workflows) {
    output.info(`  ${formatWorkflowLine(workflow)}`);
  }
}

async function triggerWorkflow(ctx: MenuContext): Promise<void> {
  const { prompter, client } = ctx;
  const repo = await askRequired(prompter, '\nEnter repository name: ', 'Repository name');
  const workflowId = await askRequired(prompter, 'Enter workflow ID or file name: ', 'Workflow ID');
  const ref = (await prompter.ask(`Enter branch/ref (default: ${GITHUB.DEFAULT_BRANCH}): `)) || GITHUB.DEFAULT_BRANCH;

  await confirmRetryOnNetworkError(prompter, 'Trigger workflow', (options) =>
    client.triggerWorkflow(repo, workflowId, ref, options)
  );
  output.success(`Workflow ${workflowId} triggered on ${ref}`);
}

// ==========================================================================
// Gist operations
// ==========================================================================

async function createGist(ctx: MenuContext): Promise<void> {
  const { prompter, client } = ctx;
  const description = await prompter.ask('\nEnter gist description: ');
  const source = await askRequired(prompter, 'Enter file path to create gist from: ', 'File path');
  const sourcePath = localPath(ctx, source);
  if (!existsSync(sourcePath)) {
    throw new InvalidInputError(`File not found: ${source}`);
  }
  const isPublic = await askYesNo(prompter, 'Make gist public?');
  const content = await readFile(sourcePath, 'utf-8');

  const gist = await confirmRetryOnNetworkError(prompter, 'Create gist', (options) =>
    client.createGist({ description, public: isPublic, files: { [basename(source)]: content } }, options)
  );
  output.success(`Created gist: ${gist.html_url}`);
}

async function listGists(ctx: MenuContext): Promise<void> {
  output.info('\nGists:\n');
  const gists = await ctx.client.listGists();
  if (gists.length === 0) {
    output.info('  No gists');
    return;
  }
  for (const gist of gists) {
    output.info(`  ${formatGistLine(gist)}`);
  }
}

// ==========================================================================
// User, notification and issue operations
// ==========================================================================

async function showUser(ctx: MenuContext): Promise<void> {
  output.section('User information');
  const user = await ctx.client.getAuthenticatedUser();
  for (const [label, value] of userProfileFields(user)) {
    output.keyValue(`  ${label}`, value);
  }
}

async function listNotifications(ctx: MenuContext): Promise<void> {
  output.info('\nNotifications:\n');
  const notifications = await ctx.client.listNotifications();
  if (notifications.length === 0) {
    output.info('  No notifications');
    return;
  }
  for (const notification of notifications) {
    output.info(`  ${formatNotificationLine(notification)}`);
  }
}

async function markNotificationsRead(ctx: MenuContext): Promise<void> {
  await confirmRetryOnNetworkError(ctx.prompter, 'Mark notifications read', (options) =>
    ctx.client.markNotificationsRead(options)
  );
  output.success('All notifications marked as read');
}

async function createIssue(ctx: MenuContext): Promise<void> {
  const { prompter, client } = ctx;
  const repo = await askRequired(prompter, '\nEnter repository name: ', 'Repository name');
  const title = await askRequired(prompter, 'Enter issue title: ', 'Issue title');
  const body = await prompter.ask('Enter issue body (optional): ');

  const issue = await confirmRetryOnNetworkError(prompter, 'Create issue', (options) =>
    client.createIssue(repo, { title, body }, options)
  );
  output.success(`Created issue #${issue.number}: ${issue.html_url}`);
}

/**
 * Narrow an answer to an issue state.
 */
export function parseIssueState(value: string): IssueState {
  const state = ISSUE_STATES.find((candidate) => candidate === value);
  if (!state) {
    throw new InvalidInputError(`Unknown issue state '${value}' (expected open, closed or all)`);
  }
  return state;
}

async function listIssues(ctx: MenuContext): Promise<void> {
  const repo = await askRequired(ctx.prompter, '\nEnter repository name: ', 'Repository name');
  const state = parseIssueState(
    (await ctx.prompter.ask('Enter state (open/closed/all, default: open): ')) || 'open'
  );
  output.info(`\n${state} issues for ${repo}:\n`);
  const issues = await ctx.client.listIssues(repo, state);
  if (issues.length === 0) {
    output.info(`  No ${state} issues`);
    return;
  }
  for (const issue of issues) {
    output.info(`  ${formatIssueLine(issue)}`);
  }
}

export const MENU_GROUPS: readonly MenuGroup[] = [
  {
    title: 'Repository Operations',
    entries: [
      { key: '1', label: 'List repositories', run: listRepositories },
      { key: '2', label: 'Create repository', run: createRepository },
      { key: '3', label: 'Delete repository', run: deleteRepository },
      { key: '4', label: 'Upload file to repository', run: uploadFile },
      { key: '5', label: 'Download file from repository', run: downloadFile },
    ],
  },
  {
    title: 'Workflow Operations',
    entries: [
      { key: '6', label: 'List workflows', run: listWorkflows },
      { key: '7', label: 'Trigger workflow', run: triggerWorkflow },
    ],
  },
  {
    title: 'Gist Operations',
    entries: [
      { key: '8', label: 'Create gist', run: createGist },
      { key: '9', label: 'List gists', run: listGists },
    ],
  },
  {
    title: 'User Operations',
    entries: [{ key: '10', label: 'Get user info', run: showUser }],
  },
  {
    title: 'Notification Operations',
    entries: [
      { key: '11', label: 'List notifications', run: listNotifications },
      { key: '12', label: 'Mark all notifications as read', run: markNotificationsRead },
    ],
  },
  {
    title: 'Issue Operations',
    entries: [
      { key: '13', label: 'Create issue', run: createIssue },
      { key: '14', label: 'List issues', run: listIssues },
    ],
  },
];

function findEntry(choice: string): MenuEntry | undefined {
  for (const group of MENU_GROUPS) {
    const entry = group.entries.find((candidate) => candidate.key === choice);
    if (entry) {
      return entry;
    }
  }
  return undefined;
}

export function printMenu(): void {
  output.info(`\n${RULE}`);
  output.info(output.bold('octoterm - GitHub from the terminal'));
  output.info(RULE);
  for (const group of MENU_GROUPS) {
    output.info(`\n${group.title}:`);
    for (const entry of group.entries) {
      output.info(`  ${entry.key}. ${entry.label}`);
    }
  }
  output.info('\n  0. Exit');
  output.info(RULE);
}

/**
 * Run the menu until the operator exits.
 *
 * @throws UnauthorizedError when GitHub rejects the token
 */
export async function runMenu(ctx: MenuContext): Promise<void> {
  // eslint-disable-next-line no-constant-condition
  while (true) {
    printMenu();
    try {
      const choice = await ctx.prompter.ask('\nEnter your choice: ');
      if (choice === '0') {
        output.info('\nGoodbye!');
        return;
      }
      const entry = findEntry(choice);
      if (!entry) {
        output.warn('Invalid choice! Please try again.');
        continue;
      }
      await entry.run(ctx);
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        throw error;
      }
      if (error instanceof InputAbortedError) {
        output.info('\nGoodbye!');
        return;
      }
      printError(error);
    }
  }
}
