import { Command } from 'commander';
import * as output from '../output.js';
import { parseIssueState } from '../interactive.js';
import { formatIssueLine } from '../output/github-formatters.js';
import { runGitHubCommand } from './shared.js';

const listCommand = new Command('list')
  .description('List issues of a repository')
  .argument('<repo>', 'Repository name')
  .option('-s, --state <state>', 'open, closed or all', 'open')
  .option('--json', 'Output as JSON')
  .action(async (repo: string, options: { state: string; json?: boolean }, command: Command) => {
    await runGitHubCommand(
      command,
      async ({ client }) => {
        const state = parseIssueState(options.state);
        const issues = await client.listIssues(repo, state);
        if (options.json) {
          output.json(issues);
          return;
        }
        if (issues.length === 0) {
          output.info(`No ${state} issues`);
          return;
        }
        for (const issue of issues) {
          output.info(formatIssueLine(issue));
        }
      },
      options
    );
  });

const createCommand = new Command('create')
  .description('Open an issue')
  .argument('<repo>', 'Repository name')
  .argument('<title>', 'Issue title')
  .option('--body <text>', 'Issue body')
  .action(async (repo: string, title: string, options: { body?: string }, command: Command) => {
    await runGitHubCommand(command, async ({ client }) => {
      const issue = await client.createIssue(repo, { title, body: options.body });
      output.success(`Created issue #${issue.number}: ${issue.html_url}`);
    });
  });

export const issueCommand = new Command('issue')
  .description('Create and list issues')
  .addCommand(listCommand)
  .addCommand(createCommand);
