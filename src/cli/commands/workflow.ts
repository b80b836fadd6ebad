import { Command } from 'commander';
import { GITHUB } from '../../constants.js';
import * as output from '../output.js';
import { formatWorkflowLine } from '../output/github-formatters.js';
import { runGitHubCommand } from './shared.js';

const listCommand = new Command('list')
  .description('List GitHub Actions workflows of a repository')
  .argument('<repo>', 'Repository name')
  .option('--json', 'Output as JSON')
  .action(async (repo: string, options: { json?: boolean }, command: Command) => {
    await runGitHubCommand(
      command,
      async ({ client }) => {
        const workflows = await client.listWorkflows(repo);
        if (options.json) {
          output.json(workflows);
          return;
        }
        if (workflows.length === 0) {
          output.info('No workflows');
          return;
        }
        for (const workflow of workflows) {
          output.info(formatWorkflowLine(workflow));
        }
      },
      options
    );
  });

const runCommand = new Command('run')
  .description('Dispatch a workflow run')
  .argument('<repo>', 'Repository name')
  .argument('<workflow>', 'Workflow ID or file name (e.g. ci.yml)')
  .option('--ref <ref>', 'Branch or tag to run on', GITHUB.DEFAULT_BRANCH)
  .action(async (repo: string, workflow: string, options: { ref: string }, command: Command) => {
    await runGitHubCommand(command, async ({ client }) => {
      await client.triggerWorkflow(repo, workflow, options.ref);
      output.success(`Workflow ${workflow} triggered on ${options.ref}`);
    });
  });

export const workflowCommand = new Command('workflow')
  .description('List and trigger GitHub Actions workflows')
  .addCommand(listCommand)
  .addCommand(runCommand);
