#!/usr/bin/env node

import { Command } from 'commander';
import { configureLogger } from '../logging/logger.js';
import { VERSION } from '../version.js';
import { fileCommand } from './commands/file.js';
import { gistCommand } from './commands/gist.js';
import { initCommand } from './commands/init.js';
import { issueCommand } from './commands/issue.js';
import { menuCommand, runMenuCommand } from './commands/menu.js';
import { notificationCommand } from './commands/notification.js';
import { repoCommand } from './commands/repo.js';
import { failCommand, parseGlobalOptions } from './commands/shared.js';
import { whoamiCommand } from './commands/whoami.js';
import { workflowCommand } from './commands/workflow.js';
import { configureOutput } from './output.js';

const program = new Command();

// Extended help with examples
const examples = `
Examples:

  Interactive menu:
    $ octoterm                              # Prompts for username and token

  Scripted use (token from the environment):
    $ export GITHUB_USERNAME=your-login GITHUB_TOKEN=...
    $ octoterm --no-input repo list --json
    $ octoterm file upload my-repo ./notes.md --dest docs/notes.md
    $ octoterm workflow run my-repo ci.yml --ref main
    $ octoterm issue list my-repo --state all

  Configuration:
    $ octoterm init                         # Create octoterm.yaml
`;

program
  .name('octoterm')
  .description('Work with a GitHub account from the terminal: repositories, files, workflows, gists, notifications and issues.')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config file')
  .option('-u, --username <login>', 'GitHub username')
  .option('--no-input', 'Never prompt; fail when a credential is not configured')
  .option('--timeout <ms>', 'Per-request timeout in milliseconds')
  .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
  .option('--log-file <path>', 'Write logs to file instead of stderr')
  .option('--no-color', 'Disable colored output')
  .option('-q, --quiet', 'Only print results and errors')
  .allowExcessArguments(false)
  .hook('preAction', (_thisCommand, actionCommand) => {
    const options = parseGlobalOptions(actionCommand.optsWithGlobals());
    configureOutput(options.color ? { quiet: options.quiet } : { quiet: options.quiet, noColor: true });
    if (options.logLevel || options.logFile) {
      configureLogger({
        level: options.logLevel,
        file: options.logFile,
      });
    }
  })
  .addHelpText('after', examples)
  .action(async (_options: Record<string, unknown>, command: Command) => {
    await runMenuCommand(command);
  });

program.addCommand(menuCommand);
program.addCommand(whoamiCommand);
program.addCommand(repoCommand);
program.addCommand(fileCommand);
program.addCommand(workflowCommand);
program.addCommand(gistCommand);
program.addCommand(notificationCommand);
program.addCommand(issueCommand);
program.addCommand(initCommand);

program.parseAsync().catch(failCommand);
