import { Command } from 'commander';
import * as output from '../output.js';
import { userProfileFields } from '../output/github-formatters.js';
import { runGitHubCommand } from './shared.js';

export const whoamiCommand = new Command('whoami')
  .description('Show the account the token belongs to')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    await runGitHubCommand(
      command,
      async ({ user }) => {
        if (options.json) {
          output.json(user);
          return;
        }
        output.section('User information');
        for (const [label, value] of userProfileFields(user)) {
          output.keyValue(`  ${label}`, value);
        }
      },
      options
    );
  });
