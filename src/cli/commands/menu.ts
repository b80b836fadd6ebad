import { Command } from 'commander';
import { InvalidInputError } from '../../errors/types.js';
import { runMenu } from '../interactive.js';
import { runGitHubCommand } from './shared.js';

/**
 * Open the interactive menu for the authenticated account.
 */
export async function runMenuCommand(command: Command): Promise<void> {
  await runGitHubCommand(command, async (ctx) => {
    if (!ctx.interactive) {
      throw new InvalidInputError('The menu needs operator input; drop --no-input or run a subcommand');
    }
    await runMenu({ client: ctx.client, prompter: ctx.prompter() });
  });
}

export const menuCommand = new Command('menu')
  .description('Open the interactive menu (default when no command is given)')
  .action(async (_options: Record<string, unknown>, command: Command) => {
    await runMenuCommand(command);
  });
