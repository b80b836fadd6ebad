import { Command } from 'commander';
import * as output from '../output.js';
import { formatNotificationLine } from '../output/github-formatters.js';
import { runGitHubCommand } from './shared.js';

const listCommand = new Command('list')
  .description('List unread notifications')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    await runGitHubCommand(
      command,
      async ({ client }) => {
        const notifications = await client.listNotifications();
        if (options.json) {
          output.json(notifications);
          return;
        }
        if (notifications.length === 0) {
          output.info('No notifications');
          return;
        }
        for (const notification of notifications) {
          output.info(formatNotificationLine(notification));
        }
      },
      options
    );
  });

const readCommand = new Command('read')
  .description('Mark all notifications as read')
  .action(async (_options: Record<string, unknown>, command: Command) => {
    await runGitHubCommand(command, async ({ client }) => {
      await client.markNotificationsRead();
      output.success('All notifications marked as read');
    });
  });

export const notificationCommand = new Command('notification')
  .description('List notifications and mark them read')
  .addCommand(listCommand)
  .addCommand(readCommand);
