import { Command } from 'commander';
import { authCommand } from './commands/auth.js';
import { accountCommand } from './commands/account.js';
import { campaignsCommand } from './commands/campaigns.js';
import { activitiesCommand } from './commands/activities.js';
import { contactsCommand } from './commands/contacts.js';
import { listsCommand } from './commands/lists.js';
import { configCommand } from './commands/config.js';
import { setLogLevel } from './lib/logger.js';

export const VERSION = '0.1.0';

/**
 * Build a fresh program; commander keeps parsed option values on the instance
 */
export function createCli(): Command {
  const cli = new Command();

  cli
    .name('mkt')
    .description('Email marketing API client: OAuth2, campaigns, activities, contacts and lists')
    .version(VERSION);

  cli
    .option('-f, --format <format>', 'Output format: json (default) | table')
    .option('-t, --token <token>', 'Access token (default: MKT_ACCESS_TOKEN)')
    .option('-v, --verbose', 'Log HTTP requests to stderr');

  cli.hook('preAction', (thisCommand) => {
    if (thisCommand.opts().verbose) {
      setLogLevel('debug');
    }
  });

  cli.addCommand(authCommand());
  cli.addCommand(accountCommand());
  cli.addCommand(campaignsCommand());
  cli.addCommand(activitiesCommand());
  cli.addCommand(contactsCommand());
  cli.addCommand(listsCommand());
  cli.addCommand(configCommand());

  return cli;
}
