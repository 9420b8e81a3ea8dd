/**
 * Account Command
 */

import { Command } from 'commander';
import { getApiClient, requireAccessToken, runAction } from '../lib/api-client.js';
import { parseChoice } from '../lib/cli-options.js';
import { outputData, renderRecord, renderTable } from '../lib/output-formatter.js';
import type { VerifiedEmailAddress, VerifiedEmailStatus } from '../models/account.js';

const EMAIL_STATUSES: readonly (VerifiedEmailStatus | 'ALL')[] = ['ALL', 'CONFIRMED', 'UNCONFIRMED'];

function printEmails(emails: VerifiedEmailAddress[]): void {
  console.log(renderTable(['Email', 'Status'], emails.map((e) => [e.email_address, e.status])));
}

export function accountCommand(): Command {
  const account = new Command('account').description('Account administration');

  account
    .command('info')
    .description('Show account information')
    .action(async (_options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const info = await getApiClient().account.getAccountInfo(requireAccessToken(globals));
        outputData(info, globals.format, () => console.log(renderRecord(info)));
      });
    });

  account
    .command('emails')
    .description('List verified sender addresses')
    .option('--status <status>', 'ALL | CONFIRMED | UNCONFIRMED')
    .action(async (options: { status?: string }, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const emails = await getApiClient().account.getVerifiedEmailAddresses(
          requireAccessToken(globals),
          { status: parseChoice(options.status, EMAIL_STATUSES, 'status') }
        );
        outputData(emails, globals.format, () => printEmails(emails));
      });
    });

  account
    .command('add-email')
    .description('Add a verified sender address (a verification email is sent)')
    .argument('<email>', 'Email address')
    .action(async (email: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const emails = await getApiClient().account.createVerifiedEmailAddress(
          requireAccessToken(globals),
          email
        );
        outputData(emails, globals.format, () => printEmails(emails));
      });
    });

  return account;
}
