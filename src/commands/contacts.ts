/**
 * Contacts Command
 */

import { Command } from 'commander';
import { getApiClient, requireAccessToken, runAction } from '../lib/api-client.js';
import { parseLimit } from '../lib/cli-options.js';
import { outputData, renderRecord, renderTable } from '../lib/output-formatter.js';
import type { Contact } from '../models/contact.js';
import type { ResultSet } from '../lib/result-set.js';

export function primaryEmail(contact: Contact): string | undefined {
  return contact.email_addresses?.[0]?.email_address;
}

/**
 * Shared by `contacts list` and `lists contacts`
 */
export function printContactPage(page: ResultSet<Contact>): void {
  console.log(
    renderTable(
      ['ID', 'Email', 'First name', 'Last name', 'Status'],
      page.results.map((c) => [c.id, primaryEmail(c), c.first_name, c.last_name, c.status])
    )
  );
  if (page.next) {
    console.log(`Next page: --next ${page.next}`);
  }
}

export function contactsCommand(): Command {
  const contacts = new Command('contacts').description('Contacts');

  contacts
    .command('list')
    .description('List contacts (one page)')
    .option('--limit <n>', 'Page size 1-500')
    .option('--email <email>', 'Only the contact with this address')
    .option('--next <cursor>', 'Cursor from a previous page')
    .action(async (options: { limit?: string; email?: string; next?: string }, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const query = options.next
          ? { next: options.next }
          : { limit: parseLimit(options.limit), email: options.email };
        const page = await getApiClient().contacts.getContacts(requireAccessToken(globals), query);
        outputData({ results: page.results, next: page.next ?? null }, globals.format, () =>
          printContactPage(page)
        );
      });
    });

  contacts
    .command('get')
    .description('Show one contact')
    .argument('<id>', 'Contact id')
    .action(async (id: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const contact = await getApiClient().contacts.getContact(requireAccessToken(globals), id);
        outputData(contact, globals.format, () =>
          console.log(renderRecord({ ...contact, email: primaryEmail(contact) }))
        );
      });
    });

  contacts
    .command('delete')
    .description('Opt a contact out of all lists')
    .argument('<id>', 'Contact id')
    .action(async (id: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const deleted = await getApiClient().contacts.deleteContact(requireAccessToken(globals), id);
        outputData({ id, deleted }, globals.format, () => {
          console.log(deleted ? `Contact ${id} deleted` : `Contact ${id} was not deleted`);
        });
        if (!deleted) {
          process.exitCode = 1;
        }
      });
    });

  return contacts;
}
