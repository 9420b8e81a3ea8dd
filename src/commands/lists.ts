/**
 * Lists Command
 */

import { Command } from 'commander';
import { getApiClient, requireAccessToken, runAction } from '../lib/api-client.js';
import { parseLimit } from '../lib/cli-options.js';
import { outputData, renderRecord, renderTable } from '../lib/output-formatter.js';
import { printContactPage } from './contacts.js';

export function listsCommand(): Command {
  const lists = new Command('lists').description('Contact lists');

  lists
    .command('list')
    .description('List contact lists')
    .option('--modified-since <iso>', 'Only lists modified after this ISO-8601 time')
    .action(async (options: { modifiedSince?: string }, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const result = await getApiClient().lists.getLists(requireAccessToken(globals), {
          modified_since: options.modifiedSince,
        });
        outputData(result, globals.format, () => {
          console.log(
            renderTable(
              ['ID', 'Name', 'Status', 'Contacts'],
              result.map((l) => [l.id, l.name, l.status, l.contact_count])
            )
          );
        });
      });
    });

  lists
    .command('get')
    .description('Show one list')
    .argument('<id>', 'List id')
    .action(async (id: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const list = await getApiClient().lists.getList(requireAccessToken(globals), id);
        outputData(list, globals.format, () => console.log(renderRecord(list)));
      });
    });

  lists
    .command('contacts')
    .description('List the contacts of a list (one page)')
    .argument('<id>', 'List id')
    .option('--limit <n>', 'Page size 1-500')
    .option('--next <cursor>', 'Cursor from a previous page')
    .action(async (id: string, options: { limit?: string; next?: string }, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const query = options.next ? { next: options.next } : { limit: parseLimit(options.limit) };
        const page = await getApiClient().lists.getContactsFromList(requireAccessToken(globals), id, query);
        outputData({ results: page.results, next: page.next ?? null }, globals.format, () =>
          printContactPage(page)
        );
      });
    });

  return lists;
}
