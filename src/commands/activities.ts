/**
 * Activities Command
 * Bulk contact activities; submitted jobs are not awaited
 */

import path from 'node:path';
import { Command } from 'commander';
import { getApiClient, requireAccessToken, runAction } from '../lib/api-client.js';
import { parseChoice, parseIdList } from '../lib/cli-options.js';
import { outputData, renderRecord, renderTable } from '../lib/output-formatter.js';
import type { Activity, ActivityStatus, ActivityType } from '../models/activity.js';

const ACTIVITY_STATUSES: readonly ActivityStatus[] = [
  'UNCONFIRMED',
  'PENDING',
  'QUEUED',
  'RUNNING',
  'COMPLETE',
  'ERROR',
];

const ACTIVITY_TYPES: readonly ActivityType[] = [
  'ADD_CONTACTS',
  'REMOVE_CONTACTS_FROM_LISTS',
  'CLEAR_CONTACTS_FROM_LISTS',
  'EXPORT_CONTACTS',
];

function printActivity(activity: Activity): void {
  console.log(renderRecord(activity));
}

export function activitiesCommand(): Command {
  const activities = new Command('activities').description('Bulk contact activities');

  activities
    .command('list')
    .description('List activities')
    .option('--status <status>', ACTIVITY_STATUSES.join(' | '))
    .option('--type <type>', ACTIVITY_TYPES.join(' | '))
    .action(async (options: { status?: string; type?: string }, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const result = await getApiClient().activities.getActivities(requireAccessToken(globals), {
          status: parseChoice(options.status, ACTIVITY_STATUSES, 'status'),
          type: parseChoice(options.type, ACTIVITY_TYPES, 'type'),
        });
        outputData(result, globals.format, () => {
          console.log(
            renderTable(
              ['ID', 'Type', 'Status', 'Contacts', 'Errors', 'Created'],
              result.map((a) => [a.id, a.type, a.status, a.contact_count, a.error_count, a.created_date])
            )
          );
        });
      });
    });

  activities
    .command('get')
    .description('Show one activity')
    .argument('<id>', 'Activity id')
    .action(async (id: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const activity = await getApiClient().activities.getActivity(requireAccessToken(globals), id);
        outputData(activity, globals.format, () => printActivity(activity));
      });
    });

  activities
    .command('clear-lists')
    .description('Remove all contacts from the given lists')
    .argument('<listIds...>', 'List ids')
    .action(async (listIds: string[], _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const activity = await getApiClient().activities.addClearListsActivity(
          requireAccessToken(globals),
          listIds
        );
        outputData(activity, globals.format, () => printActivity(activity));
      });
    });

  activities
    .command('import')
    .description('Add contacts from a txt, csv, xls or xlsx file')
    .argument('<file>', 'File to upload')
    .requiredOption('--lists <ids>', 'Comma-separated list ids', parseIdList)
    .action(async (file: string, options: { lists: string[] }, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const activity = await getApiClient().activities.createAddContactsActivityFromFile(
          requireAccessToken(globals),
          path.basename(file),
          file,
          options.lists
        );
        outputData(activity, globals.format, () => printActivity(activity));
      });
    });

  activities
    .command('remove')
    .description('Remove email addresses from the given lists')
    .argument('<emails...>', 'Email addresses')
    .requiredOption('--lists <ids>', 'Comma-separated list ids', parseIdList)
    .action(async (emails: string[], options: { lists: string[] }, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const activity = await getApiClient().activities.addRemoveContactsFromListsActivity(
          requireAccessToken(globals),
          emails,
          options.lists
        );
        outputData(activity, globals.format, () => printActivity(activity));
      });
    });

  return activities;
}
