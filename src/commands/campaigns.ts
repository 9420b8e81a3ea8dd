/**
 * Campaigns Command
 */

import { Command } from 'commander';
import { getApiClient, requireAccessToken, runAction } from '../lib/api-client.js';
import { parseChoice, parseLimit } from '../lib/cli-options.js';
import { outputData, renderRecord, renderTable } from '../lib/output-formatter.js';
import type { CampaignStatus } from '../models/campaign.js';
import type { CampaignQuery } from '../services/email-marketing.js';

const CAMPAIGN_STATUSES: readonly (CampaignStatus | 'ALL')[] = [
  'ALL',
  'DRAFT',
  'RUNNING',
  'SENT',
  'SCHEDULED',
  'DELETED',
];

interface ListOptions {
  limit?: string;
  modifiedSince?: string;
  status?: string;
  next?: string;
}

export function campaignsCommand(): Command {
  const campaigns = new Command('campaigns').description('Email campaigns');

  campaigns
    .command('list')
    .description('List campaigns (one page)')
    .option('--limit <n>', 'Page size 1-500')
    .option('--modified-since <iso>', 'Only campaigns modified after this ISO-8601 time')
    .option('--status <status>', CAMPAIGN_STATUSES.join(' | '))
    .option('--next <cursor>', 'Cursor from a previous page')
    .action(async (options: ListOptions, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const query: CampaignQuery = options.next
          ? { next: options.next }
          : {
              limit: parseLimit(options.limit),
              modified_since: options.modifiedSince,
              status: parseChoice(options.status, CAMPAIGN_STATUSES, 'status'),
            };
        const page = await getApiClient().emailMarketing.getCampaigns(requireAccessToken(globals), query);

        outputData({ results: page.results, next: page.next ?? null }, globals.format, () => {
          console.log(
            renderTable(
              ['ID', 'Name', 'Status', 'Modified'],
              page.results.map((c) => [c.id, c.name, c.status, c.modified_date])
            )
          );
          if (page.next) {
            console.log(`Next page: --next ${page.next}`);
          }
        });
      });
    });

  campaigns
    .command('get')
    .description('Show one campaign')
    .argument('<id>', 'Campaign id')
    .action(async (id: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const campaign = await getApiClient().emailMarketing.getCampaign(requireAccessToken(globals), id);
        outputData(campaign, globals.format, () => console.log(renderRecord(campaign)));
      });
    });

  campaigns
    .command('preview')
    .description('Show the rendered preview of a campaign')
    .argument('<id>', 'Campaign id')
    .action(async (id: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const preview = await getApiClient().emailMarketing.getPreview(requireAccessToken(globals), id);
        outputData(preview, globals.format, () => {
          console.log(`Subject: ${preview.subject ?? ''}`);
          console.log(`From: ${preview.from_email ?? ''}`);
          console.log('');
          console.log(preview.preview_text_content ?? '');
        });
      });
    });

  campaigns
    .command('delete')
    .description('Delete a campaign')
    .argument('<id>', 'Campaign id')
    .action(async (id: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const deleted = await getApiClient().emailMarketing.deleteCampaign(requireAccessToken(globals), id);
        outputData({ id, deleted }, globals.format, () => {
          console.log(deleted ? `Campaign ${id} deleted` : `Campaign ${id} was not deleted`);
        });
        if (!deleted) {
          process.exitCode = 1;
        }
      });
    });

  return campaigns;
}
