/**
 * Auth Command
 * OAuth2 authorization URL, code exchange and token info
 */

import { Command } from 'commander';
import { getOAuth2Flow, requireAccessToken, runAction } from '../lib/api-client.js';
import { outputData, renderRecord } from '../lib/output-formatter.js';

export function authCommand(): Command {
  const auth = new Command('auth').description('OAuth2 authorization');

  auth
    .command('url')
    .description('Print the URL where a user grants access')
    .option('--client-flow', 'Use the implicit (token) flow instead of the server (code) flow')
    .option('--state <state>', 'Opaque value echoed back on the redirect')
    .action(async (options: { clientFlow?: boolean; state?: string }, cmd: Command) => {
      await runAction(cmd, ({ format }) => {
        const url = getOAuth2Flow().buildAuthorizationUrl(!options.clientFlow, options.state);
        if (format === 'json') {
          outputData({ url });
        } else {
          console.log(url);
        }
      });
    });

  auth
    .command('token')
    .description('Exchange an authorization code for an access token')
    .argument('<code>', 'Code from the redirect')
    .action(async (code: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, async ({ format }) => {
        const token = await getOAuth2Flow().exchangeCodeForToken(code);
        outputData(token, format, () => console.log(renderRecord(token)));
      });
    });

  auth
    .command('info')
    .description('Show metadata for an access token')
    .argument('[accessToken]', 'Token to inspect (default: --token or MKT_ACCESS_TOKEN)')
    .action(async (accessToken: string | undefined, _options: unknown, cmd: Command) => {
      await runAction(cmd, async (globals) => {
        const token = accessToken ?? requireAccessToken(globals);
        const info = await getOAuth2Flow().fetchTokenInfo(token);
        outputData(info, globals.format, () => console.log(renderRecord(info)));
      });
    });

  return auth;
}
