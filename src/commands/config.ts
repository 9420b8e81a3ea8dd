/**
 * Config Command
 * Read and write the CLI config file. Access tokens are never stored.
 */

import { Command } from 'commander';
import { runAction } from '../lib/api-client.js';
import { ConfigError } from '../lib/errors.js';
import { isValidFormat, outputData, renderRecord } from '../lib/output-formatter.js';
import { CONFIG_KEYS, getConfigService, isConfigKey } from '../services/config.js';
import type { AppConfig, ConfigKey } from '../types/config.js';

const SECRET_KEYS: readonly ConfigKey[] = ['clientSecret'];

function parseKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown config key "${key}", expected one of ${CONFIG_KEYS.join(', ')}`);
  }
  return key;
}

/**
 * Copy with secrets masked for display
 */
export function maskSecrets(config: AppConfig): AppConfig {
  const masked: AppConfig = { ...config };
  for (const key of SECRET_KEYS) {
    if (key !== 'format' && masked[key]) {
      masked[key] = '********';
    }
  }
  return masked;
}

export function configCommand(): Command {
  const config = new Command('config').description('CLI configuration');

  config
    .command('set')
    .description('Store a setting')
    .argument('<key>', CONFIG_KEYS.join(' | '))
    .argument('<value>', 'Value')
    .action(async (key: string, value: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, ({ format }) => {
        const configKey = parseKey(key);
        const service = getConfigService();
        if (configKey === 'format') {
          if (!isValidFormat(value)) {
            throw new ConfigError(`Invalid format "${value}", expected json or table`);
          }
          service.set('format', value);
        } else {
          service.set(configKey, value);
        }
        outputData({ key: configKey, saved: true }, format, () => console.log(`Saved ${configKey}`));
      });
    });

  config
    .command('unset')
    .description('Remove a stored setting')
    .argument('<key>', CONFIG_KEYS.join(' | '))
    .action(async (key: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, ({ format }) => {
        const configKey = parseKey(key);
        getConfigService().delete(configKey);
        outputData({ key: configKey, removed: true }, format, () => console.log(`Removed ${configKey}`));
      });
    });

  config
    .command('get')
    .description('Show one stored setting')
    .argument('<key>', CONFIG_KEYS.join(' | '))
    .action(async (key: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, ({ format }) => {
        const configKey = parseKey(key);
        const value = maskSecrets(getConfigService().getAll())[configKey];
        outputData({ key: configKey, value: value ?? null }, format, () => console.log(value ?? ''));
      });
    });

  config
    .command('show')
    .description('Show all stored settings')
    .action(async (_options: unknown, cmd: Command) => {
      await runAction(cmd, ({ format }) => {
        const all = maskSecrets(getConfigService().getAll());
        outputData(all, format, () => console.log(renderRecord(all)));
      });
    });

  config
    .command('path')
    .description('Show the config file location')
    .action(async (_options: unknown, cmd: Command) => {
      await runAction(cmd, ({ format }) => {
        const configPath = getConfigService().getConfigPath();
        outputData({ path: configPath }, format, () => console.log(configPath));
      });
    });

  return config;
}
