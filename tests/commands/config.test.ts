import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runCLI } from '../helpers/cli-runner.js';
import { maskSecrets } from '../../src/commands/config.js';

describe('Config Command', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mkt-cli-'));
    configPath = path.join(tempDir, 'config.json');
    vi.stubEnv('MKT_CONFIG_PATH', configPath);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function readConfigFile(): unknown {
    return JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  }

  it('should store a setting', async () => {
    const result = await runCLI(['config', 'set', 'clientId', 'test-client']);

    expect(result.json).toEqual({ key: 'clientId', saved: true });
    expect(readConfigFile()).toEqual({ clientId: 'test-client' });
  });

  it('should remove a stored setting', async () => {
    fs.writeFileSync(configPath, JSON.stringify({ clientId: 'test-client', apiKey: 'test-key' }));

    const result = await runCLI(['config', 'unset', 'apiKey']);

    expect(result.exitCode).toBe(0);
    expect(result.json).toEqual({ key: 'apiKey', removed: true });
    expect(readConfigFile()).toEqual({ clientId: 'test-client' });
  });

  it('should reject unknown keys', async () => {
    const result = await runCLI(['config', 'set', 'accessToken', 'x']);

    expect(result.exitCode).toBe(1);
    expect(result.json).toEqual({
      success: false,
      error: {
        code: 'CONFIG_ERROR',
        message:
          'Unknown config key "accessToken", expected one of clientId, clientSecret, redirectUri, apiKey, apiBaseUrl, authBaseUrl, format',
      },
    });
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('should validate the format value', async () => {
    const result = await runCLI(['config', 'set', 'format', 'xml']);

    expect(result.exitCode).toBe(1);
    expect(result.json).toMatchObject({
      error: { code: 'CONFIG_ERROR', message: 'Invalid format "xml", expected json or table' },
    });
  });

  it('should use the stored format as the default', async () => {
    await runCLI(['config', 'set', 'format', 'table']);

    const result = await runCLI(['config', 'path']);

    expect(result.stdout).toBe(configPath);
  });

  it('should mask secrets when showing settings', async () => {
    fs.writeFileSync(configPath, JSON.stringify({ clientId: 'test-client', clientSecret: 'test-secret' }));

    const shown = await runCLI(['config', 'show']);
    const single = await runCLI(['config', 'get', 'clientSecret']);

    expect(shown.json).toEqual({ clientId: 'test-client', clientSecret: '********' });
    expect(single.json).toEqual({ key: 'clientSecret', value: '********' });
  });

  it('should print null for unset keys', async () => {
    const result = await runCLI(['config', 'get', 'apiKey']);

    expect(result.json).toEqual({ key: 'apiKey', value: null });
  });

  it('should print the config path', async () => {
    const result = await runCLI(['config', 'path']);

    expect(result.json).toEqual({ path: configPath });
  });

  describe('maskSecrets', () => {
    it('should leave a config without secrets unchanged', () => {
      expect(maskSecrets({ clientId: 'a', format: 'json' })).toEqual({ clientId: 'a', format: 'json' });
    });
  });
});
