import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { loadConfig, DEFAULT_DATA_PATH } from '../src/config.js';
import { createTempDir } from './helpers.js';

let dir: string;
let cleanup: () => Promise<void>;

beforeEach(async () => {
  ({ dir, cleanup } = await createTempDir());
});

afterEach(async () => {
  await cleanup();
});

async function writeConfig(contents: unknown): Promise<string> {
  const configPath = path.join(dir, 'config.json');
  await fs.writeFile(configPath, typeof contents === 'string' ? contents : JSON.stringify(contents), 'utf-8');
  return configPath;
}

describe('loadConfig', () => {
  it('should fall back to defaults when there is no config file', async () => {
    const config = await loadConfig({ PHONEBOOK_CONFIG: path.join(dir, 'missing.json') });

    expect(config).toEqual({ dataPath: DEFAULT_DATA_PATH, git: false, defaultCountry: 'US' });
  });

  it('should read settings from the config file', async () => {
    const configPath = await writeConfig({ dataPath: '/srv/phonebook.json', git: true, defaultCountry: 'GB' });
    const config = await loadConfig({ PHONEBOOK_CONFIG: configPath });

    expect(config).toEqual({ dataPath: '/srv/phonebook.json', git: true, defaultCountry: 'GB' });
  });

  it('should let environment variables override the file', async () => {
    const configPath = await writeConfig({ dataPath: '/srv/phonebook.json', git: true });
    const config = await loadConfig({
      PHONEBOOK_CONFIG: configPath,
      PHONEBOOK_DATA: '/tmp/entries.json',
      PHONEBOOK_GIT: '0',
    });

    expect(config.dataPath).toBe('/tmp/entries.json');
    expect(config.git).toBe(false);
  });

  it('should enable git from the environment', async () => {
    const config = await loadConfig({ PHONEBOOK_CONFIG: path.join(dir, 'missing.json'), PHONEBOOK_GIT: 'true' });
    expect(config.git).toBe(true);
  });

  it('should reject an unsupported country', async () => {
    const configPath = await writeConfig({ defaultCountry: 'XX' });
    await expect(loadConfig({ PHONEBOOK_CONFIG: configPath })).rejects.toThrow(
      `invalid config ${configPath}: defaultCountry: unsupported country code`,
    );
  });

  it('should reject a config file that is not JSON', async () => {
    const configPath = await writeConfig('git = true');
    await expect(loadConfig({ PHONEBOOK_CONFIG: configPath })).rejects.toThrow(/^invalid JSON in config/);
  });
});
