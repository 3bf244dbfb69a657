import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigLoader, CONFIG_FILE_NAME, loadConfig } from '../../../src/config/config-loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/config-schema.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'preference-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const writeConfig = (content: unknown): Promise<void> =>
    writeFile(join(dir, CONFIG_FILE_NAME), JSON.stringify(content), 'utf-8');

  it('uses defaults when there is no config file', async () => {
    const loader = new ConfigLoader(dir, {});

    const config = await loader.load();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(loader.getLoadedConfigFile()).toBeNull();
  });

  it('merges file values over defaults', async () => {
    await writeConfig({
      version: 1,
      storage: { basePath: '/srv/prefs' },
      filter: { boostUnit: 2.5, matchMode: 'substring' },
      logging: { level: 'debug', logDir: '/var/log/prefs' },
    });

    const config = await loadConfig(dir, {});

    expect(config.storage).toEqual({ basePath: '/srv/prefs', createBackup: true });
    expect(config.filter).toEqual({ boostUnit: 2.5, matchMode: 'substring' });
    expect(config.taxonomy.path).toBeNull();
    expect(config.logging.level).toBe('debug');
    expect(config.logging.logDir).toBe('/var/log/prefs');
  });

  it('lets environment variables win over the file', async () => {
    await writeConfig({ storage: { basePath: '/srv/prefs' }, filter: { boostUnit: 2 } });

    const config = await loadConfig(dir, {
      PREFERENCE_DATA_PATH: '/tmp/override',
      PREFERENCE_BOOST_UNIT: '3',
      PREFERENCE_MATCH_MODE: 'substring',
      PREFERENCE_TAXONOMY_PATH: '/etc/taxonomy.json',
      LOG_LEVEL: 'warn',
    });

    expect(config.storage.basePath).toBe('/tmp/override');
    expect(config.filter).toEqual({ boostUnit: 3, matchMode: 'substring' });
    expect(config.taxonomy.path).toBe('/etc/taxonomy.json');
    expect(config.logging.level).toBe('warn');
  });

  it('ignores an unknown LOG_LEVEL', async () => {
    const config = await loadConfig(dir, { LOG_LEVEL: 'verbose' });

    expect(config.logging.level).toBe('info');
  });

  it('rejects a non-positive boost unit from the environment', async () => {
    await expect(loadConfig(dir, { PREFERENCE_BOOST_UNIT: '-1' })).rejects.toBeInstanceOf(
      ConfigError
    );
    await expect(loadConfig(dir, { PREFERENCE_BOOST_UNIT: 'lots' })).rejects.toBeInstanceOf(
      ConfigError
    );
  });

  it('rejects an unknown match mode', async () => {
    await expect(loadConfig(dir, { PREFERENCE_MATCH_MODE: 'fuzzy' })).rejects.toThrow(
      'PREFERENCE_MATCH_MODE must be word-boundary or substring, got fuzzy'
    );
  });

  it('rejects a file that is not JSON', async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), '{ storage: ', 'utf-8');

    await expect(loadConfig(dir, {})).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a file with invalid values', async () => {
    await writeConfig({ filter: { matchMode: 'regex' } });

    await expect(loadConfig(dir, {})).rejects.toThrow(/^Invalid config file: filter\.matchMode/);
  });

  it('rejects a file written by a newer version', async () => {
    await writeConfig({ version: 2 });

    await expect(loadConfig(dir, {})).rejects.toThrow(
      'Config file version (2) is newer than supported (1)'
    );
  });
});
