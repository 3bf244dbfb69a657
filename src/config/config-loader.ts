import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ZodError } from 'zod';
import {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  EngineConfigFileSchema,
  EngineConfigSchema,
  type EngineConfig,
  type EngineConfigFile,
} from './config-schema.js';
import { ConfigError, describeError } from '../core/errors.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

/** Config file name inside the config directory */
export const CONFIG_FILE_NAME = 'engine.json';

function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/engine.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: EngineConfigFile | null = null;

  constructor(configPath = 'data/config', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   * @throws ConfigError when the file or the merged result is invalid
   */
  async load(): Promise<EngineConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config = structuredClone(DEFAULT_CONFIG);

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    const result = EngineConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): EngineConfigFile | null {
    return this.loadedConfig;
  }

  private async loadConfigFile(): Promise<EngineConfigFile | null> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // File doesn't exist - that's OK, use defaults
        return null;
      }
      throw new ConfigError(`Failed to load config file: ${describeError(error)}`, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content) as unknown;
    } catch (error) {
      throw new ConfigError(`Config file is not valid JSON: ${describeError(error)}`, {
        cause: error,
      });
    }

    const parsed = EngineConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid config file: ${formatIssues(parsed.error)}`, {
        cause: parsed.error,
      });
    }

    if (parsed.data.version !== undefined && parsed.data.version > CONFIG_FILE_VERSION) {
      throw new ConfigError(
        `Config file version (${String(parsed.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return parsed.data;
  }

  /**
   * Merge config file values into the config object.
   */
  private mergeConfigFile(config: EngineConfig, file: EngineConfigFile): void {
    if (file.storage) {
      if (file.storage.basePath !== undefined) config.storage.basePath = file.storage.basePath;
      if (file.storage.createBackup !== undefined) {
        config.storage.createBackup = file.storage.createBackup;
      }
    }

    if (file.filter) {
      if (file.filter.boostUnit !== undefined) config.filter.boostUnit = file.filter.boostUnit;
      if (file.filter.matchMode !== undefined) config.filter.matchMode = file.filter.matchMode;
    }

    if (file.taxonomy?.path !== undefined) {
      config.taxonomy.path = file.taxonomy.path;
    }

    if (file.logging) {
      if (file.logging.level !== undefined) config.logging.level = file.logging.level;
      if (file.logging.pretty !== undefined) config.logging.pretty = file.logging.pretty;
      if (file.logging.logDir !== undefined) config.logging.logDir = file.logging.logDir;
    }
  }

  /**
   * Override config with environment variables.
   * Values are validated together with the rest of the merged config.
   */
  private mergeEnvironment(config: EngineConfig): void {
    const dataPath = this.env['PREFERENCE_DATA_PATH'];
    if (dataPath) {
      config.storage.basePath = dataPath;
    }

    const boostUnit = this.env['PREFERENCE_BOOST_UNIT'];
    if (boostUnit) {
      config.filter.boostUnit = Number(boostUnit);
    }

    const matchMode = this.env['PREFERENCE_MATCH_MODE'];
    if (matchMode === 'word-boundary' || matchMode === 'substring') {
      config.filter.matchMode = matchMode;
    } else if (matchMode) {
      throw new ConfigError(
        `PREFERENCE_MATCH_MODE must be word-boundary or substring, got ${matchMode}`
      );
    }

    const taxonomyPath = this.env['PREFERENCE_TAXONOMY_PATH'];
    if (taxonomyPath) {
      config.taxonomy.path = taxonomyPath;
    }

    const logLevel = LOG_LEVELS.find((level) => level === this.env['LOG_LEVEL']);
    if (logLevel) {
      config.logging.level = logLevel;
    }
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string, env?: NodeJS.ProcessEnv): Promise<EngineConfig> {
  return createConfigLoader(configPath, env).load();
}
