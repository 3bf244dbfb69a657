/**
 * Engine wiring - builds the taxonomy, store, registry and feed personalizer
 * from a merged configuration.
 */

import type { Logger } from './types/logger.js';
import type { EngineConfig } from './config/config-schema.js';
import { loadConfig } from './config/config-loader.js';
import { createLogger } from './core/logger.js';
import type { Storage } from './storage/storage.js';
import { createJSONStorage } from './storage/json-storage.js';
import { PreferenceStore } from './storage/preference-store.js';
import { PreferenceRegistry } from './registry/preference-registry.js';
import { FeedPersonalizer } from './feed/feed-pipeline.js';
import { loadTaxonomy, type TopicTaxonomy } from './taxonomy/topic-taxonomy.js';
import type { ContentFilterOptions } from './filter/content-filter.js';
import type { PersistenceStatus } from './types/preferences.js';

/**
 * Everything a UI needs to manage and apply topic preferences.
 */
export interface PreferenceEngine {
  config: EngineConfig;
  logger: Logger;
  taxonomy: TopicTaxonomy;
  store: PreferenceStore;
  registry: PreferenceRegistry;
  feed: FeedPersonalizer;
  /** Options matching the configured filter, for direct applyPreferences() calls */
  filterOptions: ContentFilterOptions;
  /** Flush pending saves */
  shutdown(): Promise<PersistenceStatus[]>;
}

/**
 * Collaborators that can be swapped out (tests, embedding apps).
 */
export interface PreferenceEngineOverrides {
  logger?: Logger;
  storage?: Storage;
  taxonomy?: TopicTaxonomy;
}

/**
 * Build an engine from an already merged configuration.
 */
export function createPreferenceEngine(
  config: EngineConfig,
  overrides: PreferenceEngineOverrides = {}
): PreferenceEngine {
  const logger: Logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      pretty: config.logging.pretty,
      logDir: config.logging.logDir,
    });

  const taxonomy =
    overrides.taxonomy ??
    (config.taxonomy.path !== null ? loadTaxonomy(config.taxonomy.path) : loadTaxonomy());

  const storage =
    overrides.storage ??
    createJSONStorage(config.storage.basePath, {
      createBackup: config.storage.createBackup,
      logger,
    });

  const filterOptions: ContentFilterOptions = {
    boostUnit: config.filter.boostUnit,
    matchMode: config.filter.matchMode,
  };

  const store = new PreferenceStore(storage, logger);
  const registry = new PreferenceRegistry(store, logger);
  const feed = new FeedPersonalizer(registry, logger, filterOptions);

  logger.info(
    {
      storage: overrides.storage ? 'custom' : config.storage.basePath,
      categories: taxonomy.categories().length,
      matchMode: config.filter.matchMode,
      boostUnit: config.filter.boostUnit,
    },
    'Preference engine ready'
  );

  return {
    config,
    logger,
    taxonomy,
    store,
    registry,
    feed,
    filterOptions,
    shutdown: () => registry.close(),
  };
}

/**
 * Load configuration from disk and environment, then build the engine.
 */
export async function createPreferenceEngineAsync(
  configPath?: string,
  overrides: PreferenceEngineOverrides = {}
): Promise<PreferenceEngine> {
  const config = await loadConfig(configPath);
  return createPreferenceEngine(config, overrides);
}
