import { z } from 'zod';

/** Config file schema version */
export const CONFIG_FILE_VERSION = 1;

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error']);

/**
 * Merged engine configuration schema.
 */
export const EngineConfigSchema = z.object({
  storage: z.object({
    /** Directory holding one JSON document per profile */
    basePath: z.string().min(1),
    /** Keep the previous document as a backup on overwrite */
    createBackup: z.boolean(),
  }),
  filter: z.object({
    /** Relevance added per matched preferred topic */
    boostUnit: z.number().positive().finite(),
    /** word-boundary (default) or plain substring matching */
    matchMode: z.enum(['word-boundary', 'substring']),
  }),
  taxonomy: z.object({
    /** Catalog file; null uses the bundled one */
    path: z.string().min(1).nullable(),
  }),
  logging: z.object({
    level: logLevelSchema,
    pretty: z.boolean(),
    /** Directory for log files; null logs to the console only */
    logDir: z.string().min(1).nullable(),
  }),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Config file schema (data/config/engine.json).
 * All fields are optional - defaults are used for missing values.
 */
export const EngineConfigFileSchema = z.object({
  version: z.number().int().positive().optional(),
  storage: EngineConfigSchema.shape.storage.partial().optional(),
  filter: EngineConfigSchema.shape.filter.partial().optional(),
  taxonomy: EngineConfigSchema.shape.taxonomy.partial().optional(),
  logging: EngineConfigSchema.shape.logging.partial().optional(),
});

export type EngineConfigFile = z.infer<typeof EngineConfigFileSchema>;

/**
 * Default configuration.
 */
export const DEFAULT_CONFIG: EngineConfig = {
  storage: {
    basePath: 'data/state',
    createBackup: true,
  },
  filter: {
    boostUnit: 1,
    matchMode: 'word-boundary',
  },
  taxonomy: {
    path: null,
  },
  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    logDir: null,
  },
};
