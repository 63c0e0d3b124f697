/**
 * Settings Store - database, logging and filter configuration
 *
 * Loaded once from environment variables, then kept in memory.
 *   POKEDEX_DB_NAME            LokiJS database name
 *   POKEDEX_LOG_LEVEL          default level for every module
 *   POKEDEX_LOG_MODULES        JSON map of module -> level, e.g. {"FilterEngine":"debug"}
 *   POKEDEX_COUNT_DEBOUNCE_MS  debounce for live match counts
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Schema for app settings
export const appSettingsSchema = z.object({
  database: z.object({
    name: z.string().min(1).default('pokedex'),
  }).default({}),
  logging: z.object({
    defaultLevel: LogLevelSchema.default('info'),
    modules: z.record(z.string(), LogLevelSchema).default({}),
  }).default({}),
  filter: z.object({
    countDebounceMs: z.number().int().nonnegative().default(300),
  }).default({}),
});

export type AppSettings = z.infer<typeof appSettingsSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

const DEFAULT_SETTINGS: AppSettings = appSettingsSchema.parse({});

function parseModuleLevels(raw: string | undefined): Record<string, LogLevel> | undefined {
  if (!raw) return undefined;
  try {
    const parsed = z.record(z.string(), LogLevelSchema).safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    console.warn('[Settings] Ignoring POKEDEX_LOG_MODULES:', parsed.error.message);
  } catch (e) {
    console.warn('[Settings] POKEDEX_LOG_MODULES is not valid JSON:', e);
  }
  return undefined;
}

// Load settings from the environment
export const loadSettings = (env: NodeJS.ProcessEnv = process.env): AppSettings => {
  const debounce = env.POKEDEX_COUNT_DEBOUNCE_MS;
  const result = appSettingsSchema.safeParse({
    database: { name: env.POKEDEX_DB_NAME || undefined },
    logging: {
      defaultLevel: env.POKEDEX_LOG_LEVEL || undefined,
      modules: parseModuleLevels(env.POKEDEX_LOG_MODULES),
    },
    filter: {
      countDebounceMs: debounce ? Number(debounce) : undefined,
    },
  });

  if (result.success) {
    return result.data;
  }
  console.warn('[Settings] Invalid environment configuration, using defaults:', result.error.message);
  return DEFAULT_SETTINGS;
};

// In-memory cache
let cachedSettings: AppSettings = loadSettings();

// Listeners for reactivity
type SettingsListener = (settings: AppSettings) => void;
const listeners = new Set<SettingsListener>();

const notifyListeners = () => {
  listeners.forEach(listener => listener(cachedSettings));
};

// Helper functions for settings operations
export const settingsHelpers = {
  getSettings: (): AppSettings => {
    return cachedSettings;
  },

  subscribe: (listener: SettingsListener): (() => void) => {
    listeners.add(listener);
    return () => listeners.delete(listener);
  },

  setModuleLogLevel: (module: string, level: LogLevel) => {
    cachedSettings = {
      ...cachedSettings,
      logging: {
        ...cachedSettings.logging,
        modules: { ...cachedSettings.logging.modules, [module]: level },
      },
    };
    notifyListeners();
  },

  setDefaultLogLevel: (level: LogLevel) => {
    cachedSettings = {
      ...cachedSettings,
      logging: { defaultLevel: level, modules: {} },
    };
    notifyListeners();
  },

  setCountDebounceMs: (countDebounceMs: number) => {
    cachedSettings = {
      ...cachedSettings,
      filter: { ...cachedSettings.filter, countDebounceMs },
    };
    notifyListeners();
  },

  // Re-read the environment, dropping every runtime override
  reset: () => {
    cachedSettings = loadSettings();
    notifyListeners();
  },
};
