/**
 * Stores
 *
 * Only the settings store lives here; catalogue data is in WatermelonDB.
 */

export {
  settingsHelpers,
  loadSettings,
  appSettingsSchema,
  type AppSettings,
  type LogLevel,
} from './settingsStore';
