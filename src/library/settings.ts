import { DEFAULT_LOG_DIR, DEFAULT_PRIMARY_KEY } from './constants.js';

export interface PricerSettings {
  /** Directory holding category-index.json, continuous-banding.json and rating.json. */
  configDir?: string;
  /** Field that identifies a quote record. */
  primaryKey?: string;
  /** Where batch reports are written when `storeLogs: true`. */
  logDir?: string;
}

/**
 * Defaults, overridable from the environment.
 */
export function defaultSettings(env: NodeJS.ProcessEnv = process.env): Required<PricerSettings> {
  return {
    configDir: env.PRICER_CONFIG_DIR || './config',
    primaryKey: env.PRICER_PRIMARY_KEY || DEFAULT_PRIMARY_KEY,
    logDir: env.PRICER_LOG_DIR || DEFAULT_LOG_DIR,
  };
}

/**
 * Merges provided settings with defaults
 */
export function getSettings(settings?: PricerSettings): Required<PricerSettings> {
  const defaults = defaultSettings();
  return {
    configDir: settings?.configDir || defaults.configDir,
    primaryKey: settings?.primaryKey || defaults.primaryKey,
    logDir: settings?.logDir || defaults.logDir,
  };
}
