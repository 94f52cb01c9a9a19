import { createSettingsStore } from './settings-store';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface HostSettings {
  /** Directory scanned for plugins; null means the bundled plugins directory. */
  pluginsDir: string | null;
  logLevel: LogLevel;
  /** Log file path; null logs to stderr. */
  logFile: string | null;
}

export const DEFAULT_HOST_SETTINGS: HostSettings = {
  pluginsDir: null,
  logLevel: 'info',
  logFile: null,
};

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function migrateHostSettings(raw: Record<string, unknown>): HostSettings {
  return {
    pluginsDir: optionalString(raw.pluginsDir),
    logLevel: isLogLevel(raw.logLevel) ? raw.logLevel : DEFAULT_HOST_SETTINGS.logLevel,
    logFile: optionalString(raw.logFile),
  };
}

const store = createSettingsStore<HostSettings>('host-settings.json', DEFAULT_HOST_SETTINGS, migrateHostSettings);

export function getHostSettings(): HostSettings {
  return store.get();
}

export function saveHostSettings(settings: HostSettings): void {
  store.save(settings);
}
