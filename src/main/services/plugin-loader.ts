import type {
  PluginInfo,
  PluginModule,
  PluginRecord,
  PluginStatus,
  PluginWindow,
} from '../../shared/plugin-types';
import { toErrorDetail } from '../../shared/errors';
import type { HostWindow } from './plugin-window';
import { listPluginCandidates, type DiscoveredPlugin } from './plugin-discovery';
import { dynamicImportModule } from './dynamic-import';
import { appLog } from './log-service';

type RegisterFn = PluginModule['register'];

function getRegisterExport(mod: unknown): RegisterFn | undefined {
  if (!mod || (typeof mod !== 'object' && typeof mod !== 'function')) return undefined;
  if (!('register' in mod)) return undefined;
  const register: unknown = mod.register;
  if (typeof register !== 'function') return undefined;
  return (window: PluginWindow) => register(window);
}

/** Accessors on a plugin module may throw; a failing read counts as absent. */
function readStringExport(mod: unknown, key: string): string | undefined {
  if (!mod || typeof mod !== 'object') return undefined;
  let value: unknown;
  try {
    value = Reflect.get(mod, key);
  } catch {
    return undefined;
  }
  return typeof value === 'string' ? value : undefined;
}

function readPluginInfo(mod: unknown): PluginInfo {
  const info: PluginInfo = {};
  const name = readStringExport(mod, 'PLUGIN_NAME');
  const description = readStringExport(mod, 'PLUGIN_DESCRIPTION');
  const version = readStringExport(mod, 'PLUGIN_VERSION');
  if (name !== undefined) info.name = name;
  if (description !== undefined) info.description = description;
  if (version !== undefined) info.version = version;
  return info;
}

/** Imports, looks up `register` and registers a single plugin. Never throws. */
export async function loadPlugin(candidate: DiscoveredPlugin, window: HostWindow): Promise<PluginRecord> {
  const { id, fileName, modulePath } = candidate;

  let mod: unknown;
  try {
    mod = await dynamicImportModule(modulePath);
  } catch (err) {
    const error = toErrorDetail(err);
    appLog('core:plugins', 'error', `Failed to import plugin "${id}"`, {
      meta: { pluginId: id, modulePath, error: error.message, stack: error.stack },
    });
    return { id, fileName, modulePath, status: 'failed-to-import', error };
  }

  let lookup: RegisterFn | undefined;
  try {
    lookup = getRegisterExport(mod);
  } catch (err) {
    const error = toErrorDetail(err);
    appLog('core:plugins', 'error', `Cannot read register export of plugin "${id}"`, {
      meta: { pluginId: id, modulePath, error: error.message, stack: error.stack },
    });
    return { id, fileName, modulePath, status: 'missing-entrypoint', error };
  }
  if (!lookup) {
    const message = `Plugin module at "${modulePath}" does not export a register(window) function`;
    appLog('core:plugins', 'warn', message, { meta: { pluginId: id, modulePath } });
    return {
      id, fileName, modulePath,
      status: 'missing-entrypoint',
      error: { name: 'MissingEntrypoint', message },
    };
  }
  const register = lookup;

  try {
    await window.withRegisteringPlugin(id, () => register(window));
  } catch (err) {
    const error = toErrorDetail(err);
    appLog('core:plugins', 'error', `Error registering plugin "${id}"`, {
      meta: { pluginId: id, modulePath, error: error.message, errorName: error.name, stack: error.stack },
    });
    return { id, fileName, modulePath, status: 'failed-to-register', error };
  }

  const info = readPluginInfo(mod);
  appLog('core:plugins', 'info', `Plugin "${id}" loaded`, { meta: { pluginId: id, ...info } });
  return { id, fileName, modulePath, status: 'loaded', info };
}

/**
 * Loads every plugin under `pluginsDir`, one at a time, in file-name order.
 * Each candidate yields exactly one record; no failure escapes.
 */
export async function discoverAndLoad(pluginsDir: string, window: HostWindow): Promise<PluginRecord[]> {
  const candidates = listPluginCandidates(pluginsDir);
  appLog('core:plugins', 'info', 'Loading plugins', {
    meta: { pluginsDir, candidates: candidates.map((c) => c.fileName) },
  });

  const records: PluginRecord[] = [];
  for (const candidate of candidates) {
    records.push(await loadPlugin(candidate, window));
  }

  appLog('core:plugins', 'info', 'Plugin loading complete', {
    meta: { pluginsDir, ...summarizePluginRecords(records) },
  });
  return records;
}

// ── Diagnostics ────────────────────────────────────────────────────────

export function summarizePluginRecords(records: PluginRecord[]): Record<PluginStatus, number> {
  const counts: Record<PluginStatus, number> = {
    'loaded': 0,
    'failed-to-import': 0,
    'missing-entrypoint': 0,
    'failed-to-register': 0,
  };
  for (const record of records) {
    counts[record.status] += 1;
  }
  return counts;
}

export function formatPluginRecord(record: PluginRecord): string {
  if (record.status === 'loaded') {
    const label = record.info.name ? ` (${record.info.name}${record.info.version ? ` v${record.info.version}` : ''})` : '';
    return `[loaded] ${record.fileName}${label}`;
  }
  return `[${record.status}] ${record.fileName}: ${record.error.name}: ${record.error.message}`;
}
