import * as path from 'path';
import type { PluginRecord, UIBridge } from '../shared/plugin-types';
import { createLayerStore, type LayerStore } from './services/layer-store';
import { createActionRegistry, type ActionRegistry } from './services/action-registry';
import { HostWindow } from './services/plugin-window';
import { HeadlessUIBridge } from './services/headless-ui-bridge';
import { discoverAndLoad, formatPluginRecord, summarizePluginRecords } from './services/plugin-loader';
import { getHostSettings } from './services/host-settings';
import { appLog } from './services/log-service';

export interface PluginHostOptions {
  /** Overrides the settings and the bundled plugins directory. */
  pluginsDir?: string;
  title?: string;
  /** Builds the UI bridge once the stores exist; defaults to a HeadlessUIBridge. */
  createUIBridge?: (layers: LayerStore, actions: ActionRegistry) => UIBridge;
}

export interface PluginHost {
  pluginsDir: string;
  layers: LayerStore;
  actions: ActionRegistry;
  ui: UIBridge;
  window: HostWindow;
  records: PluginRecord[];
}

/** The plugins directory shipped beside the compiled host. */
export function getBundledPluginsDir(): string {
  return path.resolve(__dirname, '..', 'plugins');
}

export function resolvePluginsDir(explicit?: string): string {
  if (explicit) return path.resolve(explicit);
  const configured = getHostSettings().pluginsDir;
  return configured ? path.resolve(configured) : getBundledPluginsDir();
}

/**
 * Creates the application's stores, UI bridge and plugin window once,
 * then loads every plugin against them.
 */
export async function startPluginHost(options: PluginHostOptions = {}): Promise<PluginHost> {
  const layers = createLayerStore();
  const actions = createActionRegistry();
  const ui = options.createUIBridge
    ? options.createUIBridge(layers, actions)
    : new HeadlessUIBridge(layers, actions);
  const window = new HostWindow({ layers, actions, ui }, options.title);
  const pluginsDir = resolvePluginsDir(options.pluginsDir);

  const records = await discoverAndLoad(pluginsDir, window);

  for (const record of records) {
    appLog('core:plugin-host', record.status === 'loaded' ? 'info' : 'warn', formatPluginRecord(record));
  }
  appLog('core:plugin-host', 'info', 'Plugin host started', {
    meta: { pluginsDir, ...summarizePluginRecords(records) },
  });

  return { pluginsDir, layers, actions, ui, window, records };
}
