import type { LayerMetadata, LayerView, RasterData } from './layer-types';

// ── Actions ─────────────────────────────────────────────────────────────
export type ActionCallback = () => void;

export interface PluginAction {
  readonly id: number;
  readonly text: string;
  readonly callback: ActionCallback;
  readonly tooltip: string;
  readonly menuTitle: string;
  /** Id of the plugin whose registration created the adding façade, if any. */
  readonly source: string | null;
}

export const DEFAULT_MENU_TITLE = 'Plugins';
export const DEFAULT_MESSAGE_TITLE = 'HYPRIL';

// ── UI bridge (implemented by the host application) ─────────────────────
export interface UIBridge {
  showMessage(text: string, title: string): void;
  addMenuAction(menuTitle: string, text: string, callback: ActionCallback, tooltip: string): void;
  requestRefresh(): void;
}

// ── Host API ────────────────────────────────────────────────────────────
export interface HostAPI {
  /** Current layers in insertion order, as copies. */
  listLayers(): LayerView[];
  /** Exact, case-sensitive lookup. */
  findLayerByName(name: string): LayerView | undefined;
  addLayer(data: RasterData, name?: string, bandNames?: string[], metadata?: LayerMetadata): void;
  addAction(text: string, callback: ActionCallback, tooltip?: string, menuTitle?: string): void;
  showMessage(text: string, title?: string): void;
  /** Asks the UI to re-read layers and menus. Never called implicitly. */
  refreshUi(): void;
}

/** The handle every plugin's `register` receives. */
export interface PluginWindow {
  readonly title: string;
  /** Returns a fresh Host API bound to this window. */
  hostApi(): HostAPI;
}

// ── Plugin modules ──────────────────────────────────────────────────────
export interface PluginModule {
  register(window: PluginWindow): void | Promise<void>;
  PLUGIN_NAME?: string;
  PLUGIN_DESCRIPTION?: string;
  PLUGIN_VERSION?: string;
}

export interface PluginInfo {
  name?: string;
  description?: string;
  version?: string;
}

// ── Load diagnostics ────────────────────────────────────────────────────
export type PluginStatus =
  | 'loaded'
  | 'failed-to-import'
  | 'missing-entrypoint'
  | 'failed-to-register';

export interface PluginErrorDetail {
  name: string;
  message: string;
  stack?: string;
}

interface PluginRecordBase {
  /** File name without its extension. */
  id: string;
  fileName: string;
  modulePath: string;
}

export interface LoadedPluginRecord extends PluginRecordBase {
  status: 'loaded';
  info: PluginInfo;
}

export interface FailedPluginRecord extends PluginRecordBase {
  status: Exclude<PluginStatus, 'loaded'>;
  error: PluginErrorDetail;
}

export type PluginRecord = LoadedPluginRecord | FailedPluginRecord;
