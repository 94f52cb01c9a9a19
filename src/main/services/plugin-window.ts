import type { HostAPI, PluginWindow, UIBridge } from '../../shared/plugin-types';
import { DEFAULT_MESSAGE_TITLE } from '../../shared/plugin-types';
import type { LayerStore } from './layer-store';
import type { ActionRegistry } from './action-registry';
import { createHostAPI } from './host-api';

export interface ViewerContext {
  layers: LayerStore;
  actions: ActionRegistry;
  ui: UIBridge;
}

/**
 * The single handle passed to every plugin's `register`. It exposes no
 * application state directly; plugins go through `hostApi()`.
 */
export class HostWindow implements PluginWindow {
  readonly title: string;
  private readonly context: ViewerContext;
  private registeringPlugin: string | null = null;

  constructor(context: ViewerContext, title: string = DEFAULT_MESSAGE_TITLE) {
    this.context = context;
    this.title = title;
  }

  hostApi(): HostAPI {
    return createHostAPI({ ...this.context, source: this.registeringPlugin });
  }

  /** Runs `fn` with façades created meanwhile credited to `pluginId`. */
  async withRegisteringPlugin<T>(pluginId: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.registeringPlugin;
    this.registeringPlugin = pluginId;
    try {
      return await fn();
    } finally {
      this.registeringPlugin = previous;
    }
  }
}
