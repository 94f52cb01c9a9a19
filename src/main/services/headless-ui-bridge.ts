import type { ActionCallback, UIBridge } from '../../shared/plugin-types';
import type { LayerStore } from './layer-store';
import type { ActionRegistry } from './action-registry';
import { appLog } from './log-service';

export interface MenuEntry {
  menuTitle: string;
  text: string;
  tooltip: string;
  callback: ActionCallback;
}

export interface ShownMessage {
  title: string;
  text: string;
}

export type TriggerResult = 'ok' | 'not-found' | 'failed';

/**
 * UI bridge for running the host without a window: menus are kept in
 * memory, messages and refreshes go to the log.
 */
export class HeadlessUIBridge implements UIBridge {
  private readonly menus: MenuEntry[] = [];
  private readonly messages: ShownMessage[] = [];
  private refreshCount = 0;

  constructor(
    private readonly layers: LayerStore,
    private readonly actions: ActionRegistry,
  ) {}

  showMessage(text: string, title: string): void {
    this.messages.push({ title, text });
    appLog('ui:bridge', 'info', `${title}: ${text}`);
  }

  addMenuAction(menuTitle: string, text: string, callback: ActionCallback, tooltip: string): void {
    this.menus.push({ menuTitle, text, tooltip, callback });
  }

  requestRefresh(): void {
    this.refreshCount += 1;
    appLog('ui:bridge', 'debug', 'Refresh requested', {
      meta: {
        layers: this.layers.getState().layers.length,
        actions: this.actions.getState().getAllActions().length,
      },
    });
  }

  getMenuEntries(menuTitle?: string): MenuEntry[] {
    return menuTitle === undefined
      ? [...this.menus]
      : this.menus.filter((m) => m.menuTitle === menuTitle);
  }

  getMessages(): ShownMessage[] {
    return [...this.messages];
  }

  getRefreshCount(): number {
    return this.refreshCount;
  }

  /**
   * Fires the first menu entry with the given label. Errors raised by the
   * callback stop here: they are logged and reported as 'failed'.
   */
  trigger(text: string, menuTitle?: string): TriggerResult {
    const entry = this.menus.find((m) => m.text === text && (menuTitle === undefined || m.menuTitle === menuTitle));
    if (!entry) return 'not-found';
    try {
      entry.callback();
      return 'ok';
    } catch (err) {
      appLog('ui:bridge', 'error', `Action "${text}" failed`, {
        meta: {
          menuTitle: entry.menuTitle,
          errorName: err instanceof Error ? err.name : 'Error',
          error: err instanceof Error ? err.message : String(err),
        },
      });
      return 'failed';
    }
  }

  /** Text rendering of menus (from the Action Registry) and layers. */
  renderSnapshot(): string {
    const lines: string[] = [];
    const registry = this.actions.getState();
    for (const title of registry.getMenuTitles()) {
      lines.push(`${title}:`);
      for (const action of registry.listActions(title)) {
        lines.push(`  - ${action.text}${action.tooltip ? ` (${action.tooltip})` : ''}`);
      }
    }
    const layers = this.layers.getState().listLayers();
    lines.push(`Layers (${layers.length}):`);
    for (const layer of layers) {
      const [bands, height, width] = layer.data.shape;
      lines.push(`  - ${layer.name} [${bands}x${height}x${width}] ${layer.bandNames.join(', ')}`);
    }
    return lines.join('\n');
  }
}
