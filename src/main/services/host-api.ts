import type { ActionCallback, HostAPI, UIBridge } from '../../shared/plugin-types';
import { DEFAULT_MENU_TITLE, DEFAULT_MESSAGE_TITLE } from '../../shared/plugin-types';
import type { LayerMetadata, RasterData } from '../../shared/layer-types';
import { DEFAULT_LAYER_NAME } from '../../shared/layer-types';
import type { LayerStore } from './layer-store';
import { toLayerView } from './layer-store';
import type { ActionRegistry } from './action-registry';
import { appLog } from './log-service';

export interface HostAPIDeps {
  layers: LayerStore;
  actions: ActionRegistry;
  ui: UIBridge;
  /** Plugin credited with actions added through this façade. */
  source?: string | null;
}

function logBridgeFailure(operation: string, err: unknown, source: string | null): void {
  appLog('core:host-api', 'error', `UI bridge failed during ${operation}`, {
    meta: {
      source,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    },
  });
}

/**
 * Builds the capability object plugins use to reach application state.
 * It holds references only; every read returns copies.
 */
export function createHostAPI(deps: HostAPIDeps): HostAPI {
  const { layers, actions, ui } = deps;
  const source = deps.source ?? null;

  return {
    listLayers() {
      return layers.getState().listLayers().map(toLayerView);
    },

    findLayerByName(name: string) {
      const layer = layers.getState().getLayer(name);
      return layer ? toLayerView(layer) : undefined;
    },

    addLayer(data: RasterData, name: string = DEFAULT_LAYER_NAME, bandNames?: string[], metadata?: LayerMetadata) {
      const layer = layers.getState().addLayer({ data, name, bandNames, metadata });
      appLog('core:host-api', 'debug', `Layer "${layer.name}" added`, {
        meta: { source, shape: layer.data.shape },
      });
    },

    addAction(text: string, callback: ActionCallback, tooltip = '', menuTitle: string = DEFAULT_MENU_TITLE) {
      const action = actions.getState().appendAction({ text, callback, tooltip, menuTitle, source });
      try {
        ui.addMenuAction(action.menuTitle, action.text, action.callback, action.tooltip);
      } catch (err) {
        logBridgeFailure('addMenuAction', err, source);
      }
    },

    showMessage(text: string, title: string = DEFAULT_MESSAGE_TITLE) {
      try {
        ui.showMessage(text, title);
      } catch (err) {
        logBridgeFailure('showMessage', err, source);
      }
    },

    refreshUi() {
      try {
        ui.requestRefresh();
      } catch (err) {
        logBridgeFailure('requestRefresh', err, source);
      }
    },
  };
}
