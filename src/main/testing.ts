import type { RasterData } from '../shared/layer-types';
import { createLayerStore, type LayerStore } from './services/layer-store';
import { createActionRegistry, type ActionRegistry } from './services/action-registry';
import { HeadlessUIBridge } from './services/headless-ui-bridge';
import { HostWindow } from './services/plugin-window';

export interface TestHost {
  layers: LayerStore;
  actions: ActionRegistry;
  ui: HeadlessUIBridge;
  window: HostWindow;
}

export function createTestHost(title?: string): TestHost {
  const layers = createLayerStore();
  const actions = createActionRegistry();
  const ui = new HeadlessUIBridge(layers, actions);
  const window = new HostWindow({ layers, actions, ui }, title);
  return { layers, actions, ui, window };
}

/** Float32 raster whose values count up from `start`. */
export function createRaster(bands: number, height: number, width: number, start = 0): RasterData {
  const values = new Float32Array(bands * height * width);
  for (let i = 0; i < values.length; i++) {
    values[i] = start + i;
  }
  return { shape: [bands, height, width], values };
}
