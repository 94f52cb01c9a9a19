/**
 * Helper for plugin authors. Plugins receive a window handle in
 * `register(window)` and wrap it to reach the host:
 *
 *     import { hostApi } from './plugin-api';
 *
 *     export function register(window: PluginWindow): void {
 *       const host = hostApi(window);
 *       host.addAction('Do Something', () => host.showMessage('Hello'));
 *     }
 *
 * The Host API only narrows what plugins can reach. It is not a sandbox:
 * plugins run in-process and must be trusted.
 */
import type { HostAPI, PluginWindow } from '../shared/plugin-types';

export type { ActionCallback, HostAPI, PluginWindow } from '../shared/plugin-types';
export type { LayerMetadata, LayerView, NumericArray, RasterData } from '../shared/layer-types';

export function hostApi(window: PluginWindow): HostAPI {
  return window.hostApi();
}

/** `base`, or the first of `base 2`, `base 3`... that no layer uses yet. */
export function uniqueLayerName(host: HostAPI, base: string): string {
  const taken = new Set(host.listLayers().map((l) => l.name));
  if (!taken.has(base)) return base;
  let n = 2;
  while (taken.has(`${base} ${n}`)) n++;
  return `${base} ${n}`;
}
