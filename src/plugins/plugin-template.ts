/**
 * Plugin template. Copy this file to a new name in the plugins directory
 * and edit only the body of `yourFunction`.
 *
 * The host calls `register(window)` once at startup. Keep long-running work
 * out of callbacks: they run on the UI thread.
 */
import { hostApi, type HostAPI, type PluginWindow } from './plugin-api';

export const PLUGIN_NAME = 'My Plugin';
export const PLUGIN_DESCRIPTION = 'Describe what your plugin does here.';
export const PLUGIN_VERSION = '0.1';

export function yourFunction(host: HostAPI): void {
  // ---- START: developer edits go here ----
  host.showMessage(`${PLUGIN_NAME} v${PLUGIN_VERSION} executed.`, PLUGIN_NAME);
  // ----  END: developer edits go here  ----
}

export function register(window: PluginWindow): void {
  const host = hostApi(window);
  host.addAction(PLUGIN_NAME, () => yourFunction(host), PLUGIN_DESCRIPTION);
}
