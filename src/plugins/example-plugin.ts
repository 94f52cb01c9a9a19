import { hostApi, type PluginWindow } from './plugin-api';

export const PLUGIN_NAME = 'Example Plugin';
export const PLUGIN_DESCRIPTION = 'Demo plugin that adds a simple action to the UI.';

export function register(window: PluginWindow): void {
  const host = hostApi(window);
  host.addAction(`${PLUGIN_NAME} Action`, () => {
    host.showMessage('Example plugin executed successfully.', PLUGIN_NAME);
  }, PLUGIN_DESCRIPTION);
}
