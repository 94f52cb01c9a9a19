/**
 * Exercises the Host API from two menu actions:
 * - "Test: Add Sample Layer" inserts a small random three-band layer
 * - "Test: Print Layer Names" reports the current layer names
 */
import { hostApi, uniqueLayerName, type HostAPI, type PluginWindow } from './plugin-api';

export const PLUGIN_NAME = 'Test Harness Plugin';
export const PLUGIN_DESCRIPTION = 'Adds sample layers and lists layer names.';

const SAMPLE_HEIGHT = 64;
const SAMPLE_WIDTH = 64;
const SAMPLE_BANDS = ['R', 'G', 'B'];

export function addSampleLayer(host: HostAPI): string {
  const values = new Float32Array(SAMPLE_BANDS.length * SAMPLE_HEIGHT * SAMPLE_WIDTH);
  for (let i = 0; i < values.length; i++) {
    values[i] = Math.random();
  }
  const name = uniqueLayerName(host, 'Plugin Sample Layer');
  host.addLayer(
    { shape: [SAMPLE_BANDS.length, SAMPLE_HEIGHT, SAMPLE_WIDTH], values },
    name,
    SAMPLE_BANDS,
    { source: PLUGIN_NAME },
  );
  host.refreshUi();
  host.showMessage('Sample layer added by plugin', 'Test Harness');
  return name;
}

export function printLayerNames(host: HostAPI): string[] {
  const names = host.listLayers().map((l) => l.name);
  host.showMessage(`Layers: ${names.join(', ')}`, 'Test Harness');
  return names;
}

export function register(window: PluginWindow): void {
  const host = hostApi(window);
  host.addAction('Test: Add Sample Layer', () => { addSampleLayer(host); }, 'Test: Add Sample Layer');
  host.addAction('Test: Print Layer Names', () => { printLayerNames(host); }, 'Test: Print Layer Names');
}
