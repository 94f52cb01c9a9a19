/**
 * Stacks layers that share the first layer's height and width into a
 * single multi-band layer.
 */
import {
  hostApi,
  uniqueLayerName,
  type HostAPI,
  type LayerMetadata,
  type LayerView,
  type NumericArray,
  type PluginWindow,
} from './plugin-api';

export const PLUGIN_NAME = 'Layer Stacker';
export const PLUGIN_DESCRIPTION = 'Stack selected layers into a single multi-band layer.';

export interface StackedLayer {
  shape: [bands: number, height: number, width: number];
  values: NumericArray;
  bandNames: string[];
  metadata: LayerMetadata;
}

/** Float32 inputs stay Float32; any other mix is promoted to Float64. */
export function concatBands(parts: NumericArray[]): NumericArray {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = parts.every((p) => p instanceof Float32Array)
    ? new Float32Array(total)
    : new Float64Array(total);
  let offset = 0;
  for (const part of parts) {
    for (let i = 0; i < part.length; i++) {
      out[offset + i] = part[i];
    }
    offset += part.length;
  }
  return out;
}

/**
 * Concatenates `layers` along the band axis, top to bottom. Band names are
 * prefixed with their layer's name; metadata comes from the first layer.
 */
export function stackLayers(layers: LayerView[]): StackedLayer {
  if (layers.length === 0) {
    throw new Error('Select at least one layer to stack');
  }
  const [, height, width] = layers[0].shape;
  const bandNames: string[] = [];
  for (const layer of layers) {
    const [bands, h, w] = layer.shape;
    if (h !== height || w !== width) {
      throw new Error(`Layer '${layer.name}' has incompatible size ${h}x${w}, expected ${height}x${width}`);
    }
    const names = layer.bandNames.length === bands
      ? layer.bandNames
      : Array.from({ length: bands }, (_, i) => `Band ${i + 1}`);
    bandNames.push(...names.map((b) => `${layer.name}:${b}`));
  }

  const values = concatBands(layers.map((l) => l.data.values));
  return {
    shape: [bandNames.length, height, width],
    values,
    bandNames,
    metadata: { ...layers[0].metadata, band_count: bandNames.length },
  };
}

export function stackCompatibleLayers(host: HostAPI): string | null {
  const all = host.listLayers();
  if (all.length === 0) {
    host.showMessage('Please add at least one layer to stack.', 'No layers selected');
    return null;
  }
  const [, height, width] = all[0].shape;
  const selected = all.filter((l) => l.shape[1] === height && l.shape[2] === width);

  try {
    const stacked = stackLayers(selected);
    const name = uniqueLayerName(host, 'Stacked Layer');
    host.addLayer({ shape: stacked.shape, values: stacked.values }, name, stacked.bandNames, stacked.metadata);
    host.refreshUi();
    host.showMessage(`Created stacked layer '${name}' with ${stacked.shape[0]} bands.`, 'Stack Complete');
    return name;
  } catch (err) {
    host.showMessage(`Could not stack layers: ${err instanceof Error ? err.message : String(err)}`, 'Stack Failed');
    return null;
  }
}

export function register(window: PluginWindow): void {
  const host = hostApi(window);
  host.addAction(PLUGIN_NAME, () => { stackCompatibleLayers(host); }, PLUGIN_DESCRIPTION);
}
