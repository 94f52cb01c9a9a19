import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../main/services/log-service', () => ({
  appLog: vi.fn(),
}));

import { concatBands, register, stackCompatibleLayers, stackLayers } from '../layer-stack-plugin';
import { createTestHost, createRaster, type TestHost } from '../../main/testing';
import type { HostAPI, LayerView } from '../plugin-api';

function view(name: string, shape: [number, number, number], bandNames: string[], start = 0): LayerView {
  const { values } = createRaster(shape[0], shape[1], shape[2], start);
  return { name, shape, bandNames, metadata: {}, data: { shape, values } };
}

describe('layer-stack-plugin', () => {
  describe('concatBands', () => {
    it('keeps Float32 when every part is Float32', () => {
      const out = concatBands([new Float32Array([1, 2]), new Float32Array([3])]);
      expect(out).toBeInstanceOf(Float32Array);
      expect(Array.from(out)).toEqual([1, 2, 3]);
    });

    it('promotes mixed inputs to Float64', () => {
      const out = concatBands([new Float32Array([1]), [2, 3], new Uint8Array([4])]);
      expect(out).toBeInstanceOf(Float64Array);
      expect(Array.from(out)).toEqual([1, 2, 3, 4]);
    });
  });

  describe('stackLayers', () => {
    it('concatenates bands and prefixes band names with the layer name', () => {
      const stacked = stackLayers([view('A', [1, 1, 2], ['x']), view('B', [2, 1, 2], ['p', 'q'], 10)]);
      expect(stacked.shape).toEqual([3, 1, 2]);
      expect(stacked.bandNames).toEqual(['A:x', 'B:p', 'B:q']);
      expect(Array.from(stacked.values)).toEqual([0, 1, 10, 11, 12, 13]);
      expect(stacked.metadata).toEqual({ band_count: 3 });
    });

    it('rejects an empty selection', () => {
      expect(() => stackLayers([])).toThrow('Select at least one layer to stack');
    });

    it('rejects layers of a different size', () => {
      expect(() => stackLayers([view('A', [1, 2, 2], ['a']), view('B', [1, 3, 2], ['b'])]))
        .toThrow("Layer 'B' has incompatible size 3x2, expected 2x2");
    });
  });

  describe('stackCompatibleLayers', () => {
    let host: TestHost;

    beforeEach(() => {
      host = createTestHost();
    });

    it('asks for a layer when there are none', () => {
      expect(stackCompatibleLayers(host.window.hostApi())).toBeNull();
      expect(host.ui.getMessages()).toEqual([
        { title: 'No layers selected', text: 'Please add at least one layer to stack.' },
      ]);
      expect(host.layers.getState().layers).toEqual([]);
    });

    it('stacks the layers matching the first layer and skips the rest', () => {
      const api = host.window.hostApi();
      api.addLayer(createRaster(1, 2, 2), 'A', ['x'], { units: 'dn' });
      api.addLayer(createRaster(1, 3, 3), 'Odd');
      api.addLayer(createRaster(2, 2, 2, 10), 'B');

      expect(stackCompatibleLayers(api)).toBe('Stacked Layer');

      const stacked = api.findLayerByName('Stacked Layer');
      expect(stacked?.shape).toEqual([3, 2, 2]);
      expect(stacked?.bandNames).toEqual(['A:x', 'B:Band 1', 'B:Band 2']);
      expect(stacked?.metadata).toEqual({ units: 'dn', band_count: 3 });
      expect(Array.from(stacked?.data.values ?? [])).toEqual([0, 1, 2, 3, 10, 11, 12, 13, 14, 15, 16, 17]);
      expect(host.ui.getRefreshCount()).toBe(1);
      expect(host.ui.getMessages()).toEqual([
        { title: 'Stack Complete', text: "Created stacked layer 'Stacked Layer' with 3 bands." },
      ]);
    });

    it('picks a fresh name on a second run', () => {
      const api = host.window.hostApi();
      api.addLayer(createRaster(1, 1, 1), 'A');
      stackCompatibleLayers(api);
      expect(stackCompatibleLayers(api)).toBe('Stacked Layer 2');
      expect(api.findLayerByName('Stacked Layer 2')?.shape).toEqual([2, 1, 1]);
    });

    it('reports a failure instead of throwing', () => {
      const api = host.window.hostApi();
      api.addLayer(createRaster(1, 1, 1), 'A');
      const failing: HostAPI = {
        ...api,
        addLayer: () => { throw new Error('store is read-only'); },
      };

      expect(stackCompatibleLayers(failing)).toBeNull();
      expect(host.ui.getMessages()).toEqual([
        { title: 'Stack Failed', text: 'Could not stack layers: store is read-only' },
      ]);
    });
  });

  it('registers a single menu action', () => {
    const host = createTestHost();
    register(host.window);
    expect(host.actions.getState().listActions('Plugins').map((a) => [a.text, a.tooltip])).toEqual([
      ['Layer Stacker', 'Stack selected layers into a single multi-band layer.'],
    ]);
    host.window.hostApi().addLayer(createRaster(1, 1, 1), 'only');
    expect(host.ui.trigger('Layer Stacker')).toBe('ok');
    expect(host.layers.getState().getLayer('Stacked Layer')?.bandNames).toEqual(['only:Band 1']);
  });
});
