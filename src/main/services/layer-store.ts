import { createStore, type StoreApi } from 'zustand/vanilla';
import type { Layer, LayerInput, LayerView } from '../../shared/layer-types';
import { ValidationError } from '../../shared/errors';
import { copyValues, validateLayerInput } from './layer-validation';

export interface LayerStoreState {
  /** Insertion-ordered; names are unique. */
  layers: Layer[];

  /** Validates and inserts a copy of the input. Throws ValidationError; never partially inserts. */
  addLayer: (input: LayerInput) => Layer;

  getLayer: (name: string) => Layer | undefined;

  listLayers: () => Layer[];

  clear: () => void;
}

export type LayerStore = StoreApi<LayerStoreState>;

export function createLayerStore(): LayerStore {
  return createStore<LayerStoreState>((set, get) => ({
    layers: [],

    addLayer: (input) => {
      const result = validateLayerInput(input);
      if (!result.valid || !result.layer) {
        throw new ValidationError(result.errors);
      }
      const layer = result.layer;
      if (get().layers.some((l) => l.name === layer.name)) {
        throw new ValidationError([`A layer named "${layer.name}" already exists`]);
      }
      set((s) => ({ layers: [...s.layers, layer] }));
      return layer;
    },

    getLayer: (name) => get().layers.find((l) => l.name === name),

    listLayers: () => [...get().layers],

    clear: () => set({ layers: [] }),
  }));
}

export function toLayerView(layer: Layer): LayerView {
  return {
    name: layer.name,
    shape: [...layer.data.shape],
    bandNames: [...layer.bandNames],
    metadata: structuredClone(layer.metadata),
    data: { shape: [...layer.data.shape], values: copyValues(layer.data.values) },
  };
}
