// ── Raster data ─────────────────────────────────────────────────────────
export type NumericArray =
  | number[]
  | Float32Array
  | Float64Array
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array;

export interface RasterData {
  /** `[bands, height, width]`, or `[height, width]` for a single band. */
  shape: readonly number[];
  /** Band-major values; length is the product of `shape`. */
  values: NumericArray;
}

/** Raster whose shape has been normalised to three dimensions. */
export interface BandRaster {
  shape: [bands: number, height: number, width: number];
  values: NumericArray;
}

export type LayerMetadata = Record<string, unknown>;

// ── Layers ──────────────────────────────────────────────────────────────
export interface Layer {
  name: string;
  data: BandRaster;
  bandNames: string[];
  metadata: LayerMetadata;
}

export interface LayerInput {
  data: RasterData;
  name: string;
  bandNames?: string[];
  metadata?: LayerMetadata;
}

/**
 * Snapshot handed to plugins. Every field is a copy, so changing a view
 * never reaches the Layer Store.
 */
export interface LayerView {
  name: string;
  shape: [bands: number, height: number, width: number];
  bandNames: string[];
  metadata: LayerMetadata;
  data: BandRaster;
}

export const DEFAULT_LAYER_NAME = 'Plugin Layer';
