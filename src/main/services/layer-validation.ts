import type { BandRaster, Layer, LayerMetadata, NumericArray } from '../../shared/layer-types';

interface ValidationResult {
  valid: boolean;
  layer?: Layer;
  errors: string[];
}

const TYPED_ARRAY_TYPES = [
  Float32Array,
  Float64Array,
  Int8Array,
  Uint8Array,
  Uint8ClampedArray,
  Int16Array,
  Uint16Array,
  Int32Array,
  Uint32Array,
] as const;

export function isNumericArray(value: unknown): value is NumericArray {
  if (Array.isArray(value)) {
    return value.every((v) => typeof v === 'number');
  }
  return TYPED_ARRAY_TYPES.some((type) => value instanceof type);
}

export function copyValues(values: NumericArray): NumericArray {
  return values.slice();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function validateShape(shape: unknown, errors: string[]): [number, number, number] | undefined {
  if (!Array.isArray(shape)) {
    errors.push('data.shape must be an array');
    return undefined;
  }
  if (shape.length !== 2 && shape.length !== 3) {
    errors.push(`data.shape must have 2 or 3 dimensions, got ${shape.length}`);
    return undefined;
  }
  const dims: number[] = [];
  for (let i = 0; i < shape.length; i++) {
    const dim: unknown = shape[i];
    if (typeof dim !== 'number' || !Number.isInteger(dim) || dim <= 0) {
      errors.push(`data.shape[${i}] must be a positive integer`);
      return undefined;
    }
    dims.push(dim);
  }
  return dims.length === 2 ? [1, dims[0], dims[1]] : [dims[0], dims[1], dims[2]];
}

function validateData(raw: unknown, errors: string[]): BandRaster | undefined {
  if (!raw || typeof raw !== 'object') {
    errors.push('data must be an object with shape and values');
    return undefined;
  }
  const d = raw as Record<string, unknown>;
  const shape = validateShape(d.shape, errors);
  if (!isNumericArray(d.values)) {
    errors.push('data.values must be a number array or a typed numeric array');
    return undefined;
  }
  if (!shape) return undefined;

  const expected = shape[0] * shape[1] * shape[2];
  if (d.values.length !== expected) {
    errors.push(`data.values has ${d.values.length} elements, expected ${expected} for shape [${shape.join(', ')}]`);
    return undefined;
  }
  return { shape, values: copyValues(d.values) };
}

function validateBandNames(raw: unknown, bands: number | undefined, errors: string[]): string[] | undefined {
  if (raw === undefined) {
    return bands === undefined ? undefined : Array.from({ length: bands }, (_, i) => `Band ${i + 1}`);
  }
  if (!Array.isArray(raw) || !raw.every((b) => typeof b === 'string')) {
    errors.push('bandNames must be an array of strings');
    return undefined;
  }
  if (bands !== undefined && raw.length !== bands) {
    errors.push(`bandNames has ${raw.length} entries but data has ${bands} bands`);
    return undefined;
  }
  return [...raw];
}

function validateMetadata(raw: unknown, errors: string[]): LayerMetadata | undefined {
  if (raw === undefined) return {};
  if (!isPlainObject(raw)) {
    errors.push('metadata must be a plain object');
    return undefined;
  }
  try {
    return structuredClone(raw);
  } catch (err) {
    errors.push(`metadata must be cloneable: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
}

/**
 * Checks a candidate layer and returns a normalised, fully copied record.
 * Name uniqueness is the store's concern.
 */
export function validateLayerInput(raw: unknown): ValidationResult {
  const errors: string[] = [];

  if (!raw || typeof raw !== 'object') {
    return { valid: false, errors: ['Layer input must be an object'] };
  }

  const input = raw as Record<string, unknown>;

  if (typeof input.name !== 'string' || !input.name.trim()) {
    errors.push('Layer name must be a non-empty string');
  }

  const data = validateData(input.data, errors);
  const bandNames = validateBandNames(input.bandNames, data?.shape[0], errors);
  const metadata = validateMetadata(input.metadata, errors);

  if (errors.length > 0 || !data || !bandNames || !metadata || typeof input.name !== 'string') {
    return { valid: false, errors };
  }

  return {
    valid: true,
    layer: { name: input.name, data, bandNames, metadata },
    errors,
  };
}
