/**
 * Response Sanitizer
 *
 * Strips geometry noise (bounding boxes, polygons, relationships, table
 * cell positions) from provider payloads at every depth. Only keys in the
 * noise set are removed; values are never rewritten. The input is left
 * untouched and a new structure is returned, so sanitize(sanitize(x))
 * equals sanitize(x).
 *
 * @module services/ocr/sanitizer
 */

import type { JsonValue } from '../../models/extraction.js';
import { CyclicPayloadError } from './errors.js';

/**
 * Positional fields that carry nothing useful for text comparison
 */
export const DEFAULT_NOISE_FIELDS: readonly string[] = [
  'Geometry',
  'BoundingBox',
  'Polygon',
  'Relationships',
  'RowIndex',
  'ColumnIndex',
  'RowSpan',
  'ColumnSpan',
  'CellGeometry',
  'TableGeometry',
  'TableBoundingBox',
  'TablePolygon',
];

export interface SanitizeOptions {
  /** Replaces the default noise set */
  noiseFields?: Iterable<string>;
}

export interface SizeReduction {
  originalSize: number;
  cleanedSize: number;
  reductionPercent: number;
}

/**
 * Remove noise keys from every mapping in the payload.
 *
 * @throws CyclicPayloadError if an object contains itself
 */
export function sanitize(payload: JsonValue, options: SanitizeOptions = {}): JsonValue {
  const noise = new Set(options.noiseFields ?? DEFAULT_NOISE_FIELDS);
  // Objects on the current path. Shared (non-cyclic) sub-objects are fine.
  const ancestors = new Set<object>();

  const walk = (value: JsonValue, path: string): JsonValue => {
    if (value === null || typeof value !== 'object') {
      return value;
    }
    if (ancestors.has(value)) {
      throw new CyclicPayloadError(path);
    }
    ancestors.add(value);
    try {
      if (Array.isArray(value)) {
        return value.map((item, i) => walk(item, `${path}[${i}]`));
      }
      // fromEntries defines own properties, so a "__proto__" key stays data
      return Object.fromEntries(
        Object.entries(value)
          .filter(([key]) => !noise.has(key))
          .map(([key, child]): [string, JsonValue] => [key, walk(child, `${path}.${key}`)])
      );
    } finally {
      ancestors.delete(value);
    }
  };

  return walk(payload, '$');
}

/**
 * Serialized size before and after cleaning. Informational only.
 */
export function measureReduction(before: JsonValue, after: JsonValue): SizeReduction {
  const originalSize = JSON.stringify(before).length;
  const cleanedSize = JSON.stringify(after).length;
  const reductionPercent =
    originalSize > 0 ? Math.round(((originalSize - cleanedSize) / originalSize) * 10000) / 100 : 0;
  return { originalSize, cleanedSize, reductionPercent };
}

/**
 * Sanitize and log the size reduction under the given tag
 */
export function sanitizeWithTelemetry(
  tag: string,
  payload: JsonValue,
  options?: SanitizeOptions
): JsonValue {
  const cleaned = sanitize(payload, options);
  const { originalSize, cleanedSize, reductionPercent } = measureReduction(payload, cleaned);
  console.error(
    `[${tag}] Response cleaning: original ${originalSize} chars, cleaned ${cleanedSize} chars, reduction ${reductionPercent.toFixed(2)}%`
  );
  return cleaned;
}

/**
 * Deep-copy an SDK response object into plain JSON data
 * (drops undefined members, serializes dates)
 */
export function toJsonValue(value: unknown): JsonValue {
  const parsed: JsonValue = JSON.parse(JSON.stringify(value ?? null));
  return parsed;
}
