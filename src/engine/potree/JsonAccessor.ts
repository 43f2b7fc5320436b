/**
 * Typed getters over an already-parsed JSON tree.
 *
 * Each getter returns `undefined` when the value does not have the expected
 * shape, so callers can chain fallbacks with `??`.
 */

import type { Vec3 } from './types';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First of `keys` present on `obj` (null counts as absent). */
export function firstPresent(obj: JsonObject, keys: readonly string[]): JsonValue | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

export function asNumber(value: JsonValue | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function asInteger(value: JsonValue | undefined): number | undefined {
  const n = asNumber(value);
  return n !== undefined && Number.isInteger(n) ? n : undefined;
}

export function asString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * `[x, y, z, ...]` or `{ x, y, z }`.
 * Arrays shorter than 3 or with non-numeric entries are rejected; missing
 * object components read as 0.
 */
export function asVector3(value: JsonValue | undefined): Vec3 | undefined {
  if (Array.isArray(value)) {
    if (value.length < 3) return undefined;
    const x = asNumber(value[0]);
    const y = asNumber(value[1]);
    const z = asNumber(value[2]);
    if (x === undefined || y === undefined || z === undefined) return undefined;
    return [x, y, z];
  }
  if (isJsonObject(value)) {
    return [asNumber(value.x) ?? 0, asNumber(value.y) ?? 0, asNumber(value.z) ?? 0];
  }
  return undefined;
}

/** Like asVector3, but a bare number expands to `(s, s, s)`. */
export function asScalarOrVector(value: JsonValue | undefined): Vec3 | undefined {
  const s = asNumber(value);
  if (s !== undefined) return [s, s, s];
  return asVector3(value);
}

/** `{ min, max }` corners of a box object; a missing corner is the zero vector. */
export function asBox(value: JsonValue | undefined): { min: Vec3; max: Vec3 } | undefined {
  if (!isJsonObject(value)) return undefined;
  return {
    min: asVector3(value.min) ?? [0, 0, 0],
    max: asVector3(value.max) ?? [0, 0, 0],
  };
}
