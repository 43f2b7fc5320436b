/**
 * Potree metadata resolver.
 *
 * Turns a parsed `metadata.json` / `cloud.js` document into a PointSchema.
 * Handles the field-name drift between Potree releases:
 *   - point count under `points` or `pointCount`
 *   - bounds under `boundingBox` or `tightBoundingBox`
 *   - `scale` as a scalar, array, or {x,y,z}
 *   - attributes as a legacy alias string ("LAS", "LASRGB") or a descriptor array,
 *     under `pointAttributes`, `attributes`, or `schema`
 */

import { SchemaError } from './errors';
import {
  asBox,
  asInteger,
  asScalarOrVector,
  asString,
  firstPresent,
  isJsonObject,
  type JsonValue,
} from './JsonAccessor';
import type { AttributeDescriptor, AttributeKind, ComponentType, PointSchema, Vec3 } from './types';

export const DEFAULT_SCALE: Vec3 = [0.001, 0.001, 0.001];
export const DEFAULT_HIERARCHY_STEP_SIZE = 5;
export const DEFAULT_OCTREE_DIR = 'octree';

/** Byte size and element count used when an attribute entry omits them. */
export const DEFAULT_ATTRIBUTE_LAYOUT: Partial<Record<AttributeKind, { size: number; elements: number }>> = {
  position: { size: 12, elements: 3 },
  rgb: { size: 3, elements: 3 },
  packedColor: { size: 4, elements: 4 },
  intensity: { size: 2, elements: 1 },
  classification: { size: 1, elements: 1 },
};
const FALLBACK_LAYOUT = { size: 4, elements: 1 };

const ATTRIBUTE_LIST_KEYS = ['pointAttributes', 'attributes', 'schema'];

// Evaluated in order; the first matching token wins. NUMBEROFRETURNS must
// precede RETURNNUMBER.
const ATTRIBUTE_NAME_RULES: [AttributeKind, string[]][] = [
  ['position', ['POSITION']],
  ['packedColor', ['COLORPACKED', 'RGBAPACKED']],
  ['rgb', ['RGB', 'COLOR']],
  ['intensity', ['INTENSITY']],
  ['classification', ['CLASSIF']],
  ['normal', ['NORMAL']],
  ['gpsTime', ['GPSTIME']],
  ['numberOfReturns', ['NUMBEROFRETURNS']],
  ['returnNumber', ['RETURNNUMBER']],
  ['pointSourceId', ['SOURCEID']],
];

// Unsigned tokens first: "UINT16" also contains "INT16".
const COMPONENT_TYPE_RULES: [ComponentType, string][] = [
  ['float64', 'FLOAT64'],
  ['float64', 'DOUBLE'],
  ['float32', 'FLOAT'],
  ['uint32', 'UINT32'],
  ['int32', 'INT32'],
  ['uint16', 'UINT16'],
  ['int16', 'INT16'],
  ['uint8', 'UINT8'],
  ['int8', 'INT8'],
];

function normalizeToken(s: string): string {
  return s.toUpperCase().replace(/[\s_-]+/g, '');
}

export function parseAttributeKind(name: string | undefined): AttributeKind {
  if (!name) return 'unknown';
  const token = normalizeToken(name);
  for (const [kind, needles] of ATTRIBUTE_NAME_RULES) {
    if (needles.some((n) => token.includes(n))) return kind;
  }
  return 'unknown';
}

export function parseComponentType(
  token: string | undefined,
  sizeBytes: number,
  elementCount: number,
): ComponentType {
  if (token) {
    const t = normalizeToken(token);
    for (const [type, needle] of COMPONENT_TYPE_RULES) {
      if (t.includes(needle)) return type;
    }
  }
  return sizeBytes === elementCount * 4 ? 'float32' : 'uint32';
}

/** Expand a legacy alias like "LAS", "RGB" or "LASRGB" into its implicit layout. */
export function expandAlias(alias: string): AttributeDescriptor[] {
  const upper = alias.toUpperCase();
  const list: AttributeDescriptor[] = [
    { kind: 'position', componentType: 'float32', sizeBytes: 12, elementCount: 3 },
  ];
  if (upper.includes('RGB')) {
    list.push({ kind: 'rgb', componentType: 'uint8', sizeBytes: 3, elementCount: 3 });
  }
  if (upper.includes('LAS')) {
    list.push({ kind: 'intensity', componentType: 'uint16', sizeBytes: 2, elementCount: 1 });
    list.push({ kind: 'classification', componentType: 'uint8', sizeBytes: 1, elementCount: 1 });
  }
  return list;
}

function parseAttributeEntry(entry: JsonValue, index: number): AttributeDescriptor {
  if (!isJsonObject(entry)) {
    throw new SchemaError(`Attribute entry ${index} is not an object`);
  }

  const kind = parseAttributeKind(asString(entry.name));
  const layout = DEFAULT_ATTRIBUTE_LAYOUT[kind] ?? FALLBACK_LAYOUT;

  let sizeBytes = layout.size;
  if (entry.size !== undefined && entry.size !== null) {
    const size = asInteger(entry.size);
    if (size === undefined || size <= 0) {
      throw new SchemaError(`Attribute entry ${index} has invalid size: ${JSON.stringify(entry.size)}`);
    }
    sizeBytes = size;
  }

  const elementCount = asInteger(firstPresent(entry, ['elements', 'numElements'])) ?? layout.elements;
  const componentType = parseComponentType(asString(entry.type), sizeBytes, elementCount);

  return { kind, componentType, sizeBytes, elementCount };
}

function resolveAttributes(value: JsonValue | undefined): AttributeDescriptor[] {
  if (value === undefined) {
    throw new SchemaError('missing point attribute schema');
  }
  if (typeof value === 'string') {
    return expandAlias(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) {
      throw new SchemaError('Point attribute schema is empty');
    }
    return value.map(parseAttributeEntry);
  }
  throw new SchemaError(`Unsupported point attribute schema type: ${value === null ? 'null' : typeof value}`);
}

export function resolveSchema(doc: JsonValue): PointSchema {
  if (!isJsonObject(doc)) {
    throw new SchemaError('Potree metadata must be a JSON object');
  }

  const octreeDir =
    asString(firstPresent(doc, ['octreeDir', 'octreeDirPath', 'octreeDirName'])) ?? DEFAULT_OCTREE_DIR;
  const hierarchyStepSize = asInteger(doc.hierarchyStepSize) ?? DEFAULT_HIERARCHY_STEP_SIZE;
  const pointCount = asInteger(firstPresent(doc, ['points', 'pointCount'])) ?? 0;

  const box = asBox(doc.boundingBox) ?? asBox(doc.tightBoundingBox);
  const bboxMin: Vec3 = box?.min ?? [0, 0, 0];
  const bboxMax: Vec3 = box?.max ?? [0, 0, 0];

  const scale = asScalarOrVector(doc.scale) ?? DEFAULT_SCALE;
  // Quantized coordinates default to being relative to the box minimum
  const offset = asScalarOrVector(doc.offset) ?? bboxMin;

  const attributes = resolveAttributes(firstPresent(doc, ATTRIBUTE_LIST_KEYS));

  return {
    octreeDir,
    pointCount,
    bboxMin,
    bboxMax,
    scale,
    offset,
    hierarchyStepSize,
    attributes,
  };
}
