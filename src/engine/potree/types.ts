/**
 * Core value types for Potree point data.
 *
 * A PointSchema is resolved once from metadata and shared read-only by every
 * decode call. PointBlocks are fresh per decode and owned by the caller.
 */

export type Vec3 = readonly [number, number, number];

export type Rgba8 = readonly [number, number, number, number];

/** Semantic role of an attribute. Schema order decides its byte offset in a record. */
export type AttributeKind =
  | 'position'
  | 'packedColor'
  | 'rgb'
  | 'intensity'
  | 'classification'
  | 'normal'
  | 'gpsTime'
  | 'returnNumber'
  | 'numberOfReturns'
  | 'pointSourceId'
  | 'unknown';

/** How the raw bytes of an attribute's elements are interpreted. */
export type ComponentType =
  | 'uint8'
  | 'int8'
  | 'uint16'
  | 'int16'
  | 'uint32'
  | 'int32'
  | 'float32'
  | 'float64';

export const COMPONENT_BYTE_SIZE: Record<ComponentType, number> = {
  uint8: 1,
  int8: 1,
  uint16: 2,
  int16: 2,
  uint32: 4,
  int32: 4,
  float32: 4,
  float64: 8,
};

export interface AttributeDescriptor {
  kind: AttributeKind;
  componentType: ComponentType;
  /** Total bytes this attribute spans in one record (all elements). */
  sizeBytes: number;
  elementCount: number;
}

export interface PointSchema {
  readonly octreeDir: string;
  /** Point count declared by the metadata, not necessarily what the bin holds */
  readonly pointCount: number;
  readonly bboxMin: Vec3;
  readonly bboxMax: Vec3;
  /** world = offset + scale * quantized */
  readonly scale: Vec3;
  readonly offset: Vec3;
  readonly hierarchyStepSize: number;
  readonly attributes: readonly Readonly<AttributeDescriptor>[];
}

export interface PointBlock {
  pointCount: number;
  /** World XYZ, interleaved */
  positions: Float64Array;
  /** RGBA bytes, interleaved. Absent when the schema has no color attribute. */
  colors?: Uint8Array;
  intensities?: Uint16Array;
  classifications?: Uint8Array;
}

export function recordStride(schema: Pick<PointSchema, 'attributes'>): number {
  let stride = 0;
  for (const attr of schema.attributes) stride += attr.sizeBytes;
  return stride;
}

export function positionAt(block: PointBlock, index: number): Vec3 {
  const p = block.positions;
  return [p[index * 3], p[index * 3 + 1], p[index * 3 + 2]];
}

export function colorAt(block: PointBlock, index: number): Rgba8 | undefined {
  const c = block.colors;
  if (!c) return undefined;
  return [c[index * 4], c[index * 4 + 1], c[index * 4 + 2], c[index * 4 + 3]];
}
