/**
 * Per-kind attribute decoders.
 *
 * Each decoder reads one attribute of the current record and writes into the
 * output block (or the record's pending color). Kinds with no entry here are
 * skipped; the record walker still advances past their bytes.
 */

import type { AttributeDescriptor, AttributeKind, ComponentType, PointBlock, PointSchema } from './types';
import { COMPONENT_BYTE_SIZE } from './types';

export interface RecordContext {
  readonly schema: PointSchema;
  readonly block: PointBlock;
  index: number;
  /** Pending RGBA for the current record. Reset to opaque white per record. */
  readonly color: Uint8Array;
}

export type AttributeDecoder = (
  view: DataView,
  offset: number,
  attribute: Readonly<AttributeDescriptor>,
  ctx: RecordContext,
) => void;

export function readComponent(view: DataView, offset: number, type: ComponentType): number {
  switch (type) {
    case 'int8': return view.getInt8(offset);
    case 'uint8': return view.getUint8(offset);
    case 'int16': return view.getInt16(offset, true);
    case 'uint16': return view.getUint16(offset, true);
    case 'int32': return view.getInt32(offset, true);
    case 'uint32': return view.getUint32(offset, true);
    case 'float32': return view.getFloat32(offset, true);
    case 'float64': return view.getFloat64(offset, true);
  }
}

const decodePosition: AttributeDecoder = (view, offset, attr, ctx) => {
  const out = ctx.block.positions;
  const i = ctx.index * 3;

  if (attr.componentType === 'float32') {
    if (attr.sizeBytes < 12) return;
    out[i] = view.getFloat32(offset, true);
    out[i + 1] = view.getFloat32(offset + 4, true);
    out[i + 2] = view.getFloat32(offset + 8, true);
    return;
  }

  if (attr.componentType === 'float64' && attr.sizeBytes >= 24) {
    out[i] = view.getFloat64(offset, true);
    out[i + 1] = view.getFloat64(offset + 8, true);
    out[i + 2] = view.getFloat64(offset + 16, true);
    return;
  }

  // Quantized int32 XYZ: world = offset + scale * int
  if (attr.sizeBytes < 12) return;
  const { scale, offset: origin } = ctx.schema;
  out[i] = origin[0] + scale[0] * view.getInt32(offset, true);
  out[i + 1] = origin[1] + scale[1] * view.getInt32(offset + 4, true);
  out[i + 2] = origin[2] + scale[2] * view.getInt32(offset + 8, true);
};

const decodeRGB: AttributeDecoder = (view, offset, attr, ctx) => {
  const c = ctx.color;
  if (attr.componentType === 'uint16') {
    if (attr.sizeBytes < 6) return;
    // 16-bit channels; values that already fit 8 bits are kept as-is
    for (let k = 0; k < 3; k++) {
      const v = view.getUint16(offset + k * 2, true);
      c[k] = v > 255 ? v >> 8 : v;
    }
  } else {
    if (attr.sizeBytes < 3) return;
    c[0] = view.getUint8(offset);
    c[1] = view.getUint8(offset + 1);
    c[2] = view.getUint8(offset + 2);
  }
  c[3] = 255;
};

const decodePackedColor: AttributeDecoder = (view, offset, attr, ctx) => {
  if (attr.sizeBytes < 4) return;
  const c = ctx.color;
  c[0] = view.getUint8(offset);
  c[1] = view.getUint8(offset + 1);
  c[2] = view.getUint8(offset + 2);
  c[3] = view.getUint8(offset + 3);
};

const UNSIGNED_BY_WIDTH: Partial<Record<number, ComponentType>> = { 1: 'uint8', 2: 'uint16', 4: 'uint32' };

/**
 * First element of a scalar attribute. An untyped entry can resolve to a type
 * wider than its per-element span (e.g. uint32 for a 2-byte intensity); those
 * are read as an unsigned integer of the span instead.
 */
function readFirstElement(view: DataView, offset: number, attr: Readonly<AttributeDescriptor>): number | undefined {
  const width = attr.elementCount > 0 ? Math.floor(attr.sizeBytes / attr.elementCount) : attr.sizeBytes;
  let type: ComponentType | undefined = attr.componentType;
  if (COMPONENT_BYTE_SIZE[type] > width) type = UNSIGNED_BY_WIDTH[width];
  if (!type) return undefined;
  return readComponent(view, offset, type);
}

const decodeIntensity: AttributeDecoder = (view, offset, attr, ctx) => {
  const out = ctx.block.intensities;
  const value = out ? readFirstElement(view, offset, attr) : undefined;
  if (out && value !== undefined) out[ctx.index] = value;
};

const decodeClassification: AttributeDecoder = (view, offset, attr, ctx) => {
  const out = ctx.block.classifications;
  const value = out ? readFirstElement(view, offset, attr) : undefined;
  if (out && value !== undefined) out[ctx.index] = value;
};

export const ATTRIBUTE_DECODERS: Partial<Record<AttributeKind, AttributeDecoder>> = {
  position: decodePosition,
  rgb: decodeRGB,
  packedColor: decodePackedColor,
  intensity: decodeIntensity,
  classification: decodeClassification,
};
