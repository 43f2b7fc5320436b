/**
 * Potree flat bin decoder.
 *
 * Reads fixed-stride little-endian records laid out in schema attribute order
 * and produces a PointBlock. Trailing bytes that do not fill a whole record
 * are ignored.
 */

import { ATTRIBUTE_DECODERS, type RecordContext } from './attributeDecoders';
import { toByteSource, type ByteInput, type ByteSource } from './ByteSource';
import { DecodeError } from './errors';
import { recordStride, type PointBlock, type PointSchema } from './types';

function readRecord(source: ByteSource, record: Uint8Array, index: number): void {
  let filled = 0;
  while (filled < record.length) {
    const n = source.read(record.subarray(filled));
    if (n <= 0) break;
    filled += n;
  }
  if (filled < record.length) {
    throw new DecodeError(
      'Truncated',
      `Stream ended mid-record: point ${index} has ${filled} of ${record.length} bytes`,
    );
  }
}

export function decodeRecords(input: ByteInput, schema: PointSchema, maxPoints?: number): PointBlock {
  const stride = recordStride(schema);
  if (!(stride > 0)) {
    throw new DecodeError('InvalidStride', `Invalid record stride ${stride} computed from attributes`);
  }
  if (maxPoints !== undefined && (!Number.isInteger(maxPoints) || maxPoints < 0)) {
    throw new DecodeError('InvalidArgument', `maxPoints must be a non-negative integer, got ${maxPoints}`);
  }

  const source = toByteSource(input);
  let pointCount = Math.floor(source.byteLength / stride);
  if (maxPoints !== undefined) pointCount = Math.min(pointCount, maxPoints);

  const kinds = new Set(schema.attributes.map((a) => a.kind));
  const block: PointBlock = {
    pointCount,
    positions: new Float64Array(pointCount * 3),
  };
  if (kinds.has('rgb') || kinds.has('packedColor')) block.colors = new Uint8Array(pointCount * 4);
  if (kinds.has('intensity')) block.intensities = new Uint16Array(pointCount);
  if (kinds.has('classification')) block.classifications = new Uint8Array(pointCount);

  const steps = schema.attributes.map((attribute) => ({
    attribute,
    decode: ATTRIBUTE_DECODERS[attribute.kind],
  }));

  const record = new Uint8Array(stride);
  const view = new DataView(record.buffer);
  const ctx: RecordContext = { schema, block, index: 0, color: new Uint8Array(4) };

  for (let i = 0; i < pointCount; i++) {
    readRecord(source, record, i);
    ctx.index = i;
    ctx.color.fill(255);

    let offset = 0;
    for (const { attribute, decode } of steps) {
      decode?.(view, offset, attribute, ctx);
      offset += attribute.sizeBytes;
    }

    block.colors?.set(ctx.color, i * 4);
  }

  return block;
}
