/**
 * Decoded point blocks, keyed by pointcloud ID.
 *
 * App-store entries carry only serializable metadata; the typed-array columns
 * and the schema they were decoded with are kept here until `releasePointBlock`.
 */

import type { PointBlock, PointSchema } from './types';

export interface StoredPointBlock {
  schema: PointSchema;
  block: PointBlock;
  byteLength: number;
}

const blocks = new Map<string, StoredPointBlock>();

/** Bytes held by the block's typed-array columns. */
export function pointBlockByteLength(block: PointBlock): number {
  return (
    block.positions.byteLength +
    (block.colors?.byteLength ?? 0) +
    (block.intensities?.byteLength ?? 0) +
    (block.classifications?.byteLength ?? 0)
  );
}

export function storePointBlock(id: string, schema: PointSchema, block: PointBlock): StoredPointBlock {
  const stored = { schema, block, byteLength: pointBlockByteLength(block) };
  blocks.set(id, stored);
  return stored;
}

export function getPointBlock(id: string): PointBlock | undefined {
  return blocks.get(id)?.block;
}

export function getStoredPointBlock(id: string): StoredPointBlock | undefined {
  return blocks.get(id);
}

/** Returns false when nothing was stored under `id`. */
export function releasePointBlock(id: string): boolean {
  return blocks.delete(id);
}

export function storedPointBlockIds(): string[] {
  return [...blocks.keys()];
}

export function storedPointBlockBytes(): number {
  let total = 0;
  for (const { byteLength } of blocks.values()) total += byteLength;
  return total;
}
