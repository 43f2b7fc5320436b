/**
 * Node-side Potree loader.
 *
 * Reads `metadata.json` (or legacy `cloud.js`), resolves the schema, decodes
 * one flat bin into a PointBlock and registers the result in the app store.
 */

import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { appStore } from '../../state/appStore';
import { FileByteSource } from './ByteSource';
import { SchemaError } from './errors';
import type { JsonValue } from './JsonAccessor';
import { releasePointBlock, storePointBlock } from './PointBlockStore';
import { decodeRecords } from './RecordDecoder';
import { resolveSchema } from './SchemaResolver';
import type { PointBlock, PointSchema } from './types';

export type ProgressCallback = (phase: string, percent: number) => void;

export const DEFAULT_BIN_NAME = 'octree.bin';

export interface LoadPotreeOptions {
  /** Defaults to `octree.bin` beside the metadata file */
  binPath?: string;
  /** Decode cap. Defaults to the store's point budget; `null` decodes every record. */
  maxPoints?: number | null;
  id?: string;
  onProgress?: ProgressCallback;
}

export interface LoadedPotree {
  id: string;
  binPath: string;
  schema: PointSchema;
  block: PointBlock;
}

export async function loadPotreeSchema(metadataPath: string): Promise<PointSchema> {
  const text = await readFile(metadataPath, 'utf8');

  let doc: JsonValue;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SchemaError(`Invalid metadata JSON in ${metadataPath}: ${message}`);
  }

  return resolveSchema(doc);
}

export async function loadPotree(metadataPath: string, options: LoadPotreeOptions = {}): Promise<LoadedPotree> {
  const id = options.id ?? randomUUID();
  const binPath = options.binPath ?? join(dirname(metadataPath), DEFAULT_BIN_NAME);
  const { addPointcloud, updatePointcloud, updatePointcloudProgress, pointBudget } = appStore.getState();
  const maxPoints = options.maxPoints === undefined ? pointBudget : options.maxPoints ?? undefined;

  const report = (phase: string, percent: number) => {
    updatePointcloudProgress(id, percent, phase);
    options.onProgress?.(phase, percent);
  };

  addPointcloud({
    id,
    metadataPath,
    binPath,
    totalPoints: 0,
    decodedPoints: 0,
    bounds: { minX: 0, minY: 0, minZ: 0, maxX: 0, maxY: 0, maxZ: 0 },
    hasColor: false,
    hasIntensity: false,
    hasClassification: false,
    visible: true,
    loadProgress: 0,
    loadPhase: 'Queued',
  });

  try {
    report('Reading metadata...', 10);
    const schema = await loadPotreeSchema(metadataPath);

    const unknown = schema.attributes.filter((a) => a.kind === 'unknown');
    if (unknown.length > 0) {
      console.warn(`[potree] ${unknown.length} unrecognized attribute(s) in ${metadataPath}, skipping their bytes`);
    }

    report('Decoding points...', 30);
    const label = `[potree] decode ${binPath}`;
    const source = new FileByteSource(binPath);
    console.time(label);
    let block: PointBlock;
    try {
      block = decodeRecords(source, schema, maxPoints);
    } finally {
      source.close();
      console.timeEnd(label);
    }
    const { byteLength } = storePointBlock(id, schema, block);
    console.log(`[potree] decoded ${block.pointCount} points from ${binPath} (${(byteLength / 1e6).toFixed(1)} MB)`);
    const [minX, minY, minZ] = schema.bboxMin;
    const [maxX, maxY, maxZ] = schema.bboxMax;
    updatePointcloud(id, {
      totalPoints: schema.pointCount,
      decodedPoints: block.pointCount,
      bounds: { minX, minY, minZ, maxX, maxY, maxZ },
      hasColor: block.colors !== undefined,
      hasIntensity: block.intensities !== undefined,
      hasClassification: block.classifications !== undefined,
    });
    report('Complete', 100);

    return { id, binPath, schema, block };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    releasePointBlock(id);
    updatePointcloudProgress(id, 0, `Failed: ${message}`);
    throw err;
  }
}

/**
 * Drop a loaded pointcloud: its decoded columns and its app-store entry.
 * Returns false when neither existed.
 */
export function unloadPotree(id: string): boolean {
  const released = releasePointBlock(id);
  const { pointclouds, removePointcloud } = appStore.getState();
  const listed = pointclouds.some((p) => p.id === id);
  if (listed) removePointcloud(id);
  return released || listed;
}
