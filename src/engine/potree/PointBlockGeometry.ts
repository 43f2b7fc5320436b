/**
 * Three.js geometry for decoded point blocks.
 *
 * World positions are often large (projected CRS), so positions are stored
 * relative to a center to keep float32 precision on the GPU.
 */

import * as THREE from 'three';
import type { PointBlock, Vec3 } from './types';

export interface PointBlockBounds {
  min: Vec3;
  max: Vec3;
}

export function computePointBlockBounds(block: PointBlock): PointBlockBounds {
  if (block.pointCount === 0) return { min: [0, 0, 0], max: [0, 0, 0] };

  const pos = block.positions;
  let minX = Infinity, minY = Infinity, minZ = Infinity;
  let maxX = -Infinity, maxY = -Infinity, maxZ = -Infinity;
  for (let i = 0; i < block.pointCount; i++) {
    const x = pos[i * 3];
    const y = pos[i * 3 + 1];
    const z = pos[i * 3 + 2];
    if (x < minX) minX = x;
    if (y < minY) minY = y;
    if (z < minZ) minZ = z;
    if (x > maxX) maxX = x;
    if (y > maxY) maxY = y;
    if (z > maxZ) maxZ = z;
  }
  return { min: [minX, minY, minZ], max: [maxX, maxY, maxZ] };
}

export function createPointBlockGeometry(
  block: PointBlock,
  center?: Vec3,
): { geometry: THREE.BufferGeometry; center: Vec3 } {
  let origin = center;
  if (!origin) {
    const { min, max } = computePointBlockBounds(block);
    origin = [(min[0] + max[0]) / 2, (min[1] + max[1]) / 2, (min[2] + max[2]) / 2];
  }

  const count = block.pointCount;
  const positions = new Float32Array(count * 3);
  for (let i = 0; i < count; i++) {
    positions[i * 3] = block.positions[i * 3] - origin[0];
    positions[i * 3 + 1] = block.positions[i * 3 + 1] - origin[1];
    positions[i * 3 + 2] = block.positions[i * 3 + 2] - origin[2];
  }

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
  if (block.colors) geometry.setAttribute('color', new THREE.BufferAttribute(block.colors, 4, true));
  if (block.intensities) geometry.setAttribute('aIntensity', new THREE.BufferAttribute(block.intensities, 1));
  if (block.classifications) {
    geometry.setAttribute('aClassification', new THREE.BufferAttribute(block.classifications, 1));
  }
  geometry.computeBoundingBox();

  return { geometry, center: origin };
}
