/**
 * Slices barrel export — Pointcloud only
 */

export {
  type PointcloudState,
  type PointcloudActions,
  type PointcloudSlice,
  type PointcloudEntry,
  initialPointcloudState,
  createPointcloudSlice,
  MIN_POINT_BUDGET,
  MAX_POINT_BUDGET,
} from './pointcloudSlice';
