/**
 * App Store — Zustand store for loaded Potree clouds
 *
 * Vanilla (framework-free) store so the Node loader and any UI host can
 * share it.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';

import {
  type PointcloudState,
  type PointcloudActions,
  initialPointcloudState,
  createPointcloudSlice,
} from './slices';

export type AppState = PointcloudState & PointcloudActions;

export const appStore = createStore<AppState>()(
  immer((set) => ({
    ...initialPointcloudState,

    // Pointcloud actions
    ...createPointcloudSlice((fn) => set((s) => { fn(s); })),
  }))
);
