/**
 * Pointcloud Slice - Tracks loaded Potree clouds
 *
 * Holds one entry per decoded bin (bounds, available columns, load progress)
 * and the point budget used as the default decode cap.
 */

// ============================================================================
// Types
// ============================================================================

export interface PointcloudEntry {
  id: string;
  metadataPath: string;
  binPath: string;
  /** Point count declared by the metadata */
  totalPoints: number;
  /** Points actually decoded from the bin */
  decodedPoints: number;
  bounds: {
    minX: number; minY: number; minZ: number;
    maxX: number; maxY: number; maxZ: number;
  };
  hasColor: boolean;
  hasIntensity: boolean;
  hasClassification: boolean;
  visible: boolean;
  loadProgress: number;
  loadPhase: string;
}

// ============================================================================
// State Interface
// ============================================================================

export interface PointcloudState {
  /** Loaded pointclouds */
  pointclouds: PointcloudEntry[];
  /** Currently active pointcloud ID */
  activePointcloudId: string | null;
  /** Default maximum number of points decoded per bin */
  pointBudget: number;
}

// ============================================================================
// Actions Interface
// ============================================================================

export interface PointcloudActions {
  addPointcloud: (entry: PointcloudEntry) => void;
  updatePointcloud: (id: string, patch: Partial<Omit<PointcloudEntry, 'id'>>) => void;
  removePointcloud: (id: string) => void;
  setActivePointcloudId: (id: string | null) => void;
  setPointcloudVisible: (id: string, visible: boolean) => void;
  updatePointcloudProgress: (id: string, progress: number, phase: string) => void;
  setPointBudget: (budget: number) => void;
}

export type PointcloudSlice = PointcloudState & PointcloudActions;

// ============================================================================
// Initial State
// ============================================================================

export const MIN_POINT_BUDGET = 1;
export const MAX_POINT_BUDGET = 50_000_000;

export const initialPointcloudState: PointcloudState = {
  pointclouds: [],
  activePointcloudId: null,
  pointBudget: 2_000_000,
};

// ============================================================================
// Slice Creator
// ============================================================================

export const createPointcloudSlice = (
  set: (fn: (state: PointcloudState) => void) => void,
): PointcloudActions => ({
  addPointcloud: (entry: PointcloudEntry) => {
    set((s) => {
      s.pointclouds = s.pointclouds.filter((p) => p.id !== entry.id);
      s.pointclouds.push(entry);
      if (!s.activePointcloudId) {
        s.activePointcloudId = entry.id;
      }
    });
  },

  updatePointcloud: (id, patch) => {
    set((s) => {
      const pc = s.pointclouds.find((p) => p.id === id);
      if (pc) Object.assign(pc, patch);
    });
  },

  removePointcloud: (id: string) => {
    set((s) => {
      s.pointclouds = s.pointclouds.filter((p) => p.id !== id);
      if (s.activePointcloudId === id) {
        s.activePointcloudId = s.pointclouds.length > 0 ? s.pointclouds[0].id : null;
      }
    });
  },

  setActivePointcloudId: (id: string | null) => {
    set((s) => { s.activePointcloudId = id; });
  },

  setPointcloudVisible: (id: string, visible: boolean) => {
    set((s) => {
      const pc = s.pointclouds.find((p) => p.id === id);
      if (pc) pc.visible = visible;
    });
  },

  updatePointcloudProgress: (id: string, progress: number, phase: string) => {
    set((s) => {
      const pc = s.pointclouds.find((p) => p.id === id);
      if (pc) {
        pc.loadProgress = progress;
        pc.loadPhase = phase;
      }
    });
  },

  setPointBudget: (budget: number) => {
    set((s) => {
      s.pointBudget = Math.max(MIN_POINT_BUDGET, Math.min(MAX_POINT_BUDGET, Math.round(budget)));
    });
  },
});
