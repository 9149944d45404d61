import type { StateCreator } from 'zustand';
import { SnappingEngine } from '../../lib/snapping';
import type { SceneState, SnappingSlice } from '../types';

export const createSnappingSlice: StateCreator<
    SceneState,
    [],
    [],
    SnappingSlice
> = (set, get) => ({
    snappingEngine: new SnappingEngine(),
    activeSnap: null,
    snappingEnabled: true,

    updateSnap: (x, y, tolerance, query = {}) => {
        const { snappingEngine, objects } = get();
        const activeSnap = snappingEngine.findSnap(x, y, objects, tolerance, query);
        set({ activeSnap });
        return activeSnap;
    },

    clearSnap: () => set({ activeSnap: null }),

    toggleSnapping: () => {
        const { snappingEngine, snappingEnabled } = get();
        snappingEngine.setEnabled(!snappingEnabled);
        set({ snappingEnabled: !snappingEnabled, activeSnap: null });
    },
});
