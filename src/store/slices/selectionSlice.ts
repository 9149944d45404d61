import type { StateCreator } from 'zustand';
import { HitTester } from '../../lib/selection/HitTester';
import type { SceneState, SelectionSlice } from '../types';

export const createSelectionSlice: StateCreator<
    SceneState,
    [],
    [],
    SelectionSlice
> = (set, get) => ({
    hitTester: new HitTester(),
    hoveredId: null,
    selectedId: null,

    updateHover: (x, y, tolerance) => {
        const { hitTester, objects } = get();
        const hit = hitTester.hitTest(x, y, objects, tolerance);
        const hoveredId = hit ? hit.primitive.id : null;
        if (hoveredId === get().hoveredId) return false;
        set({ hoveredId });
        return true;
    },

    updateSelection: (x, y, tolerance) => {
        const { hitTester, objects } = get();
        const hit = hitTester.hitTest(x, y, objects, tolerance);
        const selectedId = hit ? hit.primitive.id : null;
        if (selectedId === get().selectedId) return false;
        set({ selectedId });
        return true;
    },

    clearHover: () => set({ hoveredId: null }),

    clearSelection: () => set({ selectedId: null }),

    deleteAt: (x, y, tolerance) => {
        const { hitTester, objects } = get();
        const hit = hitTester.hitTest(x, y, objects, tolerance);
        if (!hit) return null;
        get().removeObject(hit.primitive.id);
        return hit.primitive;
    },
});
