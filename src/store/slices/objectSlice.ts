import type { StateCreator } from 'zustand';
import { unionBounds, type BoundingBox } from '../../lib/geometry/types';
import { ID } from '../../lib/utils/id-generator';
import { logger } from '../../lib/utils/Logger';
import type { SceneState, ObjectSlice } from '../types';

export const createObjectSlice: StateCreator<
    SceneState,
    [],
    [],
    ObjectSlice
> = (set, get) => ({
    objects: [],

    getObject: (id) => get().objects.find(o => o.id === id),

    addObject: (primitive) => {
        ID.reseed([primitive.id]);
        set(state => ({ objects: [...state.objects, primitive] }));
    },

    removeObject: (id) => {
        const { objects, hoveredId, selectedId, activeSnap } = get();
        if (!objects.some(o => o.id === id)) return false;

        set({
            objects: objects.filter(o => o.id !== id),
            hoveredId: hoveredId === id ? null : hoveredId,
            selectedId: selectedId === id ? null : selectedId,
            activeSnap: activeSnap?.source?.id === id ? null : activeSnap,
        });
        return true;
    },

    clearObjects: () => {
        set({ objects: [], hoveredId: null, selectedId: null, activeSnap: null });
    },

    replaceObjects: (objects) => {
        ID.reseed(objects.map(o => o.id));
        set({ objects: [...objects], hoveredId: null, selectedId: null, activeSnap: null });
    },

    moveControlPoint: (id, index, x, y) => {
        const target = get().getObject(id);
        if (!target) {
            logger.warn(`[SceneStore] moveControlPoint: no object ${id}`);
            return false;
        }
        if (!target.moveControlPoint(index, x, y)) return false;

        // Primitives mutate in place; a new array tells subscribers to redraw.
        set(state => ({ objects: [...state.objects] }));
        return true;
    },

    sceneBounds: () => {
        let bounds: BoundingBox | null = null;
        for (const object of get().objects) {
            const box = object.boundingBox();
            bounds = bounds ? unionBounds(bounds, box) : box;
        }
        return bounds;
    },
});
