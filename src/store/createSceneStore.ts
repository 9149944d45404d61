import { createStore } from 'zustand/vanilla';
import type { SceneState } from './types';
import { createObjectSlice } from './slices/objectSlice';
import { createSnappingSlice } from './slices/snappingSlice';
import { createSelectionSlice } from './slices/selectionSlice';
import { buildHydratedPatch, type SceneStateFixture } from './hydration';

export * from './types';
export type { SceneStateFixture } from './hydration';

/**
 * One store per open document.
 */
export const createSceneStore = (initialState?: SceneStateFixture) => createStore<SceneState>((...a) => {
    const baseState = {
        ...createObjectSlice(...a),
        ...createSnappingSlice(...a),
        ...createSelectionSlice(...a),
    };

    if (!initialState) return baseState;

    return {
        ...baseState,
        ...buildHydratedPatch(initialState),
    };
});

export type SceneStore = ReturnType<typeof createSceneStore>;
