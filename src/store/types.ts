import type { Primitive } from '../lib/geometry/primitives';
import type { BoundingBox, SnapPoint } from '../lib/geometry/types';
import type { SnapQueryOptions, SnappingEngine } from '../lib/snapping';
import type { HitTester } from '../lib/selection/HitTester';

export interface ObjectSlice {
    objects: Primitive[];

    getObject: (id: string) => Primitive | undefined;
    addObject: (primitive: Primitive) => void;
    /** Returns false when no object has this id. */
    removeObject: (id: string) => boolean;
    clearObjects: () => void;
    replaceObjects: (objects: Primitive[]) => void;
    moveControlPoint: (id: string, index: number, x: number, y: number) => boolean;
    /** Union of every object's bounds, null for an empty scene. */
    sceneBounds: () => BoundingBox | null;
}

export interface SnappingSlice {
    snappingEngine: SnappingEngine;
    activeSnap: SnapPoint | null;
    snappingEnabled: boolean;

    /** Re-runs the snap query at the cursor and stores the result. */
    updateSnap: (x: number, y: number, tolerance: number, query?: SnapQueryOptions) => SnapPoint | null;
    clearSnap: () => void;
    toggleSnapping: () => void;
}

export interface SelectionSlice {
    hitTester: HitTester;
    hoveredId: string | null;
    selectedId: string | null;

    /** Both return whether the target changed, so callers know when to redraw. */
    updateHover: (x: number, y: number, tolerance: number) => boolean;
    updateSelection: (x: number, y: number, tolerance: number) => boolean;
    clearHover: () => void;
    clearSelection: () => void;
    /** Removes the object under the cursor. */
    deleteAt: (x: number, y: number, tolerance: number) => Primitive | null;
}

export type SceneState = ObjectSlice & SnappingSlice & SelectionSlice;
