/**
 * Snapping Engine Types
 *
 * Types for the 2D scene snapping system.
 */

import type { Point, PointLike } from '../geometry/Point';
import type { Primitive } from '../geometry/primitives';
import type { SnapKind, SnapPoint } from '../geometry/types';

/**
 * Configuration for the snapping engine
 */
export interface SnappingConfig {
    /** Master switch */
    enabled: boolean;
    /** Snap radius in screen units; divided by the zoom for scene queries */
    snapRadius: number;
    /** Kinds of snap points the engine will return */
    activeKinds: readonly SnapKind[];
    /** Grid spacing for grid snapping, in scene units */
    gridSize: number;
}

/**
 * Default snapping configuration
 */
export const DEFAULT_SNAPPING_CONFIG: SnappingConfig = {
    enabled: true,
    snapRadius: 15,
    activeKinds: ['endpoint', 'midpoint', 'center', 'intersection', 'perpendicular', 'tangent'],
    gridSize: 10,
};

export interface SnapQueryOptions {
    /** Primitive to ignore, usually the one being edited */
    exclude?: Primitive | null;
    /** Start of the construction in progress; enables perpendicular and tangent snaps */
    referencePoint?: PointLike | null;
}

/**
 * Result from a screen-space snap query
 */
export interface SnapResult {
    point: SnapPoint;
    /** Scene-space distance from the cursor to the snap point */
    distance: number;
    /** Where the snap point sits on screen */
    screen: Point;
}
