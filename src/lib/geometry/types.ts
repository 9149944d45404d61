/**
 * Primitive Contract Types
 *
 * Shared shapes for the 2D primitive kernel.
 */

import type { Primitive } from './primitives';
import type { PrimitiveRecord } from '../serialization/schemas';

/**
 * Kinds of snap points a primitive or the snapping engine can emit
 */
export type SnapKind =
    | 'endpoint'       // End of a segment, arc or open spline
    | 'midpoint'       // Middle of a segment, side or arc
    | 'center'         // Center of a circle, arc, ellipse, rectangle or polygon
    | 'quadrant'       // 0/90/180/270 degree points of round shapes
    | 'node'           // Spline control point
    | 'intersection'   // Where two boundaries cross
    | 'perpendicular'  // Foot of the perpendicular from a reference point
    | 'tangent'        // Tangency point from a reference point
    | 'nearest'        // Closest boundary point
    | 'grid';          // Grid crossing

export const SNAP_KINDS: readonly SnapKind[] = [
    'endpoint',
    'midpoint',
    'center',
    'quadrant',
    'node',
    'intersection',
    'perpendicular',
    'tangent',
    'nearest',
    'grid',
];

export function isSnapKind(value: string): value is SnapKind {
    return SNAP_KINDS.some(kind => kind === value);
}

/**
 * A candidate anchor in scene space
 */
export interface SnapPoint {
    x: number;
    y: number;
    kind: SnapKind;
    /** Emitting primitive; absent for grid snaps */
    source?: Primitive;
}

/**
 * An editable handle. `index` is what `moveControlPoint` expects back.
 */
export interface ControlPoint {
    x: number;
    y: number;
    label: string;
    index: number;
}

export interface BoundingBox {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export type PrimitiveKind =
    | 'line'
    | 'circle'
    | 'arc'
    | 'rectangle'
    | 'ellipse'
    | 'polygon'
    | 'spline';

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
    'line',
    'circle',
    'arc',
    'rectangle',
    'ellipse',
    'polygon',
    'spline',
];

export function isPrimitiveKind(value: string): value is PrimitiveKind {
    return PRIMITIVE_KINDS.some(kind => kind === value);
}

export const DEFAULT_STYLE = 'solid-primary';

/**
 * Capabilities every primitive variant provides.
 */
export interface PrimitiveContract {
    readonly kind: PrimitiveKind;
    readonly id: string;
    styleName: string;

    toRecord(): PrimitiveRecord;
    snapPoints(): SnapPoint[];
    controlPoints(): ControlPoint[];
    /** Returns false and leaves the primitive untouched for an unknown index or a degenerate result. */
    moveControlPoint(index: number, x: number, y: number): boolean;
    boundingBox(): BoundingBox;
    /** Distance to the boundary, not to the enclosed area. */
    distanceToPoint(x: number, y: number): number;
    closestPoint(x: number, y: number): { x: number; y: number };
    containsPoint(x: number, y: number, tolerance: number): boolean;
    translate(dx: number, dy: number): void;
}

export function boundsOfPoints(points: readonly { x: number; y: number }[]): BoundingBox {
    let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
    for (const p of points) {
        if (p.x < minX) minX = p.x;
        if (p.y < minY) minY = p.y;
        if (p.x > maxX) maxX = p.x;
        if (p.y > maxY) maxY = p.y;
    }
    return { minX, minY, maxX, maxY };
}

export function unionBounds(a: BoundingBox, b: BoundingBox): BoundingBox {
    return {
        minX: Math.min(a.minX, b.minX),
        minY: Math.min(a.minY, b.minY),
        maxX: Math.max(a.maxX, b.maxX),
        maxY: Math.max(a.maxY, b.maxY),
    };
}
