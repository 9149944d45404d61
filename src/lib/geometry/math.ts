import type { PointLike } from './Point';

export const EPSILON = 1e-9;

/** Below this determinant three points are treated as collinear. */
export const COLLINEAR_EPSILON = 1e-10;

export const TWO_PI = Math.PI * 2;

export function toRadians(degrees: number): number {
    return degrees * Math.PI / 180;
}

export function toDegrees(radians: number): number {
    return radians * 180 / Math.PI;
}

// Normalize angle to [0, 2PI)
export function normalizeRadians(a: number): number {
    const res = a % TWO_PI;
    return res < 0 ? res + TWO_PI : res;
}

// Normalize angle to [0, 360)
export function normalizeDegrees(a: number): number {
    const res = a % 360;
    return res < 0 ? res + 360 : res;
}

/**
 * Maps an angle difference into (-180, 180].
 */
export function normalizeSignedDegrees(a: number): number {
    const res = normalizeDegrees(a);
    return res > 180 ? res - 360 : res;
}

export function distance(x1: number, y1: number, x2: number, y2: number): number {
    return Math.hypot(x2 - x1, y2 - y1);
}

/**
 * Projection parameter of (x, y) onto segment a→b, clamped to [0, 1].
 * A zero-length segment yields 0.
 */
export function segmentParameter(x: number, y: number, a: PointLike, b: PointLike): number {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const lenSq = dx * dx + dy * dy;
    if (lenSq === 0) return 0;
    const t = ((x - a.x) * dx + (y - a.y) * dy) / lenSq;
    return Math.max(0, Math.min(1, t));
}

export function distanceToSegment(x: number, y: number, a: PointLike, b: PointLike): number {
    const t = segmentParameter(x, y, a, b);
    return distance(x, y, a.x + t * (b.x - a.x), a.y + t * (b.y - a.y));
}

/**
 * Distance to a polyline given as consecutive vertices. When `closed`, the
 * last vertex connects back to the first.
 */
export function distanceToPolyline(x: number, y: number, vertices: readonly PointLike[], closed: boolean): number {
    if (vertices.length === 0) return Infinity;
    if (vertices.length === 1) return distance(x, y, vertices[0].x, vertices[0].y);

    let min = Infinity;
    const count = closed ? vertices.length : vertices.length - 1;
    for (let i = 0; i < count; i++) {
        const a = vertices[i];
        const b = vertices[(i + 1) % vertices.length];
        min = Math.min(min, distanceToSegment(x, y, a, b));
    }
    return min;
}

/**
 * Closest point on a polyline, or null for an empty one.
 */
export function closestPointOnPolyline(x: number, y: number, vertices: readonly PointLike[], closed: boolean): PointLike | null {
    if (vertices.length === 0) return null;
    if (vertices.length === 1) return { x: vertices[0].x, y: vertices[0].y };

    let best: PointLike | null = null;
    let bestDistance = Infinity;
    const count = closed ? vertices.length : vertices.length - 1;
    for (let i = 0; i < count; i++) {
        const a = vertices[i];
        const b = vertices[(i + 1) % vertices.length];
        const t = segmentParameter(x, y, a, b);
        const px = a.x + t * (b.x - a.x);
        const py = a.y + t * (b.y - a.y);
        const d = distance(x, y, px, py);
        if (d < bestDistance) {
            bestDistance = d;
            best = { x: px, y: py };
        }
    }
    return best;
}

export interface Circumcircle {
    cx: number;
    cy: number;
    radius: number;
}

/**
 * Circle through three points, from the 2x2 determinant of the
 * perpendicular-bisector system. Returns null for collinear input.
 */
export function circumcircle(p1: PointLike, p2: PointLike, p3: PointLike): Circumcircle | null {
    const d = 2 * (p1.x * (p2.y - p3.y) + p2.x * (p3.y - p1.y) + p3.x * (p1.y - p2.y));
    if (Math.abs(d) < COLLINEAR_EPSILON) return null;

    const p1Sq = p1.x * p1.x + p1.y * p1.y;
    const p2Sq = p2.x * p2.x + p2.y * p2.y;
    const p3Sq = p3.x * p3.x + p3.y * p3.y;

    const cx = (p1Sq * (p2.y - p3.y) + p2Sq * (p3.y - p1.y) + p3Sq * (p1.y - p2.y)) / d;
    const cy = (p1Sq * (p3.x - p2.x) + p2Sq * (p1.x - p3.x) + p3Sq * (p2.x - p1.x)) / d;

    return { cx, cy, radius: distance(cx, cy, p1.x, p1.y) };
}
