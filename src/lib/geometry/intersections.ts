/**
 * Boundary intersections and reference-point constructions used by the
 * snapping engine.
 *
 * Every primitive is broken into boundary elements (straight pieces, round
 * pieces and whole ellipses) and elements are intersected pairwise.
 */

import type { PointLike } from './Point';
import { EPSILON, distance, toDegrees } from './math';
import type { Arc, Primitive } from './primitives';

export type BoundaryElement =
    | { kind: 'segment'; start: PointLike; end: PointLike }
    | { kind: 'round'; center: PointLike; radius: number; sweep: Arc | null }
    | { kind: 'ellipse'; center: PointLike; radiusX: number; radiusY: number };

const ON_SEGMENT_TOLERANCE = 1e-9;

function polygonEdges(vertices: readonly PointLike[], closed: boolean): BoundaryElement[] {
    const edges: BoundaryElement[] = [];
    const count = closed ? vertices.length : vertices.length - 1;
    for (let i = 0; i < count; i++) {
        edges.push({ kind: 'segment', start: vertices[i], end: vertices[(i + 1) % vertices.length] });
    }
    return edges;
}

export function boundaryOf(primitive: Primitive): BoundaryElement[] {
    switch (primitive.kind) {
        case 'line':
            return [{ kind: 'segment', start: primitive.start, end: primitive.end }];
        case 'circle':
            return [{ kind: 'round', center: primitive.center, radius: primitive.radius, sweep: null }];
        case 'arc':
            return [{ kind: 'round', center: primitive.center, radius: primitive.radius, sweep: primitive }];
        case 'rectangle':
            return polygonEdges(primitive.corners, true);
        case 'polygon':
            return polygonEdges(primitive.vertices, true);
        case 'ellipse':
            return [{ kind: 'ellipse', center: primitive.center, radiusX: primitive.radiusX, radiusY: primitive.radiusY }];
        case 'spline':
            return polygonEdges(primitive.curvePoints(), false);
    }
}

function onSweep(p: PointLike, center: PointLike, sweep: Arc | null): boolean {
    if (!sweep) return true;
    return sweep.containsAngle(toDegrees(Math.atan2(p.y - center.y, p.x - center.x)));
}

function withinUnit(t: number): boolean {
    return t >= -ON_SEGMENT_TOLERANCE && t <= 1 + ON_SEGMENT_TOLERANCE;
}

// Segment-Segment. Parallel and coincident segments give no single point.
export function intersectSegments(a1: PointLike, a2: PointLike, b1: PointLike, b2: PointLike): PointLike[] {
    const dxa = a2.x - a1.x;
    const dya = a2.y - a1.y;
    const dxb = b2.x - b1.x;
    const dyb = b2.y - b1.y;

    const denom = dyb * dxa - dxb * dya;
    if (Math.abs(denom) < EPSILON) return [];

    const ua = (dxb * (a1.y - b1.y) - dyb * (a1.x - b1.x)) / denom;
    const ub = (dxa * (a1.y - b1.y) - dya * (a1.x - b1.x)) / denom;
    if (!withinUnit(ua) || !withinUnit(ub)) return [];

    return [{ x: a1.x + ua * dxa, y: a1.y + ua * dya }];
}

/**
 * Parameters along start→end where the infinite line meets the circle.
 */
function lineCircleParameters(start: PointLike, end: PointLike, center: PointLike, radius: number): number[] {
    const dx = end.x - start.x;
    const dy = end.y - start.y;
    const fx = start.x - center.x;
    const fy = start.y - center.y;

    const a = dx * dx + dy * dy;
    if (a === 0) return [];
    const b = 2 * (fx * dx + fy * dy);
    const c = fx * fx + fy * fy - radius * radius;

    let discriminant = b * b - 4 * a * c;
    if (discriminant < -EPSILON) return [];
    discriminant = Math.max(0, discriminant);

    const sqrtDisc = Math.sqrt(discriminant);
    const t1 = (-b - sqrtDisc) / (2 * a);
    const t2 = (-b + sqrtDisc) / (2 * a);
    return Math.abs(t1 - t2) > EPSILON ? [t1, t2] : [t1];
}

// Segment-Circle / Segment-Arc
export function intersectSegmentRound(
    start: PointLike,
    end: PointLike,
    center: PointLike,
    radius: number,
    sweep: Arc | null = null
): PointLike[] {
    const points: PointLike[] = [];
    for (const t of lineCircleParameters(start, end, center, radius)) {
        if (!withinUnit(t)) continue;
        const p = { x: start.x + t * (end.x - start.x), y: start.y + t * (end.y - start.y) };
        if (onSweep(p, center, sweep)) points.push(p);
    }
    return points;
}

// Segment-Ellipse, solved on the unit circle after scaling the axes.
export function intersectSegmentEllipse(
    start: PointLike,
    end: PointLike,
    center: PointLike,
    radiusX: number,
    radiusY: number
): PointLike[] {
    if (radiusX === 0 || radiusY === 0) return [];
    const s = { x: (start.x - center.x) / radiusX, y: (start.y - center.y) / radiusY };
    const e = { x: (end.x - center.x) / radiusX, y: (end.y - center.y) / radiusY };
    return lineCircleParameters(s, e, { x: 0, y: 0 }, 1)
        .filter(withinUnit)
        .map(t => ({ x: start.x + t * (end.x - start.x), y: start.y + t * (end.y - start.y) }));
}

// Circle-Circle / Circle-Arc / Arc-Arc
export function intersectRounds(
    c1: PointLike,
    r1: number,
    c2: PointLike,
    r2: number,
    sweep1: Arc | null = null,
    sweep2: Arc | null = null
): PointLike[] {
    const d = distance(c1.x, c1.y, c2.x, c2.y);
    if (d < EPSILON) return []; // concentric
    if (d > r1 + r2 + EPSILON || d < Math.abs(r1 - r2) - EPSILON) return [];

    const a = (r1 * r1 - r2 * r2 + d * d) / (2 * d);
    const h = Math.sqrt(Math.max(0, r1 * r1 - a * a));
    const mx = c1.x + a * (c2.x - c1.x) / d;
    const my = c1.y + a * (c2.y - c1.y) / d;
    const ox = h * (c2.y - c1.y) / d;
    const oy = h * (c2.x - c1.x) / d;

    const candidates = h < EPSILON
        ? [{ x: mx, y: my }]
        : [{ x: mx + ox, y: my - oy }, { x: mx - ox, y: my + oy }];

    return candidates.filter(p => onSweep(p, c1, sweep1) && onSweep(p, c2, sweep2));
}

function intersectElements(a: BoundaryElement, b: BoundaryElement): PointLike[] {
    if (a.kind === 'segment') {
        switch (b.kind) {
            case 'segment':
                return intersectSegments(a.start, a.end, b.start, b.end);
            case 'round':
                return intersectSegmentRound(a.start, a.end, b.center, b.radius, b.sweep);
            case 'ellipse':
                return intersectSegmentEllipse(a.start, a.end, b.center, b.radiusX, b.radiusY);
        }
    }
    if (b.kind === 'segment') {
        return intersectElements(b, a);
    }
    if (a.kind === 'round' && b.kind === 'round') {
        return intersectRounds(a.center, a.radius, b.center, b.radius, a.sweep, b.sweep);
    }
    // Ellipse against round or ellipse has no closed form; not offered.
    return [];
}

/**
 * All points where the boundaries of two primitives cross.
 */
export function findIntersections(a: Primitive, b: Primitive): PointLike[] {
    const points: PointLike[] = [];
    for (const ea of boundaryOf(a)) {
        for (const eb of boundaryOf(b)) {
            points.push(...intersectElements(ea, eb));
        }
    }
    return points;
}

/**
 * Foot of the perpendicular from `from` onto the primitive.
 *
 * Segments use their infinite line. Rectangle and polygon sides only count
 * when the foot lands on the side; the nearest such foot wins. Round shapes
 * and ellipses use the closest boundary point, which lies on the normal.
 */
export function findPerpendicular(from: PointLike, primitive: Primitive): PointLike | null {
    switch (primitive.kind) {
        case 'line':
            return primitive.perpendicularFoot(from);
        case 'circle':
        case 'arc':
        case 'ellipse':
            return primitive.closestPoint(from.x, from.y);
        case 'rectangle':
        case 'polygon': {
            let best: PointLike | null = null;
            let bestDistance = Infinity;
            for (const edge of boundaryOf(primitive)) {
                if (edge.kind !== 'segment') continue;
                const foot = footOnSegment(from, edge.start, edge.end);
                if (!foot) continue;
                const d = distance(from.x, from.y, foot.x, foot.y);
                if (d < bestDistance) {
                    bestDistance = d;
                    best = foot;
                }
            }
            return best;
        }
        case 'spline':
            return null;
    }
}

function footOnSegment(p: PointLike, a: PointLike, b: PointLike): PointLike | null {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const lenSq = dx * dx + dy * dy;
    if (lenSq === 0) return null;
    const t = ((p.x - a.x) * dx + (p.y - a.y) * dy) / lenSq;
    if (!withinUnit(t)) return null;
    return { x: a.x + t * dx, y: a.y + t * dy };
}

/**
 * Points where a line from `from` touches the primitive. Nothing when
 * `from` is inside the curve.
 */
export function findTangents(from: PointLike, primitive: Primitive): PointLike[] {
    switch (primitive.kind) {
        case 'circle':
            return tangentsToCircle(from, primitive.center, primitive.radius);
        case 'arc':
            return tangentsToCircle(from, primitive.center, primitive.radius)
                .filter(p => onSweep(p, primitive.center, primitive));
        case 'ellipse': {
            const { center, radiusX, radiusY } = primitive;
            if (radiusX === 0 || radiusY === 0) return [];
            // Tangency survives the affine map onto the unit circle.
            const local = { x: (from.x - center.x) / radiusX, y: (from.y - center.y) / radiusY };
            return tangentsToCircle(local, { x: 0, y: 0 }, 1)
                .map(p => ({ x: center.x + p.x * radiusX, y: center.y + p.y * radiusY }));
        }
        default:
            return [];
    }
}

function tangentsToCircle(from: PointLike, center: PointLike, radius: number): PointLike[] {
    const dx = center.x - from.x;
    const dy = center.y - from.y;
    const d = Math.hypot(dx, dy);
    if (d < radius || d === 0) return [];

    const toCenter = Math.atan2(dy, dx);
    const alpha = Math.acos(radius / d);
    // Tangent points seen from the center, opposite the direction to `from`.
    const back = toCenter + Math.PI;
    return [back + alpha, back - alpha].map(angle => ({
        x: center.x + radius * Math.cos(angle),
        y: center.y + radius * Math.sin(angle),
    }));
}
