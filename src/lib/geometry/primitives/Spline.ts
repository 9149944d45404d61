import { Point, type PointLike } from '../Point';
import { closestPointOnPolyline, distanceToPolyline } from '../math';
import { ID } from '../../utils/id-generator';
import {
    DEFAULT_STYLE,
    boundsOfPoints,
    type BoundingBox,
    type ControlPoint,
    type PrimitiveContract,
    type SnapPoint,
} from '../types';
import type { SplineRecord } from '../../serialization/schemas';

export const DEFAULT_SEGMENTS_PER_SPAN = 20;

export interface SplineOptions {
    closed?: boolean;
    styleName?: string;
}

function hermite(p0: Point, p1: Point, m0: Point, m1: Point, t: number): Point {
    const t2 = t * t;
    const t3 = t2 * t;
    const h00 = 2 * t3 - 3 * t2 + 1;
    const h10 = t3 - 2 * t2 + t;
    const h01 = -2 * t3 + 3 * t2;
    const h11 = t3 - t2;
    return new Point(
        h00 * p0.x + h10 * m0.x + h01 * p1.x + h11 * m1.x,
        h00 * p0.y + h10 * m0.y + h01 * p1.y + h11 * m1.y
    );
}

/**
 * Interpolating spline through its control points: cubic Hermite spans with
 * Catmull-Rom tangents. The tessellation is cached until the next
 * control-point mutation.
 */
export class Spline implements PrimitiveContract {
    readonly kind = 'spline';
    readonly id = ID.next('spline');

    private cache: { segments: number; points: Point[] } | null = null;

    private constructor(
        private _points: Point[],
        private _closed: boolean,
        public styleName: string
    ) { }

    /** Null for fewer than two control points. */
    static create(points: readonly PointLike[], options: SplineOptions = {}): Spline | null {
        if (points.length < 2) return null;
        const { closed = false, styleName = DEFAULT_STYLE } = options;
        return new Spline(points.map(p => Point.from(p)), closed, styleName);
    }

    get closed(): boolean { return this._closed; }

    get points(): readonly Point[] {
        return this._points;
    }

    get numPoints(): number {
        return this._points.length;
    }

    /** Appends, or inserts before `index`. */
    addPoint(point: PointLike, index?: number): void {
        if (index === undefined) {
            this._points.push(Point.from(point));
        } else {
            this._points.splice(index, 0, Point.from(point));
        }
        this.invalidate();
    }

    /** Refuses to go below two control points. */
    removePoint(index: number): boolean {
        if (this._points.length <= 2) return false;
        if (!this.isValidIndex(index)) return false;
        this._points.splice(index, 1);
        this.invalidate();
        return true;
    }

    movePoint(index: number, x: number, y: number): boolean {
        if (!this.isValidIndex(index)) return false;
        this._points[index] = new Point(x, y);
        this.invalidate();
        return true;
    }

    /**
     * Tessellation with `segmentsPerSpan` points per span. Open splines end on
     * their last control point; closed ones repeat the first curve point.
     */
    curvePoints(segmentsPerSpan = DEFAULT_SEGMENTS_PER_SPAN): readonly Point[] {
        const segments = Math.max(1, Math.floor(segmentsPerSpan));
        if (this.cache && this.cache.segments === segments) {
            return this.cache.points;
        }

        const points = this._points;
        const n = points.length;
        const spans = this._closed ? n : n - 1;
        const result: Point[] = [];

        for (let i = 0; i < spans; i++) {
            const p0 = points[i];
            const p1 = points[(i + 1) % n];

            const m0 = i === 0 && !this._closed
                ? p1.sub(p0).scale(0.5)
                : p1.sub(points[(i - 1 + n) % n]).scale(0.5);

            const m1 = i === n - 2 && !this._closed
                ? p1.sub(p0).scale(0.5)
                : points[(i + 2) % n].sub(p0).scale(0.5);

            for (let j = 0; j < segments; j++) {
                result.push(hermite(p0, p1, m0, m1, j / segments));
            }
        }

        result.push(this._closed ? result[0] : points[n - 1]);

        this.cache = { segments, points: result };
        return result;
    }

    get approximateLength(): number {
        const curve = this.curvePoints();
        let length = 0;
        for (let i = 1; i < curve.length; i++) {
            length += curve[i - 1].distanceTo(curve[i]);
        }
        return length;
    }

    toRecord(): SplineRecord {
        return {
            type: 'spline',
            control_points: this._points.map(p => p.toRecord()),
            closed: this._closed,
            style: this.styleName,
        };
    }

    snapPoints(): SnapPoint[] {
        const result: SnapPoint[] = this._points.map((p): SnapPoint => ({ x: p.x, y: p.y, kind: 'node', source: this }));
        if (!this._closed) {
            const first = this._points[0];
            const last = this._points[this._points.length - 1];
            result.push({ x: first.x, y: first.y, kind: 'endpoint', source: this });
            result.push({ x: last.x, y: last.y, kind: 'endpoint', source: this });
        }
        return result;
    }

    controlPoints(): ControlPoint[] {
        return this._points.map((p, index) => ({
            x: p.x,
            y: p.y,
            label: `point ${index + 1}`,
            index,
        }));
    }

    moveControlPoint(index: number, x: number, y: number): boolean {
        return this.movePoint(index, x, y);
    }

    boundingBox(): BoundingBox {
        return boundsOfPoints(this.curvePoints());
    }

    distanceToPoint(x: number, y: number): number {
        return distanceToPolyline(x, y, this.curvePoints(), false);
    }

    closestPoint(x: number, y: number): Point {
        const p = closestPointOnPolyline(x, y, this.curvePoints(), false);
        return p ? Point.from(p) : this._points[0];
    }

    containsPoint(x: number, y: number, tolerance: number): boolean {
        return this.distanceToPoint(x, y) <= tolerance;
    }

    translate(dx: number, dy: number): void {
        const delta = { x: dx, y: dy };
        this._points = this._points.map(p => p.add(delta));
        this.invalidate();
    }

    private isValidIndex(index: number): boolean {
        return Number.isInteger(index) && index >= 0 && index < this._points.length;
    }

    private invalidate(): void {
        this.cache = null;
    }
}
