import { Point, type PointLike } from '../Point';
import { distance, segmentParameter } from '../math';
import { ID } from '../../utils/id-generator';
import {
    DEFAULT_STYLE,
    type BoundingBox,
    type ControlPoint,
    type PrimitiveContract,
    type SnapPoint,
} from '../types';
import type { LineRecord } from '../../serialization/schemas';

/**
 * Straight segment between two endpoints.
 */
export class Segment implements PrimitiveContract {
    readonly kind = 'line';
    readonly id = ID.next('line');

    private constructor(
        private _start: Point,
        private _end: Point,
        public styleName: string
    ) { }

    static create(start: PointLike, end: PointLike, styleName = DEFAULT_STYLE): Segment {
        return new Segment(Point.from(start), Point.from(end), styleName);
    }

    get start(): Point { return this._start; }
    get end(): Point { return this._end; }

    get dx(): number { return this._end.x - this._start.x; }
    get dy(): number { return this._end.y - this._start.y; }

    get length(): number {
        return this._start.distanceTo(this._end);
    }

    get midpoint(): Point {
        return this._start.midpoint(this._end);
    }

    /** Direction in degrees, in (-180, 180]. */
    get angle(): number {
        return Math.atan2(this.dy, this.dx) * 180 / Math.PI;
    }

    pointAt(t: number): Point {
        return new Point(this._start.x + t * this.dx, this._start.y + t * this.dy);
    }

    /**
     * Foot of the perpendicular from `p` onto the infinite line through the
     * segment. A zero-length segment returns its start.
     */
    perpendicularFoot(p: PointLike): Point {
        const lenSq = this.dx * this.dx + this.dy * this.dy;
        if (lenSq === 0) return this._start;
        const t = ((p.x - this._start.x) * this.dx + (p.y - this._start.y) * this.dy) / lenSq;
        return this.pointAt(t);
    }

    toRecord(): LineRecord {
        return {
            type: 'line',
            start: this._start.toRecord(),
            end: this._end.toRecord(),
            style: this.styleName,
        };
    }

    snapPoints(): SnapPoint[] {
        const mid = this.midpoint;
        return [
            { x: this._start.x, y: this._start.y, kind: 'endpoint', source: this },
            { x: this._end.x, y: this._end.y, kind: 'endpoint', source: this },
            { x: mid.x, y: mid.y, kind: 'midpoint', source: this },
        ];
    }

    controlPoints(): ControlPoint[] {
        const mid = this.midpoint;
        return [
            { x: this._start.x, y: this._start.y, label: 'start', index: 0 },
            { x: this._end.x, y: this._end.y, label: 'end', index: 1 },
            { x: mid.x, y: mid.y, label: 'midpoint', index: 2 },
        ];
    }

    moveControlPoint(index: number, x: number, y: number): boolean {
        switch (index) {
            case 0:
                this._start = new Point(x, y);
                return true;
            case 1:
                this._end = new Point(x, y);
                return true;
            case 2: {
                const mid = this.midpoint;
                this.translate(x - mid.x, y - mid.y);
                return true;
            }
            default:
                return false;
        }
    }

    boundingBox(): BoundingBox {
        return {
            minX: Math.min(this._start.x, this._end.x),
            minY: Math.min(this._start.y, this._end.y),
            maxX: Math.max(this._start.x, this._end.x),
            maxY: Math.max(this._start.y, this._end.y),
        };
    }

    distanceToPoint(x: number, y: number): number {
        const p = this.closestPoint(x, y);
        return distance(x, y, p.x, p.y);
    }

    closestPoint(x: number, y: number): Point {
        return this.pointAt(segmentParameter(x, y, this._start, this._end));
    }

    containsPoint(x: number, y: number, tolerance: number): boolean {
        return this.distanceToPoint(x, y) <= tolerance;
    }

    translate(dx: number, dy: number): void {
        const delta = { x: dx, y: dy };
        this._start = this._start.add(delta);
        this._end = this._end.add(delta);
    }
}
