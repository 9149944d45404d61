import { Point, type PointLike } from '../Point';
import {
    EPSILON,
    circumcircle,
    distance,
    normalizeDegrees,
    normalizeRadians,
    normalizeSignedDegrees,
    toDegrees,
    toRadians,
} from '../math';
import { ID } from '../../utils/id-generator';
import { logger } from '../../utils/Logger';
import {
    DEFAULT_STYLE,
    boundsOfPoints,
    type BoundingBox,
    type ControlPoint,
    type PrimitiveContract,
    type SnapPoint,
} from '../types';
import type { ArcRecord } from '../../serialization/schemas';
import { coerceRadius } from './coerce';

const ANGLE_EPSILON = 1e-9;

export interface ArcAngleOptions {
    /**
     * Take the shorter way round, giving a span in (-180, 180].
     * Otherwise the arc runs counter-clockwise and a zero span is a full circle.
     */
    shortestPath?: boolean;
    styleName?: string;
}

/**
 * Circular arc. Angles are in degrees; a negative span runs clockwise.
 */
export class Arc implements PrimitiveContract {
    readonly kind = 'arc';
    readonly id = ID.next('arc');

    private constructor(
        private _center: Point,
        private _radius: number,
        private _startAngle: number,
        private _spanAngle: number,
        public styleName: string
    ) { }

    static create(center: PointLike, radius: number, startAngle: number, spanAngle: number, styleName = DEFAULT_STYLE): Arc {
        let span = spanAngle;
        if (Math.abs(span) > 360) {
            logger.warn(`[Arc] span ${spanAngle} clamped to ${Math.sign(span) * 360}`);
            span = Math.sign(span) * 360;
        }
        return new Arc(Point.from(center), coerceRadius(radius, 'Arc'), startAngle, span, styleName);
    }

    static fromCenterAndAngles(
        center: PointLike,
        radius: number,
        startAngle: number,
        endAngle: number,
        options: ArcAngleOptions = {}
    ): Arc {
        const { shortestPath = false, styleName = DEFAULT_STYLE } = options;
        let span: number;
        if (shortestPath) {
            span = normalizeSignedDegrees(endAngle - startAngle);
        } else {
            span = normalizeDegrees(endAngle - startAngle);
            if (span === 0) span = 360;
        }
        return Arc.create(center, radius, startAngle, span, styleName);
    }

    /**
     * Arc from `start` through `onArc` to `end`. The direction is whichever
     * way round passes `onArc` before reaching `end`; a point exactly at the
     * end angle counts as counter-clockwise. Null when the points are
     * collinear.
     */
    static fromThreePoints(start: PointLike, onArc: PointLike, end: PointLike, styleName = DEFAULT_STYLE): Arc | null {
        const circle = circumcircle(start, onArc, end);
        if (!circle) return null;
        const { cx, cy, radius } = circle;

        const aStart = normalizeRadians(Math.atan2(start.y - cy, start.x - cx));
        const aMid = normalizeRadians(Math.atan2(onArc.y - cy, onArc.x - cx));
        const aEnd = normalizeRadians(Math.atan2(end.y - cy, end.x - cx));

        const spanCcw = normalizeRadians(aEnd - aStart);
        const midCcw = normalizeRadians(aMid - aStart);

        const span = midCcw <= spanCcw ? spanCcw : -(2 * Math.PI - spanCcw);

        return Arc.create({ x: cx, y: cy }, radius, toDegrees(aStart), toDegrees(span), styleName);
    }

    get center(): Point { return this._center; }
    get radius(): number { return this._radius; }
    get startAngle(): number { return this._startAngle; }
    get spanAngle(): number { return this._spanAngle; }

    get endAngle(): number {
        return this._startAngle + this._spanAngle;
    }

    get startPoint(): Point {
        return this.pointAtAngle(this._startAngle);
    }

    get endPoint(): Point {
        return this.pointAtAngle(this.endAngle);
    }

    get midPoint(): Point {
        return this.pointAtAngle(this._startAngle + this._spanAngle / 2);
    }

    get arcLength(): number {
        return this._radius * toRadians(Math.abs(this._spanAngle));
    }

    pointAtAngle(angle: number): Point {
        return this._center.movePolar(this._radius, toRadians(angle));
    }

    /**
     * Whether the direction `angle` (degrees) falls within the sweep,
     * endpoints included.
     */
    containsAngle(angle: number): boolean {
        if (Math.abs(this._spanAngle) >= 360) return true;
        const offset = normalizeDegrees(angle - this._startAngle);
        if (offset <= ANGLE_EPSILON || offset >= 360 - ANGLE_EPSILON) return true;
        if (this._spanAngle >= 0) {
            return offset <= this._spanAngle + ANGLE_EPSILON;
        }
        return offset >= 360 + this._spanAngle - ANGLE_EPSILON;
    }

    /** Polyline of `segments + 1` points from start to end. */
    curvePoints(segments = 32): Point[] {
        const count = Math.max(1, Math.floor(segments));
        const points: Point[] = [];
        for (let i = 0; i <= count; i++) {
            points.push(this.pointAtAngle(this._startAngle + this._spanAngle * i / count));
        }
        return points;
    }

    toRecord(): ArcRecord {
        return {
            type: 'arc',
            center: this._center.toRecord(),
            radius: this._radius,
            start_angle: this._startAngle,
            span_angle: this._spanAngle,
            style: this.styleName,
        };
    }

    snapPoints(): SnapPoint[] {
        const start = this.startPoint;
        const end = this.endPoint;
        const mid = this.midPoint;
        const points: SnapPoint[] = [
            { x: this._center.x, y: this._center.y, kind: 'center', source: this },
            { x: start.x, y: start.y, kind: 'endpoint', source: this },
            { x: end.x, y: end.y, kind: 'endpoint', source: this },
            { x: mid.x, y: mid.y, kind: 'midpoint', source: this },
        ];
        for (const p of this.quadrantPoints()) {
            points.push({ x: p.x, y: p.y, kind: 'quadrant', source: this });
        }
        return points;
    }

    controlPoints(): ControlPoint[] {
        const start = this.startPoint;
        const end = this.endPoint;
        const mid = this.midPoint;
        return [
            { x: this._center.x, y: this._center.y, label: 'center', index: 0 },
            { x: start.x, y: start.y, label: 'start', index: 1 },
            { x: end.x, y: end.y, label: 'end', index: 2 },
            { x: mid.x, y: mid.y, label: 'radius', index: 3 },
        ];
    }

    /**
     * Moving an endpoint keeps the other endpoint and the sweep direction.
     */
    moveControlPoint(index: number, x: number, y: number): boolean {
        switch (index) {
            case 0:
                this._center = new Point(x, y);
                return true;
            case 1: {
                const angle = this.angleOf(x, y);
                const end = this.endAngle;
                const span = this._spanAngle >= 0
                    ? normalizeDegrees(end - angle)
                    : -normalizeDegrees(angle - end);
                if (Math.abs(span) < EPSILON) return false;
                this._startAngle = angle;
                this._spanAngle = span;
                return true;
            }
            case 2: {
                const angle = this.angleOf(x, y);
                const span = this._spanAngle >= 0
                    ? normalizeDegrees(angle - this._startAngle)
                    : -normalizeDegrees(this._startAngle - angle);
                if (Math.abs(span) < EPSILON) return false;
                this._spanAngle = span;
                return true;
            }
            case 3: {
                const radius = distance(x, y, this._center.x, this._center.y);
                if (radius === 0) return false;
                this._radius = radius;
                return true;
            }
            default:
                return false;
        }
    }

    boundingBox(): BoundingBox {
        return boundsOfPoints([this.startPoint, this.endPoint, ...this.quadrantPoints()]);
    }

    distanceToPoint(x: number, y: number): number {
        const p = this.closestPoint(x, y);
        return distance(x, y, p.x, p.y);
    }

    /**
     * Radial projection when the point faces the sweep, otherwise the
     * nearer endpoint.
     */
    closestPoint(x: number, y: number): Point {
        const angle = this.angleOf(x, y);
        if (this.containsAngle(angle)) {
            return this.pointAtAngle(angle);
        }
        const start = this.startPoint;
        const end = this.endPoint;
        return start.distanceTo({ x, y }) <= end.distanceTo({ x, y }) ? start : end;
    }

    containsPoint(x: number, y: number, tolerance: number): boolean {
        return this.distanceToPoint(x, y) <= tolerance;
    }

    translate(dx: number, dy: number): void {
        this._center = this._center.add({ x: dx, y: dy });
    }

    private angleOf(x: number, y: number): number {
        return toDegrees(Math.atan2(y - this._center.y, x - this._center.x));
    }

    private quadrantPoints(): Point[] {
        return [0, 90, 180, 270]
            .filter(angle => this.containsAngle(angle))
            .map(angle => this.pointAtAngle(angle));
    }
}
