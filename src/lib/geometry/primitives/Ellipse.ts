import { Point, type PointLike } from '../Point';
import { distance, segmentParameter, toRadians } from '../math';
import { ID } from '../../utils/id-generator';
import {
    DEFAULT_STYLE,
    type BoundingBox,
    type ControlPoint,
    type PrimitiveContract,
    type SnapPoint,
} from '../types';
import type { EllipseRecord } from '../../serialization/schemas';
import { coerceRadius } from './coerce';

// Enough halvings to exhaust double precision on any bracket.
const MAX_BISECTIONS = 1100;

/**
 * Root of F(s) = (r0·z0/(s + r0))² + (z1/(s + 1))² − 1 on its bracket.
 * F is strictly decreasing there, so bisection always converges.
 */
function getRoot(r0: number, z0: number, z1: number, g: number): number {
    const n0 = r0 * z0;
    let s0 = z1 - 1;
    let s1 = g < 0 ? 0 : Math.hypot(n0, z1) - 1;
    let s = 0;
    for (let i = 0; i < MAX_BISECTIONS; i++) {
        s = (s0 + s1) / 2;
        if (s === s0 || s === s1) break;
        const ratio0 = n0 / (s + r0);
        const ratio1 = z1 / (s + 1);
        const value = ratio0 * ratio0 + ratio1 * ratio1 - 1;
        if (value > 0) {
            s0 = s;
        } else if (value < 0) {
            s1 = s;
        } else {
            break;
        }
    }
    return s;
}

/**
 * Closest point on the first-quadrant arc of an ellipse with semi-axes
 * e0 >= e1 > 0 to the query (y0, y1), y0 >= 0, y1 >= 0.
 */
function closestInFirstQuadrant(e0: number, e1: number, y0: number, y1: number): [number, number] {
    if (y1 > 0) {
        if (y0 > 0) {
            const z0 = y0 / e0;
            const z1 = y1 / e1;
            const g = z0 * z0 + z1 * z1 - 1;
            if (g === 0) return [y0, y1];
            const r0 = (e0 / e1) * (e0 / e1);
            const s = getRoot(r0, z0, z1, g);
            return [r0 * y0 / (s + r0), y1 / (s + 1)];
        }
        return [0, e1];
    }

    const numer0 = e0 * y0;
    const denom0 = e0 * e0 - e1 * e1;
    if (numer0 < denom0) {
        const xde0 = numer0 / denom0;
        return [e0 * xde0, e1 * Math.sqrt(1 - xde0 * xde0)];
    }
    return [e0, 0];
}

/**
 * Axis-aligned ellipse.
 */
export class Ellipse implements PrimitiveContract {
    readonly kind = 'ellipse';
    readonly id = ID.next('ellipse');

    private constructor(
        private _center: Point,
        private _radiusX: number,
        private _radiusY: number,
        public styleName: string
    ) { }

    static create(center: PointLike, radiusX: number, radiusY: number, styleName = DEFAULT_STYLE): Ellipse {
        return new Ellipse(
            Point.from(center),
            coerceRadius(radiusX, 'Ellipse', 'radius x'),
            coerceRadius(radiusY, 'Ellipse', 'radius y'),
            styleName
        );
    }

    /** Radii come from the horizontal offset of `axisX` and the vertical offset of `axisY`. */
    static fromCenterAndAxisPoints(center: PointLike, axisX: PointLike, axisY: PointLike, styleName = DEFAULT_STYLE): Ellipse {
        return Ellipse.create(center, Math.abs(axisX.x - center.x), Math.abs(axisY.y - center.y), styleName);
    }

    /** Ellipse inscribed in the rectangle spanned by two opposite corners. */
    static fromBoundingRectangle(p1: PointLike, p2: PointLike, styleName = DEFAULT_STYLE): Ellipse {
        return Ellipse.create(
            Point.from(p1).midpoint(p2),
            Math.abs(p2.x - p1.x) / 2,
            Math.abs(p2.y - p1.y) / 2,
            styleName
        );
    }

    get center(): Point { return this._center; }
    get radiusX(): number { return this._radiusX; }
    get radiusY(): number { return this._radiusY; }

    get majorRadius(): number { return Math.max(this._radiusX, this._radiusY); }
    get minorRadius(): number { return Math.min(this._radiusX, this._radiusY); }

    get eccentricity(): number {
        const a = this.majorRadius;
        if (a === 0) return 0;
        const ratio = this.minorRadius / a;
        return Math.sqrt(1 - ratio * ratio);
    }

    get area(): number {
        return Math.PI * this._radiusX * this._radiusY;
    }

    /** Ramanujan's approximation. */
    get circumference(): number {
        const a = this._radiusX;
        const b = this._radiusY;
        return Math.PI * (3 * (a + b) - Math.sqrt((3 * a + b) * (a + 3 * b)));
    }

    /** Point for the parametric angle `angle` in degrees. */
    pointAtAngle(angle: number): Point {
        const t = toRadians(angle);
        return new Point(
            this._center.x + this._radiusX * Math.cos(t),
            this._center.y + this._radiusY * Math.sin(t)
        );
    }

    isPointInside(x: number, y: number): boolean {
        if (this._radiusX === 0 || this._radiusY === 0) return false;
        const nx = (x - this._center.x) / this._radiusX;
        const ny = (y - this._center.y) / this._radiusY;
        return nx * nx + ny * ny <= 1;
    }

    toRecord(): EllipseRecord {
        return {
            type: 'ellipse',
            center: this._center.toRecord(),
            radius_x: this._radiusX,
            radius_y: this._radiusY,
            style: this.styleName,
        };
    }

    snapPoints(): SnapPoint[] {
        const points: SnapPoint[] = [
            { x: this._center.x, y: this._center.y, kind: 'center', source: this },
        ];
        for (const angle of [0, 90, 180, 270]) {
            const p = this.pointAtAngle(angle);
            points.push({ x: p.x, y: p.y, kind: 'quadrant', source: this });
        }
        return points;
    }

    controlPoints(): ControlPoint[] {
        return [
            { x: this._center.x, y: this._center.y, label: 'center', index: 0 },
            { x: this._center.x + this._radiusX, y: this._center.y, label: 'axis x', index: 1 },
            { x: this._center.x, y: this._center.y + this._radiusY, label: 'axis y', index: 2 },
        ];
    }

    moveControlPoint(index: number, x: number, y: number): boolean {
        switch (index) {
            case 0:
                this._center = new Point(x, y);
                return true;
            case 1: {
                const radius = Math.abs(x - this._center.x);
                if (radius === 0) return false;
                this._radiusX = radius;
                return true;
            }
            case 2: {
                const radius = Math.abs(y - this._center.y);
                if (radius === 0) return false;
                this._radiusY = radius;
                return true;
            }
            default:
                return false;
        }
    }

    boundingBox(): BoundingBox {
        return {
            minX: this._center.x - this._radiusX,
            minY: this._center.y - this._radiusY,
            maxX: this._center.x + this._radiusX,
            maxY: this._center.y + this._radiusY,
        };
    }

    distanceToPoint(x: number, y: number): number {
        const p = this.closestPoint(x, y);
        return distance(x, y, p.x, p.y);
    }

    /**
     * Solved in the first quadrant with the larger semi-axis first, then
     * mirrored back. A zero radius collapses the ellipse to a segment or
     * its center.
     */
    closestPoint(x: number, y: number): Point {
        const cx = this._center.x;
        const cy = this._center.y;
        const rx = this._radiusX;
        const ry = this._radiusY;

        if (rx === 0 || ry === 0) {
            const a = { x: cx - rx, y: cy - ry };
            const b = { x: cx + rx, y: cy + ry };
            const t = segmentParameter(x, y, a, b);
            return new Point(a.x + t * (b.x - a.x), a.y + t * (b.y - a.y));
        }

        const dx = x - cx;
        const dy = y - cy;
        const swap = ry > rx;
        const e0 = swap ? ry : rx;
        const e1 = swap ? rx : ry;
        const y0 = Math.abs(swap ? dy : dx);
        const y1 = Math.abs(swap ? dx : dy);

        const [q0, q1] = closestInFirstQuadrant(e0, e1, y0, y1);
        const px = swap ? q1 : q0;
        const py = swap ? q0 : q1;

        return new Point(
            cx + (dx < 0 ? -px : px),
            cy + (dy < 0 ? -py : py)
        );
    }

    containsPoint(x: number, y: number, tolerance: number): boolean {
        return this.distanceToPoint(x, y) <= tolerance;
    }

    translate(dx: number, dy: number): void {
        this._center = this._center.add({ x: dx, y: dy });
    }
}
