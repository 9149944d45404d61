import { Point, type PointLike } from '../Point';
import { circumcircle, distance } from '../math';
import { ID } from '../../utils/id-generator';
import {
    DEFAULT_STYLE,
    type BoundingBox,
    type ControlPoint,
    type PrimitiveContract,
    type SnapPoint,
} from '../types';
import type { CircleRecord } from '../../serialization/schemas';
import { coerceRadius } from './coerce';

export class Circle implements PrimitiveContract {
    readonly kind = 'circle';
    readonly id = ID.next('circle');

    private constructor(
        private _center: Point,
        private _radius: number,
        public styleName: string
    ) { }

    static create(center: PointLike, radius: number, styleName = DEFAULT_STYLE): Circle {
        return new Circle(Point.from(center), coerceRadius(radius, 'Circle'), styleName);
    }

    static fromCenterDiameter(center: PointLike, diameter: number, styleName = DEFAULT_STYLE): Circle {
        return Circle.create(center, diameter / 2, styleName);
    }

    /** The two points are the ends of a diameter. */
    static fromTwoPoints(p1: PointLike, p2: PointLike, styleName = DEFAULT_STYLE): Circle {
        const a = Point.from(p1);
        return Circle.create(a.midpoint(p2), a.distanceTo(p2) / 2, styleName);
    }

    /**
     * Circle through three points, or null when they are collinear.
     */
    static fromThreePoints(p1: PointLike, p2: PointLike, p3: PointLike, styleName = DEFAULT_STYLE): Circle | null {
        const circle = circumcircle(p1, p2, p3);
        if (!circle) return null;
        return Circle.create({ x: circle.cx, y: circle.cy }, circle.radius, styleName);
    }

    get center(): Point { return this._center; }
    get radius(): number { return this._radius; }

    get diameter(): number { return this._radius * 2; }
    get circumference(): number { return 2 * Math.PI * this._radius; }
    get area(): number { return Math.PI * this._radius * this._radius; }

    /** Point on the circle at `angle` degrees. */
    pointAtAngle(angle: number): Point {
        return this._center.movePolar(this._radius, angle * Math.PI / 180);
    }

    isPointInside(x: number, y: number): boolean {
        return distance(x, y, this._center.x, this._center.y) <= this._radius;
    }

    toRecord(): CircleRecord {
        return {
            type: 'circle',
            center: this._center.toRecord(),
            radius: this._radius,
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
            { x: this._center.x + this._radius, y: this._center.y, label: 'radius', index: 1 },
        ];
    }

    moveControlPoint(index: number, x: number, y: number): boolean {
        if (index === 0) {
            this._center = new Point(x, y);
            return true;
        }
        if (index === 1) {
            const radius = distance(x, y, this._center.x, this._center.y);
            if (radius === 0) return false;
            this._radius = radius;
            return true;
        }
        return false;
    }

    boundingBox(): BoundingBox {
        return {
            minX: this._center.x - this._radius,
            minY: this._center.y - this._radius,
            maxX: this._center.x + this._radius,
            maxY: this._center.y + this._radius,
        };
    }

    distanceToPoint(x: number, y: number): number {
        return Math.abs(distance(x, y, this._center.x, this._center.y) - this._radius);
    }

    closestPoint(x: number, y: number): Point {
        if (x === this._center.x && y === this._center.y) {
            return this.pointAtAngle(0);
        }
        return this._center.movePolar(this._radius, this._center.angleTo({ x, y }));
    }

    containsPoint(x: number, y: number, tolerance: number): boolean {
        return this.distanceToPoint(x, y) <= tolerance;
    }

    translate(dx: number, dy: number): void {
        this._center = this._center.add({ x: dx, y: dy });
    }
}
