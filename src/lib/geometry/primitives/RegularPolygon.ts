import { Point, type PointLike } from '../Point';
import { closestPointOnPolyline, distanceToPolyline, toDegrees, toRadians } from '../math';
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
import type { PolygonRecord, PolygonType } from '../../serialization/schemas';
import { coerceRadius } from './coerce';

/**
 * `inscribed`: `radius` is the distance to each vertex.
 * `circumscribed`: `radius` is the apothem, the distance to each side.
 */
export type PolygonVariant = PolygonType;

export interface RegularPolygonOptions {
    numSides?: number;
    variant?: PolygonVariant;
    /** Direction of the first vertex, in degrees. */
    rotation?: number;
    styleName?: string;
}

function coerceSides(numSides: number): number {
    const sides = Number.isFinite(numSides) ? Math.max(3, Math.floor(numSides)) : 3;
    if (sides !== numSides) {
        logger.warn(`[RegularPolygon] side count ${numSides} coerced to ${sides}`);
    }
    return sides;
}

export class RegularPolygon implements PrimitiveContract {
    readonly kind = 'polygon';
    readonly id = ID.next('polygon');

    private constructor(
        private _center: Point,
        private _radius: number,
        private readonly _numSides: number,
        private readonly _variant: PolygonVariant,
        private _rotation: number,
        public styleName: string
    ) { }

    static create(center: PointLike, radius: number, options: RegularPolygonOptions = {}): RegularPolygon {
        const {
            numSides = 6,
            variant = 'inscribed',
            rotation = 0,
            styleName = DEFAULT_STYLE,
        } = options;
        return new RegularPolygon(
            Point.from(center),
            coerceRadius(radius, 'RegularPolygon'),
            coerceSides(numSides),
            variant,
            rotation,
            styleName
        );
    }

    /** Polygon whose first vertex lands on `vertex`. */
    static fromCenterAndVertex(
        center: PointLike,
        vertex: PointLike,
        options: Omit<RegularPolygonOptions, 'rotation'> = {}
    ): RegularPolygon {
        const c = Point.from(center);
        const numSides = coerceSides(options.numSides ?? 6);
        const variant = options.variant ?? 'inscribed';
        let radius = c.distanceTo(vertex);
        if (variant === 'circumscribed') {
            radius *= Math.cos(Math.PI / numSides);
        }
        return RegularPolygon.create(c, radius, {
            ...options,
            numSides,
            variant,
            rotation: toDegrees(c.angleTo(vertex)),
        });
    }

    get center(): Point { return this._center; }
    get radius(): number { return this._radius; }
    get numSides(): number { return this._numSides; }
    get variant(): PolygonVariant { return this._variant; }
    get rotation(): number { return this._rotation; }

    /** Distance from the center to each vertex. */
    get circumradius(): number {
        return this._variant === 'circumscribed'
            ? this._radius / Math.cos(Math.PI / this._numSides)
            : this._radius;
    }

    /** Distance from the center to each side. */
    get apothem(): number {
        return this._variant === 'circumscribed'
            ? this._radius
            : this._radius * Math.cos(Math.PI / this._numSides);
    }

    get sideLength(): number {
        return 2 * this.circumradius * Math.sin(Math.PI / this._numSides);
    }

    get perimeter(): number {
        return this._numSides * this.sideLength;
    }

    get area(): number {
        return 0.5 * this.perimeter * this.apothem;
    }

    get vertices(): Point[] {
        const r = this.circumradius;
        const start = toRadians(this._rotation);
        const step = 2 * Math.PI / this._numSides;
        const points: Point[] = [];
        for (let i = 0; i < this._numSides; i++) {
            points.push(this._center.movePolar(r, start + i * step));
        }
        return points;
    }

    /** Even-odd ray casting. */
    isPointInside(x: number, y: number): boolean {
        const vertices = this.vertices;
        let inside = false;
        for (let i = 0, j = vertices.length - 1; i < vertices.length; j = i++) {
            const a = vertices[i];
            const b = vertices[j];
            if ((a.y > y) !== (b.y > y)
                && x < (b.x - a.x) * (y - a.y) / (b.y - a.y) + a.x) {
                inside = !inside;
            }
        }
        return inside;
    }

    toRecord(): PolygonRecord {
        return {
            type: 'polygon',
            center: this._center.toRecord(),
            radius: this._radius,
            num_sides: this._numSides,
            polygon_type: this._variant,
            rotation: this._rotation,
            style: this.styleName,
        };
    }

    snapPoints(): SnapPoint[] {
        const vertices = this.vertices;
        const points: SnapPoint[] = [
            { x: this._center.x, y: this._center.y, kind: 'center', source: this },
        ];
        for (const v of vertices) {
            points.push({ x: v.x, y: v.y, kind: 'endpoint', source: this });
        }
        for (let i = 0; i < vertices.length; i++) {
            const mid = vertices[i].midpoint(vertices[(i + 1) % vertices.length]);
            points.push({ x: mid.x, y: mid.y, kind: 'midpoint', source: this });
        }
        return points;
    }

    controlPoints(): ControlPoint[] {
        const first = this.vertices[0];
        return [
            { x: this._center.x, y: this._center.y, label: 'center', index: 0 },
            { x: first.x, y: first.y, label: 'radius', index: 1 },
        ];
    }

    /**
     * The vertex handle sets both size and rotation from the dragged point.
     */
    moveControlPoint(index: number, x: number, y: number): boolean {
        if (index === 0) {
            this._center = new Point(x, y);
            return true;
        }
        if (index === 1) {
            let radius = this._center.distanceTo({ x, y });
            if (this._variant === 'circumscribed') {
                radius *= Math.cos(Math.PI / this._numSides);
            }
            if (radius <= 0) return false;
            this._radius = radius;
            this._rotation = toDegrees(this._center.angleTo({ x, y }));
            return true;
        }
        return false;
    }

    boundingBox(): BoundingBox {
        return boundsOfPoints(this.vertices);
    }

    distanceToPoint(x: number, y: number): number {
        return distanceToPolyline(x, y, this.vertices, true);
    }

    closestPoint(x: number, y: number): Point {
        const p = closestPointOnPolyline(x, y, this.vertices, true);
        return p ? Point.from(p) : this._center;
    }

    containsPoint(x: number, y: number, tolerance: number): boolean {
        return this.distanceToPoint(x, y) <= tolerance;
    }

    translate(dx: number, dy: number): void {
        this._center = this._center.add({ x: dx, y: dy });
    }
}
