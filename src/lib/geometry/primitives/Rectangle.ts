import { Point, type PointLike } from '../Point';
import { closestPointOnPolyline, distanceToPolyline } from '../math';
import { ID } from '../../utils/id-generator';
import { logger } from '../../utils/Logger';
import {
    DEFAULT_STYLE,
    type BoundingBox,
    type ControlPoint,
    type PrimitiveContract,
    type SnapPoint,
} from '../types';
import type { RectangleRecord } from '../../serialization/schemas';
import { coerceNonNegative } from './coerce';

export interface RectangleOptions {
    styleName?: string;
    /** Fillet radius for rendering; mutually exclusive with `chamferSize`. */
    cornerRadius?: number;
    chamferSize?: number;
}

const CORNER_LABELS = ['left-bottom', 'right-bottom', 'right-top', 'left-top'];

/**
 * Axis-aligned rectangle from two opposite corners. Which corner is given
 * first does not matter; every side is derived from min/max.
 */
export class Rectangle implements PrimitiveContract {
    readonly kind = 'rectangle';
    readonly id = ID.next('rectangle');

    private constructor(
        private _corner1: Point,
        private _corner2: Point,
        public styleName: string,
        private _cornerRadius: number,
        private _chamferSize: number
    ) { }

    static create(corner1: PointLike, corner2: PointLike, options: RectangleOptions = {}): Rectangle {
        const { styleName = DEFAULT_STYLE } = options;
        const cornerRadius = coerceNonNegative(options.cornerRadius ?? 0, 'Rectangle', 'corner radius');
        let chamferSize = coerceNonNegative(options.chamferSize ?? 0, 'Rectangle', 'chamfer size');
        if (cornerRadius > 0 && chamferSize > 0) {
            logger.warn(`[Rectangle] corner radius and chamfer are exclusive; dropping chamfer ${chamferSize}`);
            chamferSize = 0;
        }
        return new Rectangle(Point.from(corner1), Point.from(corner2), styleName, cornerRadius, chamferSize);
    }

    /** `origin` is the first corner; negative sizes extend left or down. */
    static fromPointAndSize(origin: PointLike, width: number, height: number, options: RectangleOptions = {}): Rectangle {
        return Rectangle.create(origin, { x: origin.x + width, y: origin.y + height }, options);
    }

    static fromCenterAndSize(center: PointLike, width: number, height: number, options: RectangleOptions = {}): Rectangle {
        const hw = Math.abs(width) / 2;
        const hh = Math.abs(height) / 2;
        return Rectangle.create(
            { x: center.x - hw, y: center.y - hh },
            { x: center.x + hw, y: center.y + hh },
            options
        );
    }

    get corner1(): Point { return this._corner1; }
    get corner2(): Point { return this._corner2; }
    get cornerRadius(): number { return this._cornerRadius; }
    get chamferSize(): number { return this._chamferSize; }

    get left(): number { return Math.min(this._corner1.x, this._corner2.x); }
    get right(): number { return Math.max(this._corner1.x, this._corner2.x); }
    get bottom(): number { return Math.min(this._corner1.y, this._corner2.y); }
    get top(): number { return Math.max(this._corner1.y, this._corner2.y); }
    get width(): number { return this.right - this.left; }
    get height(): number { return this.top - this.bottom; }
    get area(): number { return this.width * this.height; }
    get perimeter(): number { return 2 * (this.width + this.height); }

    get center(): Point {
        return this._corner1.midpoint(this._corner2);
    }

    /** Left-bottom, right-bottom, right-top, left-top. */
    get corners(): Point[] {
        return [
            new Point(this.left, this.bottom),
            new Point(this.right, this.bottom),
            new Point(this.right, this.top),
            new Point(this.left, this.top),
        ];
    }

    isPointInside(x: number, y: number): boolean {
        return x >= this.left && x <= this.right && y >= this.bottom && y <= this.top;
    }

    toRecord(): RectangleRecord {
        return {
            type: 'rectangle',
            p1: this._corner1.toRecord(),
            p2: this._corner2.toRecord(),
            style: this.styleName,
            corner_radius: this._cornerRadius,
            chamfer_size: this._chamferSize,
        };
    }

    snapPoints(): SnapPoint[] {
        const center = this.center;
        const corners = this.corners;
        const points: SnapPoint[] = [
            { x: center.x, y: center.y, kind: 'center', source: this },
        ];
        for (const c of corners) {
            points.push({ x: c.x, y: c.y, kind: 'endpoint', source: this });
        }
        for (let i = 0; i < corners.length; i++) {
            const mid = corners[i].midpoint(corners[(i + 1) % corners.length]);
            points.push({ x: mid.x, y: mid.y, kind: 'midpoint', source: this });
        }
        return points;
    }

    controlPoints(): ControlPoint[] {
        const points: ControlPoint[] = this.corners.map((c, index) => ({
            x: c.x,
            y: c.y,
            label: CORNER_LABELS[index],
            index,
        }));
        const center = this.center;
        points.push({ x: center.x, y: center.y, label: 'center', index: 4 });
        return points;
    }

    /**
     * A corner handle moves the two sides that meet at that corner. Afterwards
     * the rectangle is stored as (left, bottom)-(right, top).
     */
    moveControlPoint(index: number, x: number, y: number): boolean {
        if (index === 4) {
            const center = this.center;
            this.translate(x - center.x, y - center.y);
            return true;
        }

        let { left, right, bottom, top } = this;
        switch (index) {
            case 0:
                left = x;
                bottom = y;
                break;
            case 1:
                right = x;
                bottom = y;
                break;
            case 2:
                right = x;
                top = y;
                break;
            case 3:
                left = x;
                top = y;
                break;
            default:
                return false;
        }

        this._corner1 = new Point(left, bottom);
        this._corner2 = new Point(right, top);
        return true;
    }

    boundingBox(): BoundingBox {
        return { minX: this.left, minY: this.bottom, maxX: this.right, maxY: this.top };
    }

    distanceToPoint(x: number, y: number): number {
        return distanceToPolyline(x, y, this.corners, true);
    }

    closestPoint(x: number, y: number): Point {
        const p = closestPointOnPolyline(x, y, this.corners, true);
        return p ? Point.from(p) : this.center;
    }

    containsPoint(x: number, y: number, tolerance: number): boolean {
        return this.distanceToPoint(x, y) <= tolerance;
    }

    translate(dx: number, dy: number): void {
        const delta = { x: dx, y: dy };
        this._corner1 = this._corner1.add(delta);
        this._corner2 = this._corner2.add(delta);
    }
}
