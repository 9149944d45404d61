/**
 * Immutable 2D point in scene space (Y grows upward).
 *
 * Equality is tolerance based: most points come out of trigonometric
 * construction and are never bit-exact.
 */

import { EPSILON } from './math';

export type PointLike = { x: number; y: number };

export class Point {
    constructor(public readonly x: number, public readonly y: number) { }

    static from(p: PointLike): Point {
        return new Point(p.x, p.y);
    }

    toRecord(): PointLike {
        return { x: this.x, y: this.y };
    }

    add(other: PointLike): Point {
        return new Point(this.x + other.x, this.y + other.y);
    }

    sub(other: PointLike): Point {
        return new Point(this.x - other.x, this.y - other.y);
    }

    scale(factor: number): Point {
        return new Point(this.x * factor, this.y * factor);
    }

    div(divisor: number): Point {
        return new Point(this.x / divisor, this.y / divisor);
    }

    neg(): Point {
        return new Point(-this.x, -this.y);
    }

    distanceTo(other: PointLike): number {
        return Math.hypot(other.x - this.x, other.y - this.y);
    }

    midpoint(other: PointLike): Point {
        return new Point((this.x + other.x) / 2, (this.y + other.y) / 2);
    }

    /** Direction towards `other` in radians, in (-π, π]. */
    angleTo(other: PointLike): number {
        return Math.atan2(other.y - this.y, other.x - this.x);
    }

    movePolar(distance: number, angle: number): Point {
        return new Point(
            this.x + distance * Math.cos(angle),
            this.y + distance * Math.sin(angle)
        );
    }

    /** Rotates about `center` by `angle` radians, counter-clockwise. */
    rotateAround(center: PointLike, angle: number): Point {
        const cos = Math.cos(angle);
        const sin = Math.sin(angle);
        const dx = this.x - center.x;
        const dy = this.y - center.y;
        return new Point(
            dx * cos - dy * sin + center.x,
            dx * sin + dy * cos + center.y
        );
    }

    equals(other: PointLike, tolerance = EPSILON): boolean {
        return nearlyEqual(this.x, other.x, tolerance) && nearlyEqual(this.y, other.y, tolerance);
    }

    toString(): string {
        return `(${this.x.toFixed(2)}, ${this.y.toFixed(2)})`;
    }
}

function nearlyEqual(a: number, b: number, tolerance: number): boolean {
    const diff = Math.abs(a - b);
    return diff <= tolerance || diff <= tolerance * Math.max(Math.abs(a), Math.abs(b));
}
