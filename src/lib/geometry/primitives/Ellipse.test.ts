import { describe, it, expect } from 'vitest';
import { Ellipse } from './Ellipse';

describe('Ellipse', () => {
    describe('construction', () => {
        it('should build from axis points', () => {
            const e = Ellipse.fromCenterAndAxisPoints({ x: 1, y: 1 }, { x: 5, y: 3 }, { x: 0, y: -1 });
            expect(e.radiusX).toBe(4);
            expect(e.radiusY).toBe(2);
        });

        it('should build inside a bounding rectangle', () => {
            const e = Ellipse.fromBoundingRectangle({ x: 6, y: 4 }, { x: -2, y: 0 });
            expect(e.center).toEqual({ x: 2, y: 2 });
            expect(e.radiusX).toBe(4);
            expect(e.radiusY).toBe(2);
        });
    });

    describe('distanceToPoint', () => {
        const e = Ellipse.create({ x: 0, y: 0 }, 4, 2);

        it('should measure along the axes', () => {
            expect(e.distanceToPoint(6, 0)).toBe(2);
            expect(e.distanceToPoint(0, 5)).toBe(3);
            expect(e.distanceToPoint(-6, 0)).toBe(2);
        });

        it('should measure to the boundary from the center', () => {
            expect(e.distanceToPoint(0, 0)).toBe(2);
        });

        it('should be zero on the boundary', () => {
            for (const angle of [10, 37, 123, 200, 315]) {
                const p = e.pointAtAngle(angle);
                expect(e.distanceToPoint(p.x, p.y)).toBeLessThan(1e-9);
            }
        });

        it('should agree with a dense boundary sample off the curve', () => {
            const queries = [
                { x: 3, y: 3 },
                { x: -1, y: 0.5 },
                { x: 8, y: -7 },
                { x: -2.5, y: -1.9 },
            ];
            for (const q of queries) {
                let sampled = Infinity;
                for (let i = 0; i < 20000; i++) {
                    const p = e.pointAtAngle(i * 360 / 20000);
                    sampled = Math.min(sampled, Math.hypot(p.x - q.x, p.y - q.y));
                }
                const d = e.distanceToPoint(q.x, q.y);
                expect(d).toBeLessThanOrEqual(sampled + 1e-9);
                expect(sampled - d).toBeLessThan(1e-4);
            }
        });

        it('should handle a taller-than-wide ellipse', () => {
            const tall = Ellipse.create({ x: 1, y: 1 }, 2, 4);
            expect(tall.distanceToPoint(1, 7)).toBe(2);
            expect(tall.distanceToPoint(1, 1)).toBe(2);
        });

        it('should fall back to a segment when a radius is zero', () => {
            const flat = Ellipse.create({ x: 0, y: 0 }, 3, 0);
            expect(flat.distanceToPoint(0, 2)).toBe(2);
            expect(flat.distanceToPoint(5, 0)).toBe(2);
        });
    });

    it('should emit center and axis quadrant snaps', () => {
        const e = Ellipse.create({ x: 0, y: 0 }, 4, 2);
        const snaps = e.snapPoints();
        expect(snaps.map(s => s.kind)).toEqual(['center', 'quadrant', 'quadrant', 'quadrant', 'quadrant']);
        expect(snaps[1].x).toBe(4);
        expect(snaps[2].y).toBe(2);
    });

    it('should edit radii through the axis handles', () => {
        const e = Ellipse.create({ x: 0, y: 0 }, 4, 2);
        expect(e.moveControlPoint(1, -6, 10)).toBe(true);
        expect(e.radiusX).toBe(6);
        expect(e.moveControlPoint(2, 3, 0)).toBe(false);
        expect(e.radiusY).toBe(2);
    });

    it('should derive measurements', () => {
        const e = Ellipse.create({ x: 0, y: 0 }, 5, 3);
        expect(e.majorRadius).toBe(5);
        expect(e.minorRadius).toBe(3);
        expect(e.eccentricity).toBeCloseTo(0.8, 12);
        expect(e.area).toBeCloseTo(15 * Math.PI, 12);
        expect(Ellipse.create({ x: 0, y: 0 }, 2, 2).circumference).toBeCloseTo(4 * Math.PI, 12);
        expect(e.isPointInside(4, 0)).toBe(true);
        expect(e.isPointInside(4, 2)).toBe(false);
    });
});
