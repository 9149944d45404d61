import { describe, it, expect } from 'vitest';
import { decodePrimitive, encodePrimitive } from './codec';
import { DecodeError } from './errors';
import {
    Arc,
    Circle,
    Ellipse,
    Rectangle,
    RegularPolygon,
    Segment,
    Spline,
    type Primitive,
} from '../geometry/primitives';

function spline(): Spline {
    const s = Spline.create([{ x: 0, y: 0 }, { x: 3, y: 4 }, { x: 6, y: 0 }], { closed: true, styleName: 'thin' });
    if (!s) throw new Error('expected a spline');
    return s;
}

describe('primitive codec', () => {
    it('should round-trip one of each primitive field for field', () => {
        const primitives: Primitive[] = [
            Segment.create({ x: 1, y: 2 }, { x: -3, y: 4 }, 'dashed'),
            Circle.create({ x: 0.5, y: -1 }, 7),
            Arc.create({ x: 2, y: 2 }, 3, 30, -120, 'center-line'),
            Rectangle.create({ x: 5, y: 5 }, { x: 0, y: 1 }, { cornerRadius: 0.5 }),
            Ellipse.create({ x: -1, y: -1 }, 6, 2),
            RegularPolygon.create({ x: 0, y: 0 }, 4, { numSides: 5, variant: 'circumscribed', rotation: 18 }),
            spline(),
        ];

        for (const original of primitives) {
            const record = encodePrimitive(original);
            const decoded = decodePrimitive(JSON.parse(JSON.stringify(record)));
            expect(decoded.ok).toBe(true);
            if (!decoded.ok) continue;
            expect(decoded.value.kind).toBe(original.kind);
            expect(decoded.value.toRecord()).toEqual(record);
        }
    });

    it('should fill in documented defaults', () => {
        const polygon = decodePrimitive({ type: 'polygon', center: { x: 0, y: 0 }, radius: 2 });
        expect(polygon.ok && polygon.value.toRecord()).toEqual({
            type: 'polygon',
            center: { x: 0, y: 0 },
            radius: 2,
            num_sides: 6,
            polygon_type: 'inscribed',
            rotation: 0,
            style: 'solid-primary',
        });

        const rect = decodePrimitive({ type: 'rectangle', p1: { x: 0, y: 0 }, p2: { x: 1, y: 1 } });
        expect(rect.ok && rect.value.toRecord()).toMatchObject({ corner_radius: 0, chamfer_size: 0, style: 'solid-primary' });

        const curve = decodePrimitive({ type: 'spline', control_points: [{ x: 0, y: 0 }, { x: 1, y: 1 }] });
        expect(curve.ok && curve.value.toRecord()).toMatchObject({ closed: false });
    });

    it('should reject unknown types', () => {
        const result = decodePrimitive({ type: 'hyperbola', center: { x: 0, y: 0 } });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(DecodeError);
        expect(result.error.code).toBe('unknown-type');
        expect(result.error.message).toBe('Unknown primitive type: hyperbola');
    });

    it('should reject records with missing fields', () => {
        const result = decodePrimitive({ type: 'circle', center: { x: 0, y: 0 } });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.code).toBe('invalid-record');
        expect(result.error.issues[0].path).toEqual(['radius']);
    });

    it('should reject non-finite numbers', () => {
        const result = decodePrimitive({ type: 'line', start: { x: 0, y: Infinity }, end: { x: 1, y: 1 } });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.issues[0].path).toEqual(['start', 'y']);
    });

    it('should reject splines with fewer than two control points', () => {
        const result = decodePrimitive({ type: 'spline', control_points: [{ x: 0, y: 0 }] });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.code).toBe('invalid-record');
    });

    it('should reject a fractional side count', () => {
        const result = decodePrimitive({ type: 'polygon', center: { x: 0, y: 0 }, radius: 1, num_sides: 4.5 });
        expect(result.ok).toBe(false);
    });

    it('should reject input that is not a record', () => {
        for (const input of [null, 42, 'line', []]) {
            const result = decodePrimitive(input);
            expect(result.ok).toBe(false);
            if (result.ok) continue;
            expect(result.error.code).toBe('invalid-record');
        }
    });
});
