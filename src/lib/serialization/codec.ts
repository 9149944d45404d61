/**
 * Primitive record codec.
 *
 * Decoding never throws and never builds a primitive from a partial record.
 */

import type { ZodError } from 'zod';
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
import { DecodeError, type DecodeResult } from './errors';
import { PRIMITIVE_TYPES, primitiveRecordSchema, type PrimitiveRecord } from './schemas';

export function encodePrimitive(primitive: Primitive): PrimitiveRecord {
    return primitive.toRecord();
}

function isKnownType(type: unknown): boolean {
    return PRIMITIVE_TYPES.some(known => known === type);
}

function formatIssues(error: ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length ? issue.path.join('.') : '<root>'}: ${issue.message}`)
        .join('; ');
}

function build(record: PrimitiveRecord): Primitive | null {
    switch (record.type) {
        case 'line':
            return Segment.create(record.start, record.end, record.style);
        case 'circle':
            return Circle.create(record.center, record.radius, record.style);
        case 'arc':
            return Arc.create(record.center, record.radius, record.start_angle, record.span_angle, record.style);
        case 'rectangle':
            return Rectangle.create(record.p1, record.p2, {
                styleName: record.style,
                cornerRadius: record.corner_radius,
                chamferSize: record.chamfer_size,
            });
        case 'ellipse':
            return Ellipse.create(record.center, record.radius_x, record.radius_y, record.style);
        case 'polygon':
            return RegularPolygon.create(record.center, record.radius, {
                numSides: record.num_sides,
                variant: record.polygon_type,
                rotation: record.rotation,
                styleName: record.style,
            });
        case 'spline':
            return Spline.create(record.control_points, { closed: record.closed, styleName: record.style });
    }
}

/**
 * Decodes a primitive record. Absent optional fields take their defaults
 * (`style` is "solid-primary").
 */
export function decodePrimitive(input: unknown): DecodeResult<Primitive> {
    if (typeof input === 'object' && input !== null && 'type' in input && !isKnownType(input.type)) {
        return {
            ok: false,
            error: new DecodeError('unknown-type', `Unknown primitive type: ${String(input.type)}`, ['type']),
        };
    }

    const parsed = primitiveRecordSchema.safeParse(input);
    if (!parsed.success) {
        return {
            ok: false,
            error: new DecodeError('invalid-record', `Invalid primitive record: ${formatIssues(parsed.error)}`, [], parsed.error.issues),
        };
    }

    const primitive = build(parsed.data);
    if (!primitive) {
        return {
            ok: false,
            error: new DecodeError('invalid-record', `Cannot build ${parsed.data.type} from record`),
        };
    }
    return { ok: true, value: primitive };
}
