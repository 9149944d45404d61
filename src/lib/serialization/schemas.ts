/**
 * Record Schemas
 *
 * Wire shapes for primitives and projects. Field names are the stored
 * format; optional fields carry their defaults here so decoded records are
 * always complete.
 */

import { z } from 'zod';
import { DEFAULT_STYLE } from '../geometry/types';

const coordinate = z.number().finite();

export const pointSchema = z.object({
    x: coordinate,
    y: coordinate,
});

const styleSchema = z.string().default(DEFAULT_STYLE);

export const lineRecordSchema = z.object({
    type: z.literal('line'),
    start: pointSchema,
    end: pointSchema,
    style: styleSchema,
});

export const circleRecordSchema = z.object({
    type: z.literal('circle'),
    center: pointSchema,
    radius: coordinate,
    style: styleSchema,
});

export const arcRecordSchema = z.object({
    type: z.literal('arc'),
    center: pointSchema,
    radius: coordinate,
    start_angle: coordinate,
    span_angle: coordinate,
    style: styleSchema,
});

export const rectangleRecordSchema = z.object({
    type: z.literal('rectangle'),
    p1: pointSchema,
    p2: pointSchema,
    style: styleSchema,
    corner_radius: coordinate.default(0),
    chamfer_size: coordinate.default(0),
});

export const ellipseRecordSchema = z.object({
    type: z.literal('ellipse'),
    center: pointSchema,
    radius_x: coordinate,
    radius_y: coordinate,
    style: styleSchema,
});

export const polygonTypeSchema = z.enum(['inscribed', 'circumscribed']);

export const polygonRecordSchema = z.object({
    type: z.literal('polygon'),
    center: pointSchema,
    radius: coordinate,
    num_sides: z.number().int().default(6),
    polygon_type: polygonTypeSchema.default('inscribed'),
    rotation: coordinate.default(0),
    style: styleSchema,
});

export const splineRecordSchema = z.object({
    type: z.literal('spline'),
    control_points: z.array(pointSchema).min(2),
    closed: z.boolean().default(false),
    style: styleSchema,
});

export const primitiveRecordSchema = z.discriminatedUnion('type', [
    lineRecordSchema,
    circleRecordSchema,
    arcRecordSchema,
    rectangleRecordSchema,
    ellipseRecordSchema,
    polygonRecordSchema,
    splineRecordSchema,
]);

export const PRIMITIVE_TYPES = [
    'line',
    'circle',
    'arc',
    'rectangle',
    'ellipse',
    'polygon',
    'spline',
] as const;

export type PointRecord = z.infer<typeof pointSchema>;
export type LineRecord = z.infer<typeof lineRecordSchema>;
export type CircleRecord = z.infer<typeof circleRecordSchema>;
export type ArcRecord = z.infer<typeof arcRecordSchema>;
export type RectangleRecord = z.infer<typeof rectangleRecordSchema>;
export type EllipseRecord = z.infer<typeof ellipseRecordSchema>;
export type PolygonType = z.infer<typeof polygonTypeSchema>;
export type PolygonRecord = z.infer<typeof polygonRecordSchema>;
export type SplineRecord = z.infer<typeof splineRecordSchema>;
export type PrimitiveRecord = z.infer<typeof primitiveRecordSchema>;

// ============================================================================
// Project
// ============================================================================

export const viewStateSchema = z.object({
    camera_pos: pointSchema,
    zoom_factor: z.number().finite().positive(),
    rotation_angle: coordinate,
});

export const snapSettingsSchema = z.object({
    enabled: z.boolean(),
    snap_radius: z.number().finite().nonnegative(),
    active_snaps: z.array(z.string()),
});

export const projectRecordSchema = z.object({
    version: z.string(),
    view_state: viewStateSchema.optional(),
    snapping: snapSettingsSchema.optional(),
    objects: z.array(z.unknown()),
});

export type ViewStateRecord = z.infer<typeof viewStateSchema>;
export type SnapSettingsRecord = z.infer<typeof snapSettingsSchema>;
export type ProjectRecord = z.infer<typeof projectRecordSchema>;
