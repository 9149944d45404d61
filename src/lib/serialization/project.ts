/**
 * Project record: the objects of a scene with the view and snapping
 * settings they were saved with.
 */

import type { Primitive } from '../geometry/primitives';
import { decodePrimitive, encodePrimitive } from './codec';
import { DecodeError, type DecodeResult } from './errors';
import {
    projectRecordSchema,
    type PrimitiveRecord,
    type SnapSettingsRecord,
    type ViewStateRecord,
} from './schemas';

export const PROJECT_VERSION = '1.0';

export interface SavedProject {
    version: string;
    view_state?: ViewStateRecord;
    snapping?: SnapSettingsRecord;
    objects: PrimitiveRecord[];
}

export interface LoadedProject {
    version: string;
    objects: Primitive[];
    viewState: ViewStateRecord | null;
    snapping: SnapSettingsRecord | null;
}

interface ViewStateSource {
    getViewState(): ViewStateRecord;
}

interface SnapSettingsSource {
    toRecord(): SnapSettingsRecord;
}

export function serializeProject(
    objects: readonly Primitive[],
    view?: ViewStateSource,
    snapping?: SnapSettingsSource
): SavedProject {
    return {
        version: PROJECT_VERSION,
        ...(view ? { view_state: view.getViewState() } : {}),
        ...(snapping ? { snapping: snapping.toRecord() } : {}),
        objects: objects.map(encodePrimitive),
    };
}

/**
 * All or nothing: one bad object rejects the whole project.
 */
export function deserializeProject(input: unknown): DecodeResult<LoadedProject> {
    const parsed = projectRecordSchema.safeParse(input);
    if (!parsed.success) {
        return {
            ok: false,
            error: new DecodeError('invalid-record', 'Invalid project record', [], parsed.error.issues),
        };
    }

    const objects: Primitive[] = [];
    for (let i = 0; i < parsed.data.objects.length; i++) {
        const result = decodePrimitive(parsed.data.objects[i]);
        if (!result.ok) {
            return { ok: false, error: result.error.at('objects', i) };
        }
        objects.push(result.value);
    }

    return {
        ok: true,
        value: {
            version: parsed.data.version,
            objects,
            viewState: parsed.data.view_state ?? null,
            snapping: parsed.data.snapping ?? null,
        },
    };
}
