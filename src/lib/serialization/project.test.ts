import { describe, it, expect } from 'vitest';
import { deserializeProject, serializeProject } from './project';
import { Circle, Segment } from '../geometry/primitives';
import { SnappingEngine } from '../snapping';
import { logger } from '../utils/Logger';

describe('project record', () => {
    const view = {
        getViewState: () => ({ camera_pos: { x: 10, y: -5 }, zoom_factor: 2, rotation_angle: 45 }),
    };
    const snapping = {
        toRecord: () => ({ enabled: true, snap_radius: 15, active_snaps: ['endpoint', 'center'] }),
    };

    it('should bundle objects with view and snapping state', () => {
        const project = serializeProject(
            [Segment.create({ x: 0, y: 0 }, { x: 1, y: 0 }), Circle.create({ x: 0, y: 0 }, 2)],
            view,
            snapping
        );

        expect(project.version).toBe('1.0');
        expect(project.view_state).toEqual({ camera_pos: { x: 10, y: -5 }, zoom_factor: 2, rotation_angle: 45 });
        expect(project.snapping?.active_snaps).toEqual(['endpoint', 'center']);
        expect(project.objects.map(o => o.type)).toEqual(['line', 'circle']);
    });

    it('should load what it saved', () => {
        const saved = serializeProject([Circle.create({ x: 1, y: 1 }, 3)], view, snapping);
        const loaded = deserializeProject(JSON.parse(JSON.stringify(saved)));

        expect(loaded.ok).toBe(true);
        if (!loaded.ok) return;
        expect(loaded.value.objects).toHaveLength(1);
        expect(loaded.value.objects[0].toRecord()).toEqual(saved.objects[0]);
        expect(loaded.value.viewState).toEqual(saved.view_state);
        expect(loaded.value.snapping).toEqual(saved.snapping);
    });

    it('should load snapping settings saved with a zero radius', () => {
        const saved = serializeProject([], undefined, new SnappingEngine({ snapRadius: 0 }));
        const loaded = deserializeProject(JSON.parse(JSON.stringify(saved)));

        expect(loaded.ok).toBe(true);
        if (!loaded.ok) return;
        expect(loaded.value.snapping?.snap_radius).toBe(0);
    });

    it('should save a negative snap radius as its magnitude', () => {
        logger.setConsoleOutput(false);
        const saved = serializeProject([], undefined, new SnappingEngine({ snapRadius: -8 }));
        logger.setConsoleOutput(true);

        expect(saved.snapping?.snap_radius).toBe(8);
        expect(deserializeProject(JSON.parse(JSON.stringify(saved))).ok).toBe(true);
    });

    it('should treat view and snapping state as optional', () => {
        const loaded = deserializeProject({ version: '1.0', objects: [] });
        expect(loaded.ok).toBe(true);
        if (!loaded.ok) return;
        expect(loaded.value.viewState).toBeNull();
        expect(loaded.value.snapping).toBeNull();
    });

    it('should reject the whole project when one object is bad', () => {
        const loaded = deserializeProject({
            version: '1.0',
            objects: [
                { type: 'circle', center: { x: 0, y: 0 }, radius: 1 },
                { type: 'blob' },
            ],
        });

        expect(loaded.ok).toBe(false);
        if (loaded.ok) return;
        expect(loaded.error.code).toBe('unknown-type');
        expect(loaded.error.path).toEqual(['objects', 1, 'type']);
    });

    it('should reject a malformed envelope', () => {
        const loaded = deserializeProject({ objects: 'none' });
        expect(loaded.ok).toBe(false);
        if (loaded.ok) return;
        expect(loaded.error.code).toBe('invalid-record');
    });
});
