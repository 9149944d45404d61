import { describe, it, expect, beforeEach } from 'vitest';
import { createSceneStore } from './createSceneStore';
import { Segment } from '../lib/geometry/primitives/Segment';
import { Circle } from '../lib/geometry/primitives/Circle';
import { ID } from '../lib/utils/id-generator';

describe('createSceneStore', () => {
    beforeEach(() => {
        ID.reset();
    });

    it('should start empty', () => {
        const store = createSceneStore();
        const state = store.getState();
        expect(state.objects).toEqual([]);
        expect(state.hoveredId).toBeNull();
        expect(state.selectedId).toBeNull();
        expect(state.activeSnap).toBeNull();
        expect(state.snappingEnabled).toBe(true);
        expect(state.sceneBounds()).toBeNull();
    });

    it('should hydrate objects and snapping settings', () => {
        const seg = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
        const store = createSceneStore({ objects: [seg], snapping: { enabled: false } });

        expect(store.getState().objects).toEqual([seg]);
        expect(store.getState().snappingEnabled).toBe(false);
        expect(store.getState().snappingEngine.enabled).toBe(false);
    });

    it('should give each store its own hit tester', () => {
        const first = createSceneStore({ hitTest: { threshold: 4 } });
        const second = createSceneStore();

        expect(first.getState().hitTester).not.toBe(second.getState().hitTester);
        expect(first.getState().hitTester.getConfig().threshold).toBe(4);
        expect(second.getState().hitTester.getConfig().threshold).toBe(10);
    });

    describe('ids', () => {
        it('should move id sequences past hydrated objects', () => {
            const seg = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
            Segment.create({ x: 0, y: 0 }, { x: 0, y: 10 });
            ID.reset();

            createSceneStore({ objects: [seg] });
            expect(Segment.create({ x: 1, y: 1 }, { x: 2, y: 2 }).id).toBe('line_2');
        });

        it('should move id sequences past replaced and added objects', () => {
            const store = createSceneStore();
            const circles = [Circle.create({ x: 0, y: 0 }, 1), Circle.create({ x: 5, y: 0 }, 1)];
            const seg = Segment.create({ x: 0, y: 0 }, { x: 1, y: 0 });
            ID.reset();

            store.getState().replaceObjects(circles);
            expect(Circle.create({ x: 9, y: 9 }, 1).id).toBe('circle_3');

            store.getState().addObject(seg);
            expect(Segment.create({ x: 0, y: 0 }, { x: 1, y: 1 }).id).toBe('line_2');
        });
    });

    describe('objects', () => {
        it('should add, find and remove objects', () => {
            const store = createSceneStore();
            const seg = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });

            store.getState().addObject(seg);
            expect(store.getState().getObject('line_1')).toBe(seg);

            expect(store.getState().removeObject('missing')).toBe(false);
            expect(store.getState().removeObject(seg.id)).toBe(true);
            expect(store.getState().objects).toEqual([]);
        });

        it('should union the bounds of every object', () => {
            const store = createSceneStore({
                objects: [
                    Segment.create({ x: 0, y: 0 }, { x: 10, y: 2 }),
                    Circle.create({ x: 20, y: 0 }, 5),
                ],
            });

            expect(store.getState().sceneBounds()).toEqual({ minX: 0, minY: -5, maxX: 25, maxY: 5 });
        });

        it('should move a control point and publish a new array', () => {
            const seg = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
            const store = createSceneStore({ objects: [seg] });
            const before = store.getState().objects;

            expect(store.getState().moveControlPoint(seg.id, 1, 4, 4)).toBe(true);
            expect(seg.end.x).toBe(4);
            expect(seg.end.y).toBe(4);
            expect(store.getState().objects).not.toBe(before);

            expect(store.getState().moveControlPoint(seg.id, 9, 0, 0)).toBe(false);
            expect(store.getState().moveControlPoint('missing', 0, 0, 0)).toBe(false);
        });

        it('should drop hover and selection that point at a removed object', () => {
            const seg = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
            const store = createSceneStore({ objects: [seg] });

            store.getState().updateHover(5, 0.5, 1);
            store.getState().updateSelection(5, 0.5, 1);
            store.getState().removeObject(seg.id);

            expect(store.getState().hoveredId).toBeNull();
            expect(store.getState().selectedId).toBeNull();
        });
    });

    describe('selection', () => {
        it('should report whether the hover target changed', () => {
            const seg = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
            const store = createSceneStore({ objects: [seg] });

            expect(store.getState().updateHover(5, 0.5, 1)).toBe(true);
            expect(store.getState().hoveredId).toBe(seg.id);
            expect(store.getState().updateHover(6, 0.2, 1)).toBe(false);
            expect(store.getState().updateHover(5, 3, 1)).toBe(true);
            expect(store.getState().hoveredId).toBeNull();
            expect(store.getState().updateHover(5, 3, 1)).toBe(false);
        });

        it('should report whether the selection changed', () => {
            const a = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
            const b = Segment.create({ x: 0, y: 5 }, { x: 10, y: 5 });
            const store = createSceneStore({ objects: [a, b] });

            expect(store.getState().updateSelection(5, 4.5, 1)).toBe(true);
            expect(store.getState().selectedId).toBe(b.id);
            expect(store.getState().updateSelection(5, 4.8, 1)).toBe(false);
            expect(store.getState().updateSelection(5, 0.2, 1)).toBe(true);
            expect(store.getState().selectedId).toBe(a.id);

            store.getState().clearSelection();
            expect(store.getState().selectedId).toBeNull();
        });

        it('should delete the object under the cursor', () => {
            const a = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
            const b = Segment.create({ x: 0, y: 5 }, { x: 10, y: 5 });
            const store = createSceneStore({ objects: [a, b] });

            expect(store.getState().deleteAt(5, 2.5, 1)).toBeNull();
            expect(store.getState().deleteAt(5, 4.5, 1)).toBe(b);
            expect(store.getState().objects).toEqual([a]);
        });
    });

    describe('snapping', () => {
        it('should store the active snap', () => {
            const seg = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
            const store = createSceneStore({ objects: [seg] });

            const snap = store.getState().updateSnap(0.2, 0.3, 1);
            expect(snap?.kind).toBe('endpoint');
            expect(store.getState().activeSnap).toBe(snap);

            store.getState().clearSnap();
            expect(store.getState().activeSnap).toBeNull();
        });

        it('should stop snapping when toggled off', () => {
            const seg = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
            const store = createSceneStore({ objects: [seg] });

            store.getState().updateSnap(0.2, 0.3, 1);
            store.getState().toggleSnapping();

            expect(store.getState().snappingEnabled).toBe(false);
            expect(store.getState().activeSnap).toBeNull();
            expect(store.getState().updateSnap(0.2, 0.3, 1)).toBeNull();

            store.getState().toggleSnapping();
            expect(store.getState().updateSnap(0.2, 0.3, 1)?.kind).toBe('endpoint');
        });

        it('should skip the excluded object', () => {
            const seg = Segment.create({ x: 0, y: 0 }, { x: 10, y: 0 });
            const store = createSceneStore({ objects: [seg] });

            expect(store.getState().updateSnap(0.2, 0.3, 1, { exclude: seg })).toBeNull();
        });
    });
});
