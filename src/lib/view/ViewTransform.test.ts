import { describe, it, expect } from 'vitest';
import { ViewTransform } from './ViewTransform';

describe('ViewTransform', () => {
    it('should map the worked screen point into the scene', () => {
        const view = new ViewTransform({ viewport: { width: 800, height: 600 }, zoom: 2 });
        const p = view.toScene({ x: 500, y: 300 });
        expect(p.x).toBe(50);
        expect(p.y).toBe(0);
    });

    it('should flip the vertical axis', () => {
        const view = new ViewTransform({ viewport: { width: 800, height: 600 } });
        expect(view.toScene({ x: 400, y: 200 }).y).toBe(100);
    });

    it('should invert exactly for every zoom and rotation', () => {
        const viewport = { width: 800, height: 600 };
        const samples = [
            { x: 0, y: 0 },
            { x: 800, y: 0 },
            { x: 0, y: 600 },
            { x: 800, y: 600 },
            { x: 400, y: 300 },
        ];

        for (const zoom of [0.1, 0.5, 1, 2, 10]) {
            for (const rotation of [0, 45, 90, 180, 270]) {
                const view = new ViewTransform({ viewport, zoom, rotation, camera: { x: -123.4, y: 56.7 } });
                for (const p of samples) {
                    const back = view.fromScene(view.toScene(p));
                    expect(Math.abs(back.x - p.x)).toBeLessThan(1e-6);
                    expect(Math.abs(back.y - p.y)).toBeLessThan(1e-6);
                }
            }
        }
    });

    it('should not follow later changes to the viewport it was given', () => {
        const viewport = { width: 800, height: 600 };
        const view = new ViewTransform({ viewport });
        viewport.width = 100;

        expect(view.toScene({ x: 0, y: 0 }).x).toBe(-400);
        expect(view.viewport).toEqual({ width: 800, height: 600 });
    });

    it('should place the camera at the viewport center', () => {
        const view = new ViewTransform({ camera: { x: 7, y: -3 }, rotation: 30, zoom: 4 });
        const center = view.fromScene({ x: 7, y: -3 });
        expect(center.x).toBeCloseTo(400, 9);
        expect(center.y).toBeCloseTo(300, 9);
    });

    it('should report viewport corners and visible bounds', () => {
        const view = new ViewTransform({ viewport: { width: 200, height: 100 } });
        const corners = view.viewportCorners();
        expect(corners.topLeft).toEqual({ x: -100, y: 50 });
        expect(corners.bottomRight).toEqual({ x: 100, y: -50 });
        expect(view.visibleBounds()).toEqual({ minX: -100, minY: -50, maxX: 100, maxY: 50 });
    });

    describe('zoom', () => {
        it('should clamp to the configured range', () => {
            const view = new ViewTransform();
            expect(view.setZoom(50)).toBe(10);
            expect(view.setZoom(0.01)).toBe(0.1);

            view.setConfig({ maxZoom: 100 });
            expect(view.setZoom(50)).toBe(50);
        });

        it('should keep the anchored scene point under the cursor', () => {
            const view = new ViewTransform({ camera: { x: 10, y: 10 }, rotation: 30 });
            const anchor = { x: 120, y: 480 };
            const before = view.toScene(anchor);

            view.zoomAt(3, anchor);
            const after = view.toScene(anchor);

            expect(view.zoom).toBe(3);
            expect(after.x).toBeCloseTo(before.x, 9);
            expect(after.y).toBeCloseTo(before.y, 9);
        });

        it('should step by the zoom factor', () => {
            const view = new ViewTransform();
            view.zoomBy(2);
            expect(view.zoom).toBeCloseTo(1.15 * 1.15, 12);
            view.zoomBy(-2);
            expect(view.zoom).toBeCloseTo(1, 12);
        });
    });

    it('should pan so content follows the pointer', () => {
        const view = new ViewTransform({ zoom: 2, rotation: 60, camera: { x: 5, y: 5 } });
        const grab = { x: 300, y: 200 };
        const before = view.toScene(grab);

        view.panByScreenDelta(40, -25);
        const after = view.toScene({ x: grab.x + 40, y: grab.y - 25 });

        expect(after.x).toBeCloseTo(before.x, 9);
        expect(after.y).toBeCloseTo(before.y, 9);
    });

    it('should normalize rotation', () => {
        const view = new ViewTransform({ rotation: -90 });
        expect(view.rotation).toBe(270);
        view.rotateBy(100);
        expect(view.rotation).toBe(10);
        view.setRotation(720);
        expect(view.rotation).toBe(0);
    });

    describe('zoomToFit', () => {
        it('should center and fit padded bounds', () => {
            const view = new ViewTransform({ viewport: { width: 800, height: 600 } });
            view.zoomToFit({ minX: 0, minY: 0, maxX: 100, maxY: 50 });
            expect(view.zoom).toBeCloseTo(800 / 120, 9);
            expect(view.camera).toEqual({ x: 50, y: 25 });
        });

        it('should swap the viewport extents when rotated a quarter turn', () => {
            const view = new ViewTransform({ viewport: { width: 800, height: 600 }, rotation: 90 });
            view.zoomToFit({ minX: 0, minY: 0, maxX: 100, maxY: 50 });
            expect(view.zoom).toBeCloseTo(5, 9);
        });

        it('should reset without bounds', () => {
            const view = new ViewTransform({ zoom: 4, camera: { x: 9, y: 9 } });
            view.zoomToFit(null);
            expect(view.zoom).toBe(1);
            expect(view.camera).toEqual({ x: 0, y: 0 });
        });
    });

    it('should save and restore view state', () => {
        const view = new ViewTransform({ zoom: 2.5, rotation: 15, camera: { x: 1, y: 2 } });
        const state = view.getViewState();
        expect(state).toEqual({ camera_pos: { x: 1, y: 2 }, zoom_factor: 2.5, rotation_angle: 15 });

        const other = new ViewTransform();
        other.setViewState(state);
        expect(other.getViewState()).toEqual(state);
    });
});
