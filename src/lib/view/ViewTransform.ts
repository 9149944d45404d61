/**
 * Screen ↔ scene mapping.
 *
 * Screen space has its origin at the viewport's top-left corner with Y
 * growing downward. Scene space has Y growing upward. The camera is the
 * scene point shown at the viewport center; `rotation` turns the view
 * counter-clockwise, in degrees.
 */

import { Point, type PointLike } from '../geometry/Point';
import { normalizeDegrees, toRadians } from '../geometry/math';
import { boundsOfPoints, type BoundingBox } from '../geometry/types';
import type { ViewStateRecord } from '../serialization/schemas';
import { logger } from '../utils/Logger';

export interface ViewConfig {
    minZoom: number;
    maxZoom: number;
    /** Zoom factor applied per `zoomBy` step. */
    zoomStep: number;
    /** Margin added around fitted bounds, as a fraction of their size on each side. */
    fitPadding: number;
}

export const DEFAULT_VIEW_CONFIG: ViewConfig = {
    minZoom: 0.1,
    maxZoom: 10,
    zoomStep: 1.15,
    fitPadding: 0.1,
};

export interface ViewportSize {
    width: number;
    height: number;
}

export interface ViewportCorners {
    topLeft: Point;
    topRight: Point;
    bottomLeft: Point;
    bottomRight: Point;
}

export interface ViewTransformOptions {
    viewport?: ViewportSize;
    camera?: PointLike;
    zoom?: number;
    rotation?: number;
    config?: Partial<ViewConfig>;
}

// Fitted extents below this are treated as empty.
const MIN_FIT_EXTENT = 0.01;
const EMPTY_FIT_EXTENT = 10;

export class ViewTransform {
    private config: ViewConfig;
    private _camera: Point;
    private _zoom: number;
    private _rotation: number;
    private _viewport: ViewportSize;

    constructor(options: ViewTransformOptions = {}) {
        this.config = { ...DEFAULT_VIEW_CONFIG, ...options.config };
        this._viewport = { ...(options.viewport ?? { width: 800, height: 600 }) };
        this._camera = Point.from(options.camera ?? { x: 0, y: 0 });
        this._zoom = ViewTransform.validZoom(options.zoom ?? 1);
        this._rotation = normalizeDegrees(options.rotation ?? 0);
    }

    private static validZoom(zoom: number): number {
        if (zoom > 0 && Number.isFinite(zoom)) return zoom;
        logger.warn(`[ViewTransform] zoom must be positive and finite, got ${zoom}; using 1`);
        return 1;
    }

    setConfig(config: Partial<ViewConfig>) {
        this.config = { ...this.config, ...config };
    }

    getConfig(): ViewConfig {
        return { ...this.config };
    }

    get camera(): Point { return this._camera; }
    get zoom(): number { return this._zoom; }
    get rotation(): number { return this._rotation; }
    get viewport(): ViewportSize { return { ...this._viewport }; }

    toScene(screen: PointLike): Point {
        const cx = screen.x - this._viewport.width / 2;
        const cy = this._viewport.height / 2 - screen.y;

        const theta = toRadians(this._rotation);
        const cos = Math.cos(theta);
        const sin = Math.sin(theta);
        const rx = cx * cos + cy * sin;
        const ry = -cx * sin + cy * cos;

        return new Point(
            rx / this._zoom + this._camera.x,
            ry / this._zoom + this._camera.y
        );
    }

    fromScene(scene: PointLike): Point {
        const dx = (scene.x - this._camera.x) * this._zoom;
        const dy = (scene.y - this._camera.y) * this._zoom;

        const theta = toRadians(this._rotation);
        const cos = Math.cos(theta);
        const sin = Math.sin(theta);
        const rx = dx * cos - dy * sin;
        const ry = dx * sin + dy * cos;

        return new Point(
            rx + this._viewport.width / 2,
            this._viewport.height / 2 - ry
        );
    }

    /** Viewport corners in scene space. */
    viewportCorners(): ViewportCorners {
        const { width, height } = this._viewport;
        return {
            topLeft: this.toScene({ x: 0, y: 0 }),
            topRight: this.toScene({ x: width, y: 0 }),
            bottomLeft: this.toScene({ x: 0, y: height }),
            bottomRight: this.toScene({ x: width, y: height }),
        };
    }

    /** Axis-aligned scene box covering the viewport, rotation included. */
    visibleBounds(): BoundingBox {
        const c = this.viewportCorners();
        return boundsOfPoints([c.topLeft, c.topRight, c.bottomLeft, c.bottomRight]);
    }

    setCamera(camera: PointLike) {
        this._camera = Point.from(camera);
    }

    /** Clamps to the configured range and returns the zoom applied. */
    setZoom(zoom: number): number {
        const { minZoom, maxZoom } = this.config;
        this._zoom = Math.max(minZoom, Math.min(maxZoom, ViewTransform.validZoom(zoom)));
        return this._zoom;
    }

    /**
     * Zooms so the scene point under `anchor` (screen space, default the
     * viewport center) stays under it.
     */
    zoomAt(zoom: number, anchor?: PointLike): number {
        const screen = anchor ?? { x: this._viewport.width / 2, y: this._viewport.height / 2 };
        const before = this.toScene(screen);
        const applied = this.setZoom(zoom);
        const after = this.toScene(screen);
        this._camera = this._camera.add(before.sub(after));
        return applied;
    }

    /** Positive steps zoom in, negative zoom out. */
    zoomBy(steps: number, anchor?: PointLike): number {
        return this.zoomAt(this._zoom * Math.pow(this.config.zoomStep, steps), anchor);
    }

    /**
     * Moves the view with a screen-space drag so the content follows the
     * pointer.
     */
    panByScreenDelta(dx: number, dy: number) {
        const theta = toRadians(this._rotation);
        const cos = Math.cos(theta);
        const sin = Math.sin(theta);
        // screen Y grows downward
        const sx = dx;
        const sy = -dy;
        const sceneDx = (sx * cos + sy * sin) / this._zoom;
        const sceneDy = (-sx * sin + sy * cos) / this._zoom;
        this._camera = new Point(this._camera.x - sceneDx, this._camera.y - sceneDy);
    }

    setRotation(degrees: number) {
        this._rotation = normalizeDegrees(degrees);
    }

    rotateBy(degrees: number) {
        this.setRotation(this._rotation + degrees);
    }

    resize(width: number, height: number) {
        this._viewport = { width, height };
    }

    /**
     * Centers `bounds` and zooms so they fill the viewport, padded on each
     * side and accounting for rotation. Without bounds the view returns to
     * zoom 1 at the origin.
     */
    zoomToFit(bounds: BoundingBox | null, padding = this.config.fitPadding) {
        if (!bounds) {
            this.setZoom(1);
            this._camera = new Point(0, 0);
            return;
        }

        let width = (bounds.maxX - bounds.minX) * (1 + padding * 2);
        let height = (bounds.maxY - bounds.minY) * (1 + padding * 2);
        if (width < MIN_FIT_EXTENT) width = EMPTY_FIT_EXTENT;
        if (height < MIN_FIT_EXTENT) height = EMPTY_FIT_EXTENT;

        const theta = toRadians(this._rotation);
        const cos = Math.abs(Math.cos(theta));
        const sin = Math.abs(Math.sin(theta));
        const { width: vw, height: vh } = this._viewport;
        const effectiveWidth = vw * cos + vh * sin;
        const effectiveHeight = vw * sin + vh * cos;

        this.setZoom(Math.min(effectiveWidth / width, effectiveHeight / height));
        this._camera = new Point(
            (bounds.minX + bounds.maxX) / 2,
            (bounds.minY + bounds.maxY) / 2
        );
    }

    getViewState(): ViewStateRecord {
        return {
            camera_pos: this._camera.toRecord(),
            zoom_factor: this._zoom,
            rotation_angle: this._rotation,
        };
    }

    /** Restores a saved view. The zoom is taken as saved, not clamped. */
    setViewState(state: ViewStateRecord) {
        this._camera = Point.from(state.camera_pos);
        this._zoom = ViewTransform.validZoom(state.zoom_factor);
        this._rotation = normalizeDegrees(state.rotation_angle);
    }
}
