import type { PointLike } from '../geometry/Point';
import { distance } from '../geometry/math';
import type { Primitive } from '../geometry/primitives';
import { findIntersections, findPerpendicular, findTangents } from '../geometry/intersections';
import { SNAP_KINDS, isSnapKind, type SnapKind, type SnapPoint } from '../geometry/types';
import { NearestSearch } from '../search/NearestSearch';
import type { SnapSettingsRecord } from '../serialization/schemas';
import type { ViewTransform } from '../view/ViewTransform';
import { coerceRadius } from '../geometry/primitives/coerce';
import { logger } from '../utils/Logger';
import {
    DEFAULT_SNAPPING_CONFIG,
    type SnapQueryOptions,
    type SnapResult,
    type SnappingConfig,
} from './types';

/**
 * Finds the snap point nearest to the cursor.
 *
 * Candidates compete by distance only: the first one strictly closer than
 * everything before it (and than the tolerance) wins. Nearest-point and grid
 * snaps are fallbacks that only apply when nothing else matched.
 */
export class SnappingEngine {
    private config: SnappingConfig;

    constructor(config: Partial<SnappingConfig> = {}) {
        this.config = SnappingEngine.validated({ ...DEFAULT_SNAPPING_CONFIG, ...config });
    }

    /** Snap radius is kept a finite magnitude so saved settings always load. */
    private static validated(config: SnappingConfig): SnappingConfig {
        const { snapRadius } = config;
        if (!Number.isFinite(snapRadius)) {
            logger.warn(`[SnappingEngine] snap radius ${snapRadius} is not finite; using ${DEFAULT_SNAPPING_CONFIG.snapRadius}`);
            return { ...config, snapRadius: DEFAULT_SNAPPING_CONFIG.snapRadius };
        }
        return { ...config, snapRadius: coerceRadius(snapRadius, 'SnappingEngine', 'snap radius') };
    }

    /**
     * Update configuration
     */
    setConfig(config: Partial<SnappingConfig>) {
        this.config = SnappingEngine.validated({ ...this.config, ...config });
    }

    getConfig(): SnappingConfig {
        return { ...this.config, activeKinds: [...this.config.activeKinds] };
    }

    get enabled(): boolean {
        return this.config.enabled;
    }

    setEnabled(enabled: boolean) {
        this.config = { ...this.config, enabled };
    }

    isKindActive(kind: SnapKind): boolean {
        return this.config.activeKinds.includes(kind);
    }

    setKindActive(kind: SnapKind, active: boolean) {
        const others = this.config.activeKinds.filter(k => k !== kind);
        this.config = { ...this.config, activeKinds: active ? [...others, kind] : others };
    }

    toggleKind(kind: SnapKind) {
        this.setKindActive(kind, !this.isKindActive(kind));
    }

    /**
     * Nearest snap point to (x, y) within `tolerance` scene units.
     */
    findSnap(
        x: number,
        y: number,
        primitives: readonly Primitive[],
        tolerance: number,
        options: SnapQueryOptions = {}
    ): SnapPoint | null {
        const { exclude = null, referencePoint = null } = options;
        if (!this.config.enabled || this.config.activeKinds.length === 0) return null;

        const candidates = primitives.filter(p => p !== exclude);
        const search = new NearestSearch<SnapPoint>(tolerance);
        const offer = (point: SnapPoint) => {
            search.offer(point, distance(x, y, point.x, point.y));
        };

        // 1. Points every primitive defines (endpoints, centers, ...)
        for (const prim of candidates) {
            for (const point of prim.snapPoints()) {
                if (this.isKindActive(point.kind)) offer(point);
            }
        }

        // Constructed snaps only look at primitives near the cursor
        const nearby = candidates.filter(p => p.distanceToPoint(x, y) <= tolerance * 2);

        // 2. Intersections between nearby boundaries
        if (this.isKindActive('intersection')) {
            for (let i = 0; i < nearby.length; i++) {
                for (let j = i + 1; j < nearby.length; j++) {
                    for (const p of findIntersections(nearby[i], nearby[j])) {
                        offer({ x: p.x, y: p.y, kind: 'intersection', source: nearby[i] });
                    }
                }
            }
        }

        // 3. Perpendicular and tangent from the construction start
        if (referencePoint) {
            const perpendicular = this.isKindActive('perpendicular');
            const tangent = this.isKindActive('tangent');
            for (const prim of nearby) {
                if (perpendicular) {
                    const foot = findPerpendicular(referencePoint, prim);
                    if (foot) offer({ x: foot.x, y: foot.y, kind: 'perpendicular', source: prim });
                }
                if (tangent) {
                    for (const p of findTangents(referencePoint, prim)) {
                        offer({ x: p.x, y: p.y, kind: 'tangent', source: prim });
                    }
                }
            }
        }

        if (search.item) return search.item;

        // 4. Fallbacks
        if (this.isKindActive('nearest')) {
            for (const prim of candidates) {
                const p = prim.closestPoint(x, y);
                offer({ x: p.x, y: p.y, kind: 'nearest', source: prim });
            }
            if (search.item) return search.item;
        }

        if (this.isKindActive('grid')) {
            const { gridSize } = this.config;
            if (gridSize > 0) {
                offer({
                    x: Math.round(x / gridSize) * gridSize,
                    y: Math.round(y / gridSize) * gridSize,
                    kind: 'grid',
                });
            }
        }

        return search.item;
    }

    /**
     * Snaps a screen-space cursor. The tolerance is the snap radius
     * converted to scene units at the current zoom.
     */
    findSnapScreen(
        screen: PointLike,
        primitives: readonly Primitive[],
        view: ViewTransform,
        options: SnapQueryOptions = {}
    ): SnapResult | null {
        if (!this.config.enabled) return null;

        const scene = view.toScene(screen);
        const tolerance = this.config.snapRadius / view.zoom;
        const point = this.findSnap(scene.x, scene.y, primitives, tolerance, options);
        if (!point) return null;

        return {
            point,
            distance: distance(scene.x, scene.y, point.x, point.y),
            screen: view.fromScene(point),
        };
    }

    toRecord(): SnapSettingsRecord {
        return {
            enabled: this.config.enabled,
            snap_radius: this.config.snapRadius,
            active_snaps: SNAP_KINDS.filter(kind => this.isKindActive(kind)),
        };
    }

    /** Unknown kind names are ignored. */
    applyRecord(record: SnapSettingsRecord) {
        this.config = SnappingEngine.validated({
            ...this.config,
            enabled: record.enabled,
            snapRadius: record.snap_radius,
            activeKinds: record.active_snaps.filter(isSnapKind),
        });
    }
}
