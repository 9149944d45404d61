/**
 * HitTester - picks the primitive under the cursor.
 *
 * Whole primitives compete on boundary distance (`distanceToPoint`). A hit
 * must be strictly inside the threshold; the first of equally close
 * primitives wins, so callers control precedence through list order.
 */

import type { PointLike } from '../geometry/Point';
import type { Primitive } from '../geometry/primitives';
import { NearestSearch } from '../search/NearestSearch';
import type { ViewTransform } from '../view/ViewTransform';

export interface HitTestConfig {
    /** Pick threshold in screen units */
    threshold: number;
}

export const DEFAULT_HIT_TEST_CONFIG: HitTestConfig = {
    threshold: 10,
};

export interface HitResult {
    primitive: Primitive;
    /** Scene-space distance from the query point to the boundary */
    distance: number;
}

export class HitTester {
    private config: HitTestConfig;

    constructor(config: Partial<HitTestConfig> = {}) {
        this.config = { ...DEFAULT_HIT_TEST_CONFIG, ...config };
    }

    setConfig(config: Partial<HitTestConfig>) {
        this.config = { ...this.config, ...config };
    }

    getConfig(): HitTestConfig {
        return { ...this.config };
    }

    /**
     * Closest primitive to (x, y) within `tolerance` scene units.
     */
    hitTest(x: number, y: number, primitives: readonly Primitive[], tolerance: number): HitResult | null {
        const search = new NearestSearch<Primitive>(tolerance);
        for (const primitive of primitives) {
            search.offer(primitive, primitive.distanceToPoint(x, y));
        }
        const best = search.result();
        return best ? { primitive: best.item, distance: best.distance } : null;
    }

    hitTestScreen(screen: PointLike, primitives: readonly Primitive[], view: ViewTransform): HitResult | null {
        const scene = view.toScene(screen);
        return this.hitTest(scene.x, scene.y, primitives, this.config.threshold / view.zoom);
    }
}
