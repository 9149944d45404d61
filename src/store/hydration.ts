import type { Primitive } from '../lib/geometry/primitives';
import { HitTester, type HitTestConfig } from '../lib/selection/HitTester';
import { SnappingEngine, type SnappingConfig } from '../lib/snapping';
import { ID } from '../lib/utils/id-generator';

export interface SceneStateFixture {
    objects?: Primitive[];
    snapping?: Partial<SnappingConfig>;
    hitTest?: Partial<HitTestConfig>;
    selectedId?: string | null;
}

export interface HydratedPatch {
    objects?: Primitive[];
    snappingEngine?: SnappingEngine;
    snappingEnabled?: boolean;
    hitTester?: HitTester;
    selectedId?: string | null;
}

export function buildHydratedPatch(fixture: SceneStateFixture): HydratedPatch {
    const patch: HydratedPatch = {};

    if (fixture.objects !== undefined) {
        ID.reseed(fixture.objects.map(o => o.id));
        patch.objects = [...fixture.objects];
    }
    if (fixture.snapping !== undefined) {
        patch.snappingEngine = new SnappingEngine(fixture.snapping);
        patch.snappingEnabled = patch.snappingEngine.enabled;
    }
    if (fixture.hitTest !== undefined) patch.hitTester = new HitTester(fixture.hitTest);
    if (fixture.selectedId !== undefined) patch.selectedId = fixture.selectedId;

    return patch;
}
