export { Point, type PointLike } from './lib/geometry/Point';
export * from './lib/geometry/math';
export * from './lib/geometry/types';
export * from './lib/geometry/primitives';
export {
    findIntersections,
    findPerpendicular,
    findTangents,
} from './lib/geometry/intersections';

export * from './lib/snapping';
export * from './lib/selection/HitTester';
export * from './lib/view/ViewTransform';
export { NearestSearch } from './lib/search/NearestSearch';

export * from './lib/serialization/schemas';
export * from './lib/serialization/errors';
export { encodePrimitive, decodePrimitive } from './lib/serialization/codec';
export * from './lib/serialization/project';

export { createSceneStore, type SceneStore, type SceneStateFixture } from './store/createSceneStore';
export type { SceneState, ObjectSlice, SnappingSlice, SelectionSlice } from './store/types';

export { logger, type LogEntry, type LogLevel } from './lib/utils/Logger';
export { ID } from './lib/utils/id-generator';
