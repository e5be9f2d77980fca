export {
    createSpatialIndex,
    hasNodeCollision,
    insertNode,
} from './spatialIndex';

export type {
    Rect,
    SpatialNodeEntry,
    SpatialIndex,
} from './spatialIndex';
