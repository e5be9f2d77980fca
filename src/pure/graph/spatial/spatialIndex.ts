/**
 * Spatial index over node label boxes, in terminal cell coordinates.
 *
 * Rects are inclusive on both ends, the same as rbush's intersection test,
 * so a rect { minX: 3, maxX: 5 } covers columns 3, 4 and 5.
 * Only dependency: rbush.
 */

import RBush from 'rbush';

// ============================================================================
// Types
// ============================================================================

export interface Rect {
    readonly minX: number;
    readonly minY: number;
    readonly maxX: number;
    readonly maxY: number;
}

/** Node bounding box entry. */
export interface SpatialNodeEntry extends Rect {
    readonly nodeId: number;
}

export interface SpatialIndex {
    readonly nodeTree: RBush<SpatialNodeEntry>;
}

// ============================================================================
// Construction
// ============================================================================

/** Create a spatial index by bulk-loading node boxes. O(n log n). */
export function createSpatialIndex(nodes: readonly SpatialNodeEntry[]): SpatialIndex {
    const nodeTree: RBush<SpatialNodeEntry> = new RBush<SpatialNodeEntry>();
    nodeTree.load([...nodes]);
    return { nodeTree };
}

// ============================================================================
// Queries (pure: index in, data out, no mutation)
// ============================================================================

/** Fast boolean: does any node box intersect the given rect? Uses rbush.collides(). */
export function hasNodeCollision(index: SpatialIndex, rect: Rect): boolean {
    return index.nodeTree.collides(rect);
}

// ============================================================================
// Mutation (the index is owned by a single frame composition)
// ============================================================================

/** Insert a single node entry. O(log n). */
export function insertNode(index: SpatialIndex, entry: SpatialNodeEntry): void {
    index.nodeTree.insert(entry);
}
