/**
 * Graph creation utilities that ensure the adjacency index is initialized.
 */

import type { EdgeVisualState, Graph, GraphMode, NodeVisualState } from '@/pure/graph'

export const DEFAULT_NODE_STATE: NodeVisualState = { selected: false, highlighted: false, pinned: false }

export const DEFAULT_EDGE_STATE: EdgeVisualState = { selected: false, highlighted: false }

/**
 * Create an empty graph with an initialized (empty) adjacency index.
 * Ids start at 1 so that 0 never names a live node.
 */
export function createEmptyGraph(mode: GraphMode = 'directed'): Graph {
    return {
        mode,
        nodes: new Map(),
        edges: new Map(),
        adjacency: new Map(),
        nextNodeId: 1,
        nextEdgeId: 1
    }
}
