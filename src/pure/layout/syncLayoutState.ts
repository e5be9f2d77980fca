import type { Graph, GraphChange, GraphDelta, NodeId } from '@/pure/graph'
import { isTopologyDelta } from '@/pure/graph'
import { reheat } from '@/pure/layout/forceSimulation'
import { getNodesNeedingPlacement, seedPositions } from '@/pure/layout/seedPositions'
import type { Body, LayoutParams, LayoutState, PositionUpdates, RandomSource } from '@/pure/layout/types'

export interface SyncResult {
    readonly state: LayoutState
    readonly seeds: PositionUpdates
}

function changesPinState(change: GraphChange): boolean {
    return change.type === 'UpdateNode' && change.node.state.pinned !== change.previousNode.state.pinned
}

/**
 * Patch the layout state after `delta` was applied to produce `graph`.
 * New nodes get a body and, when they have no position, a seeded one.
 * Removed nodes lose their body. Everything else keeps its velocity.
 */
export function syncLayoutState(
    state: LayoutState,
    graph: Graph,
    delta: GraphDelta,
    params: LayoutParams,
    random: RandomSource
): SyncResult {
    const bodies: Map<NodeId, Body> = new Map()
    graph.nodes.forEach((_node, id: NodeId) => {
        bodies.set(id, state.bodies.get(id) ?? { velocity: { x: 0, y: 0 } })
    })
    const seeds: PositionUpdates = seedPositions(graph, getNodesNeedingPlacement(delta), params, random)

    const patched: LayoutState = { ...state, bodies }
    const invalidated: boolean = isTopologyDelta(delta) || delta.some(changesPinState)
    return {
        state: invalidated ? reheat(patched, params) : patched,
        seeds,
    }
}
