import type { GraphChange, GraphDelta } from '@/pure/graph'

/**
 * Computes the reverse of a GraphDelta for undo functionality.
 *
 * - AddNode / AddEdge → RemoveNode / RemoveEdge of the same record
 * - RemoveNode / RemoveEdge → AddNode / AddEdge recreating the record with its original id and position
 * - UpdateNode / UpdateEdge → update restoring the previous record
 *
 * Changes are processed in reverse order so that related changes undo cleanly
 * (e.g. a node removal lists its edges first, so the undo recreates the node first).
 */
export function reverseDelta(delta: GraphDelta): GraphDelta {
    return [...delta].reverse().map(reverseChange)
}

function reverseChange(change: GraphChange): GraphChange {
    switch (change.type) {
        case 'AddNode':
            return { type: 'RemoveNode', node: change.node }
        case 'RemoveNode':
            return { type: 'AddNode', node: change.node, needsPlacement: false }
        case 'UpdateNode':
            // Swap old/new for the redo chain
            return { type: 'UpdateNode', node: change.previousNode, previousNode: change.node }
        case 'AddEdge':
            return { type: 'RemoveEdge', edge: change.edge }
        case 'RemoveEdge':
            return { type: 'AddEdge', edge: change.edge }
        case 'UpdateEdge':
            return { type: 'UpdateEdge', edge: change.previousEdge, previousEdge: change.edge }
    }
}
