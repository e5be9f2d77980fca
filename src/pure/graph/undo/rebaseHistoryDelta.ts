import type { Graph, GraphChange, GraphDelta, GraphEdge, GraphNode } from '@/pure/graph'
import { DEFAULT_EDGE_STATE, DEFAULT_NODE_STATE } from '@/pure/graph/createGraph'

/**
 * Prepare a recorded (or reversed) delta for re-application on the current graph.
 *
 * History keeps full records, but only topology and labels are undoable:
 * - restored nodes and edges come back unselected and unhighlighted
 *   (a restored node keeps its pin)
 * - label updates touch the label only, so the node keeps its current
 *   position and visual state
 */
export function rebaseHistoryDelta(graph: Graph, delta: GraphDelta): GraphDelta {
    return delta.map((change: GraphChange): GraphChange => {
        switch (change.type) {
            case 'AddNode':
                return { ...change, node: { ...change.node, state: { ...DEFAULT_NODE_STATE, pinned: change.node.state.pinned } } }
            case 'AddEdge':
                return { ...change, edge: { ...change.edge, state: DEFAULT_EDGE_STATE } }
            case 'UpdateNode': {
                const current: GraphNode | undefined = graph.nodes.get(change.node.id)
                return current ? { type: 'UpdateNode', node: { ...current, label: change.node.label }, previousNode: current } : change
            }
            case 'UpdateEdge': {
                const current: GraphEdge | undefined = graph.edges.get(change.edge.id)
                return current ? { type: 'UpdateEdge', edge: { ...current, weight: change.edge.weight }, previousEdge: current } : change
            }
            case 'RemoveNode':
            case 'RemoveEdge':
                return change
        }
    })
}
