import type { EdgeId, Graph, GraphChange, GraphDelta, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import { AdjacencyDraft } from '@/pure/graph/graph-operations/adjacencyIndex'

/**
 * Apply a GraphDelta to a Graph, producing a new Graph.
 *
 * Pure function: same input -> same output, no side effects.
 * The maps are copied once per delta, not once per change.
 *
 * Handles:
 * - AddNode / AddEdge: inserts the record and bumps the id counters past it
 * - RemoveNode / RemoveEdge: removes the record if still present
 * - UpdateNode: replaces a live node's record (label, position, visual state)
 * - UpdateEdge: replaces a live edge's weight or visual state (endpoints are fixed)
 *
 * An AddEdge whose endpoints are not both live is dropped, so the adjacency
 * index can never reference a dead node. Validation with a proper error
 * happens earlier, in graph-mutations.
 *
 * @example
 * ```typescript
 * const { delta } = fromAddNodeToDelta(createEmptyGraph(), 'A', O.none)
 * const graph: Graph = applyGraphDeltaToGraph(createEmptyGraph(), delta)
 * ```
 */
export function applyGraphDeltaToGraph(graph: Graph, delta: GraphDelta): Graph {
    if (delta.length === 0) {
        return graph
    }
    const draft: GraphDraft = {
        nodes: new Map(graph.nodes),
        edges: new Map(graph.edges),
        adjacency: new AdjacencyDraft(graph.adjacency),
        nextNodeId: graph.nextNodeId,
        nextEdgeId: graph.nextEdgeId
    }
    delta.forEach((change: GraphChange) => applyChange(draft, change))
    return {
        ...graph,
        nodes: draft.nodes,
        edges: draft.edges,
        adjacency: draft.adjacency.toIndex(),
        nextNodeId: draft.nextNodeId,
        nextEdgeId: draft.nextEdgeId
    }
}

interface GraphDraft {
    readonly nodes: Map<NodeId, GraphNode>
    readonly edges: Map<EdgeId, GraphEdge>
    readonly adjacency: AdjacencyDraft
    nextNodeId: number
    nextEdgeId: number
}

function applyChange(draft: GraphDraft, change: GraphChange): void {
    switch (change.type) {
        case 'AddNode':
            return addNode(draft, change.node)
        case 'RemoveNode':
            return removeNode(draft, change.node)
        case 'UpdateNode':
            return updateNode(draft, change.node)
        case 'AddEdge':
            return addEdge(draft, change.edge)
        case 'RemoveEdge':
            return removeEdge(draft, change.edge)
        case 'UpdateEdge':
            return updateEdge(draft, change.edge)
    }
}

function addNode(draft: GraphDraft, node: GraphNode): void {
    draft.nodes.set(node.id, node)
    draft.adjacency.addNode(node.id)
    draft.nextNodeId = Math.max(draft.nextNodeId, node.id + 1)
}

function removeNode(draft: GraphDraft, node: GraphNode): void {
    if (!draft.nodes.has(node.id)) {
        return
    }
    // Any edge still touching the node goes with it
    Array.from(draft.adjacency.incident(node.id)).forEach((edgeId: EdgeId) => {
        const edge: GraphEdge | undefined = draft.edges.get(edgeId)
        if (edge) {
            removeEdge(draft, edge)
        }
    })
    draft.nodes.delete(node.id)
    draft.adjacency.removeNode(node.id)
}

function updateNode(draft: GraphDraft, node: GraphNode): void {
    if (draft.nodes.has(node.id)) {
        draft.nodes.set(node.id, node)
    }
}

function addEdge(draft: GraphDraft, edge: GraphEdge): void {
    if (!draft.nodes.has(edge.source) || !draft.nodes.has(edge.target)) {
        return
    }
    // Re-adding an existing id (undo/redo replay) must not leave the old endpoints indexed
    const previous: GraphEdge | undefined = draft.edges.get(edge.id)
    if (previous) {
        draft.adjacency.removeEdge(previous)
    }
    draft.edges.set(edge.id, edge)
    draft.adjacency.addEdge(edge)
    draft.nextEdgeId = Math.max(draft.nextEdgeId, edge.id + 1)
}

function removeEdge(draft: GraphDraft, edge: GraphEdge): void {
    const existing: GraphEdge | undefined = draft.edges.get(edge.id)
    if (!existing) {
        return
    }
    draft.edges.delete(edge.id)
    draft.adjacency.removeEdge(existing)
}

function updateEdge(draft: GraphDraft, edge: GraphEdge): void {
    const existing: GraphEdge | undefined = draft.edges.get(edge.id)
    if (existing) {
        draft.edges.set(edge.id, { ...edge, source: existing.source, target: existing.target })
    }
}
