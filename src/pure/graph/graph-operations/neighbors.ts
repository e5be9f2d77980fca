import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { EdgeId, Graph, GraphEdge, GraphError, GraphNode, NodeId } from '@/pure/graph'

/**
 * Neighbour queries backed by the adjacency index: O(degree), no edge scan.
 */

export function getIncidentEdges(graph: Graph, nodeId: NodeId): E.Either<GraphError, readonly GraphEdge[]> {
    const incident: ReadonlySet<EdgeId> | undefined = graph.adjacency.get(nodeId)
    if (!incident || !graph.nodes.has(nodeId)) {
        return E.left({ type: 'UnknownNode', nodeId })
    }
    return E.right(Array.from(incident).flatMap((edgeId: EdgeId) => {
        const edge: GraphEdge | undefined = graph.edges.get(edgeId)
        return edge ? [edge] : []
    }))
}

/** The endpoint of `edge` that is not `nodeId` (the node itself for a self-loop). */
export function otherEndpoint(edge: GraphEdge, nodeId: NodeId): NodeId {
    return edge.source === nodeId ? edge.target : edge.source
}

function distinct(ids: readonly NodeId[]): readonly NodeId[] {
    return Array.from(new Set(ids))
}

/**
 * Every node sharing an edge with `nodeId`, regardless of direction,
 * in the order the incident edges were created.
 */
export function getNeighbors(graph: Graph, nodeId: NodeId): E.Either<GraphError, readonly NodeId[]> {
    return E.map((edges: readonly GraphEdge[]) =>
        distinct(edges.map((edge: GraphEdge) => otherEndpoint(edge, nodeId)))
    )(getIncidentEdges(graph, nodeId))
}

/** Targets of outgoing edges. Same as getNeighbors for undirected graphs. */
export function getSuccessors(graph: Graph, nodeId: NodeId): E.Either<GraphError, readonly NodeId[]> {
    if (graph.mode === 'undirected') {
        return getNeighbors(graph, nodeId)
    }
    return E.map((edges: readonly GraphEdge[]) =>
        distinct(edges.filter((edge: GraphEdge) => edge.source === nodeId).map((edge: GraphEdge) => edge.target))
    )(getIncidentEdges(graph, nodeId))
}

/** Sources of incoming edges. Same as getNeighbors for undirected graphs. */
export function getPredecessors(graph: Graph, nodeId: NodeId): E.Either<GraphError, readonly NodeId[]> {
    if (graph.mode === 'undirected') {
        return getNeighbors(graph, nodeId)
    }
    return E.map((edges: readonly GraphEdge[]) =>
        distinct(edges.filter((edge: GraphEdge) => edge.target === nodeId).map((edge: GraphEdge) => edge.source))
    )(getIncidentEdges(graph, nodeId))
}

/** First node (lowest id) carrying exactly this label. */
export function findNodeByLabel(graph: Graph, label: string): O.Option<GraphNode> {
    return O.fromNullable(
        Array.from(graph.nodes.values())
            .filter((node: GraphNode) => node.label === label)
            .sort((a: GraphNode, b: GraphNode) => a.id - b.id)[0]
    )
}
