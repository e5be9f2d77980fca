import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type {
    DeltaWithId,
    EdgeId,
    Graph,
    GraphChange,
    GraphDelta,
    GraphEdge,
    GraphError,
    GraphNode,
    NodeId,
    Position
} from '@/pure/graph'
import { DEFAULT_EDGE_STATE, DEFAULT_NODE_STATE } from '@/pure/graph/createGraph'

/**
 * Pure delta creators.
 *
 * Each function validates against the current graph and describes the mutation
 * as a GraphDelta; nothing is applied here. A Left means the graph must stay
 * untouched, which makes every store mutation atomic.
 */

const unknownNode: (nodeId: NodeId) => GraphError = (nodeId: NodeId): GraphError => ({ type: 'UnknownNode', nodeId })
const unknownEdge: (edgeId: EdgeId) => GraphError = (edgeId: EdgeId): GraphError => ({ type: 'UnknownEdge', edgeId })

const ORIGIN: Position = { x: 0, y: 0 }

/**
 * Without a position the node is parked at the origin and flagged so the
 * layout engine seeds it next to its neighbours.
 */
export function fromAddNodeToDelta(graph: Graph, label: string, position: O.Option<Position>): DeltaWithId<NodeId> {
    const node: GraphNode = {
        id: graph.nextNodeId,
        label,
        position: O.getOrElse((): Position => ORIGIN)(position),
        state: DEFAULT_NODE_STATE
    }
    return { id: node.id, delta: [{ type: 'AddNode', node, needsPlacement: O.isNone(position) }] }
}

export function fromAddEdgeToDelta(
    graph: Graph,
    source: NodeId,
    target: NodeId,
    weight: O.Option<number>
): E.Either<GraphError, DeltaWithId<EdgeId>> {
    if (!graph.nodes.has(source)) {
        return E.left(unknownNode(source))
    }
    if (!graph.nodes.has(target)) {
        return E.left(unknownNode(target))
    }
    const edge: GraphEdge = {
        id: graph.nextEdgeId,
        source,
        target,
        weight,
        state: DEFAULT_EDGE_STATE
    }
    return E.right({ id: edge.id, delta: [{ type: 'AddEdge', edge }] })
}

/**
 * Removing a node removes exactly its incident edges, listed before the node
 * itself so that reversing the delta recreates the node before its edges.
 */
export function fromRemoveNodeToDelta(graph: Graph, nodeId: NodeId): E.Either<GraphError, GraphDelta> {
    const node: GraphNode | undefined = graph.nodes.get(nodeId)
    if (!node) {
        return E.left(unknownNode(nodeId))
    }
    const incidentEdgeRemovals: readonly GraphChange[] = Array.from(graph.adjacency.get(nodeId) ?? [])
        .flatMap((edgeId: EdgeId): readonly GraphChange[] => {
            const edge: GraphEdge | undefined = graph.edges.get(edgeId)
            return edge ? [{ type: 'RemoveEdge', edge }] : []
        })
    return E.right([...incidentEdgeRemovals, { type: 'RemoveNode', node }])
}

export function fromRemoveEdgeToDelta(graph: Graph, edgeId: EdgeId): E.Either<GraphError, GraphDelta> {
    const edge: GraphEdge | undefined = graph.edges.get(edgeId)
    if (!edge) {
        return E.left(unknownEdge(edgeId))
    }
    return E.right([{ type: 'RemoveEdge', edge }])
}

/**
 * Describe an in-place node update (label, position or visual state).
 * An update that changes nothing yields an empty delta.
 */
export function fromUpdateNodeToDelta(
    graph: Graph,
    nodeId: NodeId,
    update: (node: GraphNode) => GraphNode
): E.Either<GraphError, GraphDelta> {
    const previousNode: GraphNode | undefined = graph.nodes.get(nodeId)
    if (!previousNode) {
        return E.left(unknownNode(nodeId))
    }
    const node: GraphNode = update(previousNode)
    return E.right(nodesEqual(node, previousNode) ? [] : [{ type: 'UpdateNode', node, previousNode }])
}

export function fromUpdateEdgeToDelta(
    graph: Graph,
    edgeId: EdgeId,
    update: (edge: GraphEdge) => GraphEdge
): E.Either<GraphError, GraphDelta> {
    const previousEdge: GraphEdge | undefined = graph.edges.get(edgeId)
    if (!previousEdge) {
        return E.left(unknownEdge(edgeId))
    }
    const edge: GraphEdge = update(previousEdge)
    const unchanged: boolean = edge.state.selected === previousEdge.state.selected
        && edge.state.highlighted === previousEdge.state.highlighted
        && O.getEq({ equals: (a: number, b: number) => a === b }).equals(edge.weight, previousEdge.weight)
    return E.right(unchanged ? [] : [{ type: 'UpdateEdge', edge, previousEdge }])
}

function nodesEqual(a: GraphNode, b: GraphNode): boolean {
    return a.label === b.label
        && a.position.x === b.position.x
        && a.position.y === b.position.y
        && a.state.selected === b.state.selected
        && a.state.highlighted === b.state.highlighted
        && a.state.pinned === b.state.pinned
}

/**
 * A delta changes topology when it adds or removes nodes or edges.
 * Label, weight and visual-state updates do not.
 */
export function isTopologyDelta(delta: GraphDelta): boolean {
    return delta.some((change: GraphChange) => change.type !== 'UpdateNode' && change.type !== 'UpdateEdge')
}
