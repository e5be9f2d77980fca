import type * as E from 'fp-ts/lib/Either.js'
import type * as O from 'fp-ts/lib/Option.js'
import { applyGraphDeltaToGraph } from './graphDelta/applyGraphDeltaToGraph'
import { fromAddNodeToDelta, fromAddEdgeToDelta, fromRemoveNodeToDelta, fromRemoveEdgeToDelta } from './graph-operations/graph-mutations'
import { getNeighbors } from './graph-operations/neighbors'
import { reverseDelta } from './undo/reverseDelta'


// CONTAINS TYPES AND FUNCTION TYPES

export type NodeId = number
export type EdgeId = number

export type GraphMode = 'directed' | 'undirected'

export interface Position {
    readonly x: number // world units, grows to the right
    readonly y: number // world units, grows downwards (same as terminal rows)
}

export interface NodeVisualState {
    readonly selected: boolean
    readonly highlighted: boolean
    readonly pinned: boolean // pinned nodes are skipped by the layout integrator
}

export interface EdgeVisualState {
    readonly selected: boolean
    readonly highlighted: boolean
}

export interface GraphNode {
    readonly id: NodeId
    readonly label: string
    readonly position: Position
    readonly state: NodeVisualState
}

/**
 * In undirected graphs source/target only record the order the endpoints were given in.
 */
export interface GraphEdge {
    readonly id: EdgeId
    readonly source: NodeId
    readonly target: NodeId
    readonly weight: O.Option<number>
    readonly state: EdgeVisualState
}

export type AdjacencyIndex = ReadonlyMap<NodeId, ReadonlySet<EdgeId>>

export interface Graph {
    readonly mode: GraphMode
    readonly nodes: ReadonlyMap<NodeId, GraphNode>
    readonly edges: ReadonlyMap<EdgeId, GraphEdge>
    // node id -> incident edge ids; every live node has an entry, possibly empty
    readonly adjacency: AdjacencyIndex
    readonly nextNodeId: NodeId
    readonly nextEdgeId: EdgeId
}

// ============================================================================
// GRAPH DELTAS
// ============================================================================

export type GraphDelta = readonly GraphChange[]

export type GraphChange = AddNode | RemoveNode | UpdateNode | AddEdge | RemoveEdge | UpdateEdge

export interface AddNode {
    readonly type: 'AddNode'
    readonly node: GraphNode
    // true when the node was created without a position and the layout must seed one
    readonly needsPlacement: boolean
}

export interface RemoveNode {
    readonly type: 'RemoveNode'
    readonly node: GraphNode // full record, kept for undo
}

export interface UpdateNode {
    readonly type: 'UpdateNode'
    readonly node: GraphNode
    readonly previousNode: GraphNode
}

export interface AddEdge {
    readonly type: 'AddEdge'
    readonly edge: GraphEdge
}

export interface RemoveEdge {
    readonly type: 'RemoveEdge'
    readonly edge: GraphEdge
}

export interface UpdateEdge {
    readonly type: 'UpdateEdge'
    readonly edge: GraphEdge
    readonly previousEdge: GraphEdge
}

// ============================================================================
// ERRORS
// ============================================================================

export type GraphError = UnknownNode | UnknownEdge

export interface UnknownNode {
    readonly type: 'UnknownNode'
    readonly nodeId: NodeId
}

export interface UnknownEdge {
    readonly type: 'UnknownEdge'
    readonly edgeId: EdgeId
}

export function formatGraphError(error: GraphError): string {
    switch (error.type) {
        case 'UnknownNode':
            return `unknown node #${error.nodeId}`
        case 'UnknownEdge':
            return `unknown edge #${error.edgeId}`
    }
}

// ============================================================================
// CORE FUNCTION TYPES
// ============================================================================

export interface DeltaWithId<Id> {
    readonly id: Id
    readonly delta: GraphDelta
}

export type ApplyGraphDeltaToGraph = (graph: Graph, delta: GraphDelta) => Graph

export type FromAddNodeToDelta = (graph: Graph, label: string, position: O.Option<Position>) => DeltaWithId<NodeId>

export type FromAddEdgeToDelta = (graph: Graph, source: NodeId, target: NodeId, weight: O.Option<number>) => E.Either<GraphError, DeltaWithId<EdgeId>>

export type FromRemoveNodeToDelta = (graph: Graph, nodeId: NodeId) => E.Either<GraphError, GraphDelta>

export type FromRemoveEdgeToDelta = (graph: Graph, edgeId: EdgeId) => E.Either<GraphError, GraphDelta>

export type GetNeighbors = (graph: Graph, nodeId: NodeId) => E.Either<GraphError, readonly NodeId[]>

export type ReverseDelta = (delta: GraphDelta) => GraphDelta

// === CORE GRAPH DELTA OPERATIONS ===

export { applyGraphDeltaToGraph } from './graphDelta/applyGraphDeltaToGraph'
void (applyGraphDeltaToGraph satisfies ApplyGraphDeltaToGraph)

export { fromAddNodeToDelta } from './graph-operations/graph-mutations'
void (fromAddNodeToDelta satisfies FromAddNodeToDelta)

export { fromAddEdgeToDelta } from './graph-operations/graph-mutations'
void (fromAddEdgeToDelta satisfies FromAddEdgeToDelta)

export { fromRemoveNodeToDelta } from './graph-operations/graph-mutations'
void (fromRemoveNodeToDelta satisfies FromRemoveNodeToDelta)

export { fromRemoveEdgeToDelta } from './graph-operations/graph-mutations'
void (fromRemoveEdgeToDelta satisfies FromRemoveEdgeToDelta)

export { getNeighbors } from './graph-operations/neighbors'
void (getNeighbors satisfies GetNeighbors)

export { reverseDelta } from './undo/reverseDelta'
void (reverseDelta satisfies ReverseDelta)

// === GRAPH QUERIES / UTILITIES ===
export { fromUpdateNodeToDelta, fromUpdateEdgeToDelta, isTopologyDelta } from './graph-operations/graph-mutations'
export { getIncidentEdges, getSuccessors, getPredecessors, findNodeByLabel, otherEndpoint } from './graph-operations/neighbors'
export { buildAdjacencyIndex } from './graph-operations/adjacencyIndex'
export { getUniqueLabel } from './graph-operations/uniqueLabel'

// === GRAPH CREATION UTILITIES ===
export { createEmptyGraph, DEFAULT_NODE_STATE, DEFAULT_EDGE_STATE } from './createGraph'
