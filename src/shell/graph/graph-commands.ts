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
import {
    applyGraphDeltaToGraph,
    findNodeByLabel as findNodeByLabelInGraph,
    fromAddEdgeToDelta,
    fromAddNodeToDelta,
    fromRemoveEdgeToDelta,
    fromRemoveNodeToDelta,
    fromUpdateNodeToDelta,
    getNeighbors,
    getPredecessors,
    getSuccessors,
    getUniqueLabel,
    isTopologyDelta
} from '@/pure/graph'
import type { EdgeListEntry } from '@/pure/graph/edge-list'
import { edgeListToDelta, toEdgeListToken } from '@/pure/graph/edge-list'
import type { PositionUpdates } from '@/pure/layout'
import { getGraph, notifyGraphDelta, setGraph } from '@/shell/state/graph-store'
import { recordCommitted, resetHistory, takeRedo, takeUndo } from '@/shell/state/history-store'

function changesPinState(change: GraphChange): boolean {
    return change.type === 'UpdateNode' && change.node.state.pinned !== change.previousNode.state.pinned
}

/**
 * Single write path: apply, record the undoable part, notify on topology or pin changes.
 */
function commitDelta(delta: GraphDelta): void {
    if (delta.length === 0) {
        return
    }
    setGraph(applyGraphDeltaToGraph(getGraph(), delta))
    recordCommitted(delta)
    if (isTopologyDelta(delta) || delta.some(changesPinState)) {
        notifyGraphDelta(delta)
    }
}

function updateNode(nodeId: NodeId, update: (node: GraphNode) => GraphNode): E.Either<GraphError, void> {
    return E.map(commitDelta)(fromUpdateNodeToDelta(getGraph(), nodeId, update))
}

/**
 * `label`, suffixed until its saved token differs from every other node's,
 * so a save and reload keeps the nodes apart.
 */
function uniqueSavedLabel(graph: Graph, label: string, except: O.Option<NodeId>): string {
    const taken: ReadonlySet<string> = new Set(
        Array.from(graph.nodes.values())
            .filter((node: GraphNode) => O.isNone(except) || node.id !== except.value)
            .map((node: GraphNode) => toEdgeListToken(node.label))
    )
    return getUniqueLabel(label, taken, toEdgeListToken)
}

// === TOPOLOGY ===

/** The node gets `label`, or a suffixed form of it when that is taken. */
export function addNode(label: string, position: O.Option<Position>): NodeId {
    const graph: Graph = getGraph()
    const { id, delta } = fromAddNodeToDelta(graph, uniqueSavedLabel(graph, label, O.none), position)
    commitDelta(delta)
    return id
}

export function addEdge(source: NodeId, target: NodeId, weight: O.Option<number>): E.Either<GraphError, EdgeId> {
    return E.map(({ id, delta }: DeltaWithId<EdgeId>) => {
        commitDelta(delta)
        return id
    })(fromAddEdgeToDelta(getGraph(), source, target, weight))
}

export function removeNode(nodeId: NodeId): E.Either<GraphError, void> {
    return E.map(commitDelta)(fromRemoveNodeToDelta(getGraph(), nodeId))
}

export function removeEdge(edgeId: EdgeId): E.Either<GraphError, void> {
    return E.map(commitDelta)(fromRemoveEdgeToDelta(getGraph(), edgeId))
}

/**
 * Replace the current graph with the loaded edge list as one delta.
 * History starts empty: loading is not undoable.
 */
export function loadEdgeList(entries: readonly EdgeListEntry[]): void {
    const graph: Graph = getGraph()
    const clear: GraphDelta = [
        ...Array.from(graph.edges.values()).map((edge: GraphEdge): GraphChange => ({ type: 'RemoveEdge', edge })),
        ...Array.from(graph.nodes.values()).map((node: GraphNode): GraphChange => ({ type: 'RemoveNode', node }))
    ]
    const cleared: Graph = applyGraphDeltaToGraph(graph, clear)
    commitDelta([...clear, ...edgeListToDelta(cleared, entries)])
    resetHistory()
}

// === QUERIES ===

export function neighbors(nodeId: NodeId): E.Either<GraphError, readonly NodeId[]> {
    return getNeighbors(getGraph(), nodeId)
}

export function successors(nodeId: NodeId): E.Either<GraphError, readonly NodeId[]> {
    return getSuccessors(getGraph(), nodeId)
}

export function predecessors(nodeId: NodeId): E.Either<GraphError, readonly NodeId[]> {
    return getPredecessors(getGraph(), nodeId)
}

export function findNodeByLabel(label: string): O.Option<GraphNode> {
    return findNodeByLabelInGraph(getGraph(), label)
}

// === LABELS AND VISUAL STATE ===

/** Returns the label actually applied, which is suffixed when `label` is taken. */
export function setLabel(nodeId: NodeId, label: string): E.Either<GraphError, string> {
    const applied: string = uniqueSavedLabel(getGraph(), label, O.some(nodeId))
    return E.map(() => applied)(updateNode(nodeId, (node: GraphNode) => ({ ...node, label: applied })))
}

export function setPinned(nodeId: NodeId, pinned: boolean): E.Either<GraphError, void> {
    return updateNode(nodeId, (node: GraphNode) => ({ ...node, state: { ...node.state, pinned } }))
}

export function moveNode(nodeId: NodeId, position: Position): E.Either<GraphError, void> {
    return updateNode(nodeId, (node: GraphNode) => ({ ...node, position }))
}

/**
 * Select one node (or none). Selecting a node clears any edge selection.
 */
export function setSelection(nodeId: O.Option<NodeId>): E.Either<GraphError, void> {
    const graph: Graph = getGraph()
    if (O.isSome(nodeId) && !graph.nodes.has(nodeId.value)) {
        return E.left({ type: 'UnknownNode', nodeId: nodeId.value })
    }
    const isSelected = (id: NodeId): boolean => O.isSome(nodeId) && nodeId.value === id
    commitDelta([
        ...nodeStateChanges(graph, (node: GraphNode) => ({ ...node.state, selected: isSelected(node.id) })),
        ...edgeStateChanges(graph, (edge: GraphEdge) => ({ ...edge.state, selected: false }))
    ])
    return E.right(undefined)
}

/**
 * Select one edge (or none). Selecting an edge clears any node selection.
 */
export function setEdgeSelection(edgeId: O.Option<EdgeId>): E.Either<GraphError, void> {
    const graph: Graph = getGraph()
    if (O.isSome(edgeId) && !graph.edges.has(edgeId.value)) {
        return E.left({ type: 'UnknownEdge', edgeId: edgeId.value })
    }
    const isSelected = (id: EdgeId): boolean => O.isSome(edgeId) && edgeId.value === id
    commitDelta([
        ...nodeStateChanges(graph, (node: GraphNode) => ({ ...node.state, selected: false })),
        ...edgeStateChanges(graph, (edge: GraphEdge) => ({ ...edge.state, selected: isSelected(edge.id) }))
    ])
    return E.right(undefined)
}

/** Highlight exactly the given nodes and edges; ids that no longer exist are ignored. */
export function setHighlighted(nodeIds: readonly NodeId[], edgeIds: readonly EdgeId[]): void {
    const graph: Graph = getGraph()
    const nodes: ReadonlySet<NodeId> = new Set(nodeIds)
    const edges: ReadonlySet<EdgeId> = new Set(edgeIds)
    commitDelta([
        ...nodeStateChanges(graph, (node: GraphNode) => ({ ...node.state, highlighted: nodes.has(node.id) })),
        ...edgeStateChanges(graph, (edge: GraphEdge) => ({ ...edge.state, highlighted: edges.has(edge.id) }))
    ])
}

function nodeStateChanges(graph: Graph, next: (node: GraphNode) => GraphNode['state']): readonly GraphChange[] {
    return Array.from(graph.nodes.values()).flatMap((node: GraphNode): readonly GraphChange[] => {
        const state: GraphNode['state'] = next(node)
        return state.selected === node.state.selected && state.highlighted === node.state.highlighted
            ? []
            : [{ type: 'UpdateNode', node: { ...node, state }, previousNode: node }]
    })
}

function edgeStateChanges(graph: Graph, next: (edge: GraphEdge) => GraphEdge['state']): readonly GraphChange[] {
    return Array.from(graph.edges.values()).flatMap((edge: GraphEdge): readonly GraphChange[] => {
        const state: GraphEdge['state'] = next(edge)
        return state.selected === edge.state.selected && state.highlighted === edge.state.highlighted
            ? []
            : [{ type: 'UpdateEdge', edge: { ...edge, state }, previousEdge: edge }]
    })
}

// === LAYOUT ===

/** Write layout positions back; no notification and no history. */
export function applyPositions(positions: PositionUpdates): void {
    const graph: Graph = getGraph()
    const delta: GraphDelta = Array.from(positions.entries()).flatMap(([nodeId, position]): readonly GraphChange[] => {
        const node: GraphNode | undefined = graph.nodes.get(nodeId)
        return node && (node.position.x !== position.x || node.position.y !== position.y)
            ? [{ type: 'UpdateNode', node: { ...node, position }, previousNode: node }]
            : []
    })
    if (delta.length > 0) {
        setGraph(applyGraphDeltaToGraph(graph, delta))
    }
}

// === HISTORY ===

// Replays bypass commitDelta: they move along the history instead of adding to it
function replay(delta: O.Option<GraphDelta>): boolean {
    if (O.isNone(delta)) {
        return false
    }
    setGraph(applyGraphDeltaToGraph(getGraph(), delta.value))
    if (isTopologyDelta(delta.value)) {
        notifyGraphDelta(delta.value)
    }
    return true
}

/** Returns false when there is nothing to undo. */
export function undo(): boolean {
    return replay(takeUndo(getGraph()))
}

export function redo(): boolean {
    return replay(takeRedo(getGraph()))
}
