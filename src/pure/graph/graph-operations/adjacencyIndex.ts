/**
 * Adjacency index utilities for O(1) lookup of the edges incident to a node.
 *
 * This index maps each live node ID to the set of edge IDs that have it as an endpoint.
 * Deltas go through an AdjacencyDraft; the published index is never mutated.
 */

import type { AdjacencyIndex, EdgeId, GraphEdge, NodeId } from '@/pure/graph'

/**
 * Build an adjacency index from scratch.
 *
 * @param nodeIds - Every live node (each gets an entry, even without edges)
 * @param edges - Every live edge
 */
export function buildAdjacencyIndex(
    nodeIds: Iterable<NodeId>,
    edges: Iterable<GraphEdge>
): AdjacencyIndex {
    const index: Map<NodeId, Set<EdgeId>> = new Map(
        Array.from(nodeIds, (nodeId: NodeId): [NodeId, Set<EdgeId>] => [nodeId, new Set()])
    )
    for (const edge of edges) {
        index.get(edge.source)?.add(edge.id)
        index.get(edge.target)?.add(edge.id)
    }
    return index
}

/**
 * Mutable working copy of an index while one delta is applied. The outer
 * map is copied once; an incident set is copied the first time its node
 * is touched, so the source index is never mutated.
 */
export class AdjacencyDraft {
    private readonly index: Map<NodeId, ReadonlySet<EdgeId>>
    private readonly owned: Map<NodeId, Set<EdgeId>> = new Map()

    constructor(source: AdjacencyIndex) {
        this.index = new Map(source)
    }

    incident(nodeId: NodeId): ReadonlySet<EdgeId> {
        return this.index.get(nodeId) ?? new Set()
    }

    addNode(nodeId: NodeId): void {
        if (!this.index.has(nodeId)) {
            this.writable(nodeId)
        }
    }

    /** Incident edges must already have been removed. */
    removeNode(nodeId: NodeId): void {
        this.index.delete(nodeId)
        this.owned.delete(nodeId)
    }

    addEdge(edge: GraphEdge): void {
        this.writable(edge.source).add(edge.id)
        this.writable(edge.target).add(edge.id)
    }

    removeEdge(edge: GraphEdge): void {
        for (const nodeId of [edge.source, edge.target]) {
            if (this.index.has(nodeId)) {
                this.writable(nodeId).delete(edge.id)
            }
        }
    }

    toIndex(): AdjacencyIndex {
        return this.index
    }

    private writable(nodeId: NodeId): Set<EdgeId> {
        const owned: Set<EdgeId> | undefined = this.owned.get(nodeId)
        if (owned) {
            return owned
        }
        const copy: Set<EdgeId> = new Set(this.index.get(nodeId))
        this.index.set(nodeId, copy)
        this.owned.set(nodeId, copy)
        return copy
    }
}

/**
 * Structural equality of two indexes; used to check the incremental index against a rebuild.
 */
export function adjacencyIndexesEqual(a: AdjacencyIndex, b: AdjacencyIndex): boolean {
    if (a.size !== b.size) {
        return false
    }
    return Array.from(a.entries()).every(([nodeId, incident]) => {
        const other: ReadonlySet<EdgeId> | undefined = b.get(nodeId)
        return other !== undefined
            && other.size === incident.size
            && Array.from(incident).every((edgeId: EdgeId) => other.has(edgeId))
    })
}
