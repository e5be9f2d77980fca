import { describe, it, expect } from 'vitest'
import * as O from 'fp-ts/lib/Option.js'
import type { Graph, GraphDelta, GraphEdge, GraphNode } from '@/pure/graph'
import { applyGraphDeltaToGraph, createEmptyGraph, DEFAULT_EDGE_STATE, DEFAULT_NODE_STATE } from '@/pure/graph'

function node(id: number, label: string): GraphNode {
    return { id, label, position: { x: id, y: 0 }, state: DEFAULT_NODE_STATE }
}

function edge(id: number, source: number, target: number): GraphEdge {
    return { id, source, target, weight: O.none, state: DEFAULT_EDGE_STATE }
}

// A -> B -> C in one delta, the way a file load arrives
const PATH: GraphDelta = [
    { type: 'AddNode', node: node(1, 'A'), needsPlacement: true },
    { type: 'AddNode', node: node(2, 'B'), needsPlacement: true },
    { type: 'AddNode', node: node(3, 'C'), needsPlacement: true },
    { type: 'AddEdge', edge: edge(1, 1, 2) },
    { type: 'AddEdge', edge: edge(2, 2, 3) }
]

describe('applyGraphDeltaToGraph', () => {
    it('applies a multi-change delta in order', () => {
        const graph: Graph = applyGraphDeltaToGraph(createEmptyGraph(), PATH)

        expect(graph.nodes.size).toBe(3)
        expect(graph.adjacency.get(2)).toEqual(new Set([1, 2]))
        expect(graph.nextNodeId).toBe(4)
        expect(graph.nextEdgeId).toBe(3)
    })

    it('leaves the input graph untouched', () => {
        const before: Graph = applyGraphDeltaToGraph(createEmptyGraph(), PATH)

        const after: Graph = applyGraphDeltaToGraph(before, [
            { type: 'RemoveNode', node: node(2, 'B') },
            { type: 'AddNode', node: node(4, 'D'), needsPlacement: true },
            { type: 'AddEdge', edge: edge(3, 1, 4) }
        ])

        expect(Array.from(after.nodes.keys())).toEqual([1, 3, 4])
        expect(Array.from(after.edges.keys())).toEqual([3])
        expect(after.adjacency.get(1)).toEqual(new Set([3]))
        expect(after.adjacency.get(3)).toEqual(new Set())
        expect(Array.from(before.nodes.keys())).toEqual([1, 2, 3])
        expect(Array.from(before.edges.keys())).toEqual([1, 2])
        expect(before.adjacency.get(1)).toEqual(new Set([1]))
        expect(before.adjacency.get(2)).toEqual(new Set([1, 2]))
    })

    it('returns the same graph for an empty delta', () => {
        const graph: Graph = applyGraphDeltaToGraph(createEmptyGraph(), PATH)
        expect(applyGraphDeltaToGraph(graph, [])).toBe(graph)
    })
})
