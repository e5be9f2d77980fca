import { describe, it, expect } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { Graph, GraphDelta } from '@/pure/graph'
import {
    applyGraphDeltaToGraph,
    createEmptyGraph,
    fromAddEdgeToDelta,
    fromAddNodeToDelta,
    fromRemoveNodeToDelta,
    fromUpdateNodeToDelta
} from '@/pure/graph'
import { reverseDelta } from './reverseDelta'

function triangle(): Graph {
    const labels: readonly string[] = ['A', 'B', 'C']
    const withNodes: Graph = labels.reduce<Graph>(
        (graph, label) => applyGraphDeltaToGraph(graph, fromAddNodeToDelta(graph, label, O.none).delta),
        createEmptyGraph()
    )
    const pairs: readonly (readonly [number, number])[] = [[1, 2], [2, 3], [3, 1]]
    return pairs.reduce<Graph>((graph, [source, target]) => {
        const delta = fromAddEdgeToDelta(graph, source, target, O.some(source))
        return E.isRight(delta) ? applyGraphDeltaToGraph(graph, delta.right.delta) : graph
    }, withNodes)
}

function rightOrThrow(result: E.Either<unknown, GraphDelta>): GraphDelta {
    if (E.isLeft(result)) throw new Error('expected a delta')
    return result.right
}

describe('reverseDelta', () => {
    it('undoes a cascading node removal, restoring ids, edges and the index', () => {
        const graph: Graph = triangle()
        const removal: GraphDelta = rightOrThrow(fromRemoveNodeToDelta(graph, 2))
        const removed: Graph = applyGraphDeltaToGraph(graph, removal)

        const restored: Graph = applyGraphDeltaToGraph(removed, reverseDelta(removal))

        expect(restored.nodes).toEqual(graph.nodes)
        expect(restored.edges).toEqual(graph.edges)
        expect(restored.adjacency.get(2)).toEqual(new Set([1, 2]))
        expect(restored.nextEdgeId).toBe(4)
    })

    it('recreates the node before its edges', () => {
        const graph: Graph = triangle()
        const removal: GraphDelta = rightOrThrow(fromRemoveNodeToDelta(graph, 1))

        expect(reverseDelta(removal).map(change => change.type)).toEqual(['AddNode', 'AddEdge', 'AddEdge'])
    })

    it('swaps previous and next records of an update', () => {
        const graph: Graph = triangle()
        const rename: GraphDelta = rightOrThrow(fromUpdateNodeToDelta(graph, 1, node => ({ ...node, label: 'Z' })))
        const renamed: Graph = applyGraphDeltaToGraph(graph, rename)

        expect(renamed.nodes.get(1)?.label).toBe('Z')
        expect(applyGraphDeltaToGraph(renamed, reverseDelta(rename)).nodes.get(1)?.label).toBe('A')
        expect(reverseDelta(reverseDelta(rename))).toEqual(rename)
    })
})
