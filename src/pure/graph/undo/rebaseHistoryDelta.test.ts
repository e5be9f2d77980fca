import { describe, it, expect } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { Graph, GraphDelta, GraphNode } from '@/pure/graph'
import { applyGraphDeltaToGraph, createEmptyGraph, fromAddNodeToDelta, fromUpdateNodeToDelta } from '@/pure/graph'
import { rebaseHistoryDelta } from './rebaseHistoryDelta'

function withNode(label: string): Graph {
    const empty: Graph = createEmptyGraph()
    return applyGraphDeltaToGraph(empty, fromAddNodeToDelta(empty, label, O.some({ x: 1, y: 2 })).delta)
}

describe('rebaseHistoryDelta', () => {
    it('applies only the label of a recorded update on top of the current node', () => {
        const graph: Graph = withNode('A')
        const relabel = fromUpdateNodeToDelta(graph, 1, (node: GraphNode) => ({ ...node, label: 'B' }))
        if (E.isLeft(relabel)) throw new Error('expected a delta')
        const move = fromUpdateNodeToDelta(graph, 1, (node: GraphNode) => ({
            ...node,
            position: { x: 7, y: 7 },
            state: { ...node.state, selected: true }
        }))
        if (E.isLeft(move)) throw new Error('expected a delta')
        const moved: Graph = applyGraphDeltaToGraph(graph, move.right)

        const rebased: GraphDelta = rebaseHistoryDelta(moved, relabel.right)

        expect(applyGraphDeltaToGraph(moved, rebased).nodes.get(1)).toEqual({
            id: 1,
            label: 'B',
            position: { x: 7, y: 7 },
            state: { selected: true, highlighted: false, pinned: false }
        })
    })

    it('clears selection and highlight on restored nodes but keeps the pin', () => {
        const delta: GraphDelta = [{
            type: 'AddNode',
            node: { id: 3, label: 'C', position: { x: 0, y: 0 }, state: { selected: true, highlighted: true, pinned: true } },
            needsPlacement: false
        }]

        const rebased: GraphDelta = rebaseHistoryDelta(createEmptyGraph(), delta)

        expect(rebased).toEqual([{
            type: 'AddNode',
            node: { id: 3, label: 'C', position: { x: 0, y: 0 }, state: { selected: false, highlighted: false, pinned: true } },
            needsPlacement: false
        }])
    })
})
