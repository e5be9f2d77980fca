import { describe, it, expect } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { Graph, GraphDelta, GraphNode } from '@/pure/graph'
import { applyGraphDeltaToGraph, createEmptyGraph, DEFAULT_NODE_STATE, fromUpdateNodeToDelta } from '@/pure/graph'
import type { History, HistoryStep } from './history'
import { EMPTY_HISTORY, HISTORY_LIMIT, recordDelta, stepBack, stepForward } from './history'

function addition(id: number): GraphDelta {
    const node: GraphNode = { id, label: `n${id}`, position: { x: 0, y: 0 }, state: DEFAULT_NODE_STATE }
    return [{ type: 'AddNode', node, needsPlacement: true }]
}

function update(graph: Graph, change: (node: GraphNode) => GraphNode): GraphDelta {
    const delta = fromUpdateNodeToDelta(graph, 1, change)
    if (E.isLeft(delta)) throw new Error('expected a delta')
    return delta.right
}

function someOrThrow(step: O.Option<HistoryStep>): HistoryStep {
    if (O.isNone(step)) throw new Error('expected a step')
    return step.value
}

describe('history', () => {
    it('records a label edit and skips a selection change', () => {
        const graph: Graph = applyGraphDeltaToGraph(createEmptyGraph(), addition(1))
        const relabel: GraphDelta = update(graph, (node: GraphNode) => ({ ...node, label: 'A' }))
        const select: GraphDelta = update(graph, (node: GraphNode) => ({ ...node, state: { ...node.state, selected: true } }))

        const history: History = recordDelta(recordDelta(EMPTY_HISTORY, relabel), select)

        expect(history.past).toEqual([relabel])
    })

    it('leaves the history unchanged for a purely visual delta', () => {
        const graph: Graph = applyGraphDeltaToGraph(createEmptyGraph(), addition(1))
        const before: History = recordDelta(EMPTY_HISTORY, addition(2))

        const pin: GraphDelta = update(graph, (node: GraphNode) => ({ ...node, state: { ...node.state, pinned: true } }))

        expect(recordDelta(before, pin)).toBe(before)
    })

    it('undoes and redoes against the current graph', () => {
        const history: History = recordDelta(EMPTY_HISTORY, addition(1))
        const graph: Graph = applyGraphDeltaToGraph(createEmptyGraph(), addition(1))

        const back: HistoryStep = someOrThrow(stepBack(history, graph))
        expect(back.delta.map(change => change.type)).toEqual(['RemoveNode'])
        expect(back.history).toEqual({ past: [], future: [addition(1)] })

        const forward: HistoryStep = someOrThrow(stepForward(back.history, applyGraphDeltaToGraph(graph, back.delta)))
        expect(forward.delta).toEqual(addition(1))
        expect(forward.history).toEqual({ past: [addition(1)], future: [] })
    })

    it('clears the redo side when something new is recorded', () => {
        const graph: Graph = applyGraphDeltaToGraph(createEmptyGraph(), addition(1))
        const undone: History = someOrThrow(stepBack(recordDelta(EMPTY_HISTORY, addition(1)), graph)).history

        expect(recordDelta(undone, addition(2))).toEqual({ past: [addition(2)], future: [] })
    })

    it('has nothing to step to when empty', () => {
        expect(stepBack(EMPTY_HISTORY, createEmptyGraph())).toEqual(O.none)
        expect(stepForward(EMPTY_HISTORY, createEmptyGraph())).toEqual(O.none)
    })

    it('drops the oldest entries beyond HISTORY_LIMIT', () => {
        const history: History = Array.from({ length: HISTORY_LIMIT + 5 }, (_: unknown, i: number) => addition(i + 1))
            .reduce<History>(recordDelta, EMPTY_HISTORY)

        expect(history.past).toHaveLength(HISTORY_LIMIT)
        expect(history.past[0]).toEqual(addition(6))
        expect(history.past[HISTORY_LIMIT - 1]).toEqual(addition(HISTORY_LIMIT + 5))
    })
})
