import * as O from 'fp-ts/lib/Option.js'
import type { Graph, GraphChange, GraphDelta } from '@/pure/graph'
import { rebaseHistoryDelta } from './rebaseHistoryDelta'
import { reverseDelta } from './reverseDelta'

/**
 * Undo history of committed deltas, oldest first in `past` and next-to-redo
 * last in `future`. An entry holds only the undoable part of a delta:
 * node and edge additions and removals, label edits and weight edits.
 * Selection, highlight, pin and position changes never enter it.
 */
export interface History {
    readonly past: readonly GraphDelta[]
    readonly future: readonly GraphDelta[]
}

export const HISTORY_LIMIT: number = 50

export const EMPTY_HISTORY: History = { past: [], future: [] }

/** A delta to apply now, and the history after applying it. */
export interface HistoryStep {
    readonly history: History
    readonly delta: GraphDelta
}

const weightEq = O.getEq({ equals: (a: number, b: number) => a === b })

function isUndoable(change: GraphChange): boolean {
    switch (change.type) {
        case 'UpdateNode':
            return change.node.label !== change.previousNode.label
        case 'UpdateEdge':
            return !weightEq.equals(change.edge.weight, change.previousEdge.weight)
        case 'AddNode':
        case 'RemoveNode':
        case 'AddEdge':
        case 'RemoveEdge':
            return true
    }
}

/**
 * Record the undoable part of a committed delta. Anything recorded clears
 * the redo side; a purely visual delta leaves the history as it was.
 */
export function recordDelta(history: History, delta: GraphDelta): History {
    const entry: GraphDelta = delta.filter(isUndoable)
    if (entry.length === 0) {
        return history
    }
    return { past: [...history.past, entry].slice(-HISTORY_LIMIT), future: [] }
}

/** The latest entry reversed and rebased on `graph`; none when nothing is left to undo. */
export function stepBack(history: History, graph: Graph): O.Option<HistoryStep> {
    const entry: GraphDelta | undefined = history.past[history.past.length - 1]
    if (entry === undefined) {
        return O.none
    }
    return O.some({
        history: { past: history.past.slice(0, -1), future: [...history.future, entry] },
        delta: rebaseHistoryDelta(graph, reverseDelta(entry))
    })
}

/** The most recently undone entry, rebased on `graph`. */
export function stepForward(history: History, graph: Graph): O.Option<HistoryStep> {
    const entry: GraphDelta | undefined = history.future[history.future.length - 1]
    if (entry === undefined) {
        return O.none
    }
    return O.some({
        history: { past: [...history.past, entry], future: history.future.slice(0, -1) },
        delta: rebaseHistoryDelta(graph, entry)
    })
}
