import * as O from 'fp-ts/lib/Option.js'
import type { Graph, GraphDelta } from '@/pure/graph'
import type { History, HistoryStep } from '@/pure/graph/undo'
import { EMPTY_HISTORY, recordDelta, stepBack, stepForward } from '@/pure/graph/undo'

// Written only through graph-commands
let history: History = EMPTY_HISTORY

export const resetHistory = (): void => {
    history = EMPTY_HISTORY
}

export const recordCommitted = (delta: GraphDelta): void => {
    history = recordDelta(history, delta)
}

function take(step: O.Option<HistoryStep>): O.Option<GraphDelta> {
    return O.map(({ history: next, delta }: HistoryStep): GraphDelta => {
        history = next
        return delta
    })(step)
}

/** The delta that undoes the latest entry on `graph`, moving it to the redo side. */
export const takeUndo = (graph: Graph): O.Option<GraphDelta> => take(stepBack(history, graph))

export const takeRedo = (graph: Graph): O.Option<GraphDelta> => take(stepForward(history, graph))

export const canUndo = (): boolean => history.past.length > 0
export const canRedo = (): boolean => history.future.length > 0
