import type { Graph, GraphDelta } from '@/pure/graph'
import type { LayoutParams, LayoutState, RandomSource } from '@/pure/layout'
import { createLayoutState, syncLayoutState, tickLayout } from '@/pure/layout'
import { applyPositions } from '@/shell/graph/graph-commands'
import { getGraph, onGraphDelta } from '@/shell/state/graph-store'

export interface LayoutEngine {
    /** Runs one bounded batch of iterations; true when any position moved. */
    readonly tick: () => boolean
    readonly isSettled: () => boolean
    readonly dispose: () => void
}

/**
 * Owns the LayoutState and keeps it in step with the graph store:
 * topology and pin notifications seed new nodes and reheat, ticks write positions back.
 */
export function createLayoutEngine(params: LayoutParams, random: RandomSource = Math.random): LayoutEngine {
    let state: LayoutState = createLayoutState(Array.from(getGraph().nodes.keys()), params)

    const unsubscribe = onGraphDelta((delta: GraphDelta, graph: Graph) => {
        const synced = syncLayoutState(state, graph, delta, params, random)
        state = synced.state
        applyPositions(synced.seeds)
    })

    return {
        tick: (): boolean => {
            const result = tickLayout(getGraph(), state, params)
            state = result.state
            applyPositions(result.updates)
            return result.updates.size > 0
        },
        isSettled: (): boolean => state.converged,
        dispose: unsubscribe
    }
}
