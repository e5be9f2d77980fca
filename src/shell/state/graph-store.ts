import type { Graph, GraphDelta, GraphMode } from '@/pure/graph'
import { createEmptyGraph } from '@/pure/graph'

export type GraphDeltaListener = (delta: GraphDelta, graph: Graph) => void

// The ONLY mutable graph state; every change goes through setGraph
let currentGraph: Graph = createEmptyGraph()
const listeners: Set<GraphDeltaListener> = new Set()

export const getGraph = (): Graph => currentGraph

export const setGraph = (graph: Graph): void => {
    currentGraph = graph
}

// Replace the graph with an empty one (new session, or tests)
export const resetGraph = (mode: GraphMode): void => {
    currentGraph = createEmptyGraph(mode)
    listeners.clear()
}

export const onGraphDelta = (listener: GraphDeltaListener): (() => void) => {
    listeners.add(listener)
    return () => {
        listeners.delete(listener)
    }
}

export const notifyGraphDelta = (delta: GraphDelta): void => {
    listeners.forEach((listener: GraphDeltaListener) => listener(delta, currentGraph))
}
