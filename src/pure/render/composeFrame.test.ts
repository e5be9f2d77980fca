import { describe, it, expect } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { Graph, GraphMode, NodeId, Position } from '@/pure/graph'
import { applyGraphDeltaToGraph, createEmptyGraph, fromAddEdgeToDelta, fromAddNodeToDelta, fromUpdateNodeToDelta } from '@/pure/graph'
import type { Viewport } from '@/pure/viewport'
import type { Composition, Overlays } from './index'
import { NO_OVERLAYS, cellAt, composeFrame, hitAt, rowText } from './index'

// ── Helpers ──────────────────────────────────────────────────────────────────

function viewportOf(rows: number, cols: number): Viewport {
    return { origin: { x: 0, y: 0 }, scale: 1, rows, cols }
}

function addNode(graph: Graph, label: string, position: Position): Graph {
    return applyGraphDeltaToGraph(graph, fromAddNodeToDelta(graph, label, O.some(position)).delta)
}

function addEdge(graph: Graph, source: NodeId, target: NodeId): Graph {
    const result = fromAddEdgeToDelta(graph, source, target, O.none)
    if (E.isLeft(result)) throw new Error('expected edge')
    return applyGraphDeltaToGraph(graph, result.right.delta)
}

function select(graph: Graph, nodeId: NodeId): Graph {
    const delta = fromUpdateNodeToDelta(graph, nodeId, node => ({ ...node, state: { ...node.state, selected: true } }))
    if (E.isLeft(delta)) throw new Error('expected delta')
    return applyGraphDeltaToGraph(graph, delta.right)
}

function pair(mode: GraphMode): Graph {
    const graph: Graph = addNode(addNode(createEmptyGraph(mode), 'A', { x: 2, y: 2 }), 'B', { x: 12, y: 2 })
    return addEdge(graph, 1, 2)
}

function compose(graph: Graph, viewport: Viewport, overlays: Overlays = NO_OVERLAYS): Composition {
    return composeFrame({ graph, viewport, overlays })
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe('composeFrame', () => {
    it('draws an edge between labels with an arrow before the target', () => {
        const { frame } = compose(pair('directed'), viewportOf(5, 20))

        expect(rowText(frame, 2)).toBe('  A────────→B       ')
        expect(frame.rows).toBe(6)
    })

    it('draws no arrow in undirected mode', () => {
        const { frame } = compose(pair('undirected'), viewportOf(5, 20))

        expect(rowText(frame, 2)).toBe('  A─────────B       ')
    })

    it('records labels and edge cells in the hit map', () => {
        const { hitMap } = compose(pair('directed'), viewportOf(5, 20))

        expect(hitAt(hitMap, 2, 2)).toEqual({ type: 'Node', nodeId: 1 })
        expect(hitAt(hitMap, 2, 5)).toEqual({ type: 'Edge', edgeId: 1 })
        expect(hitAt(hitMap, 0, 5)).toBeUndefined()
    })

    it('elides the later of two overlapping labels', () => {
        const graph: Graph = addNode(addNode(createEmptyGraph(), 'alpha', { x: 5, y: 0 }), 'bravo', { x: 8, y: 0 })
        const { frame } = compose(graph, viewportOf(3, 20))

        expect(rowText(frame, 0)).toBe('   alphab…          ')
    })

    it('gives the selected label precedence', () => {
        const graph: Graph = select(addNode(addNode(createEmptyGraph(), 'alpha', { x: 5, y: 0 }), 'bravo', { x: 8, y: 0 }), 2)
        const { frame } = compose(graph, viewportOf(3, 20))

        expect(rowText(frame, 0)).toBe('     …bravo         ')
        expect(cellAt(frame, 0, 8).style).toBe('nodeSelected')
        expect(cellAt(frame, 0, 5).style).toBe('node')
    })

    it('hides a node whose cell is already claimed', () => {
        const graph: Graph = addNode(addNode(createEmptyGraph(), 'x', { x: 4, y: 1 }), 'y', { x: 4, y: 1 })
        const { frame, hitMap } = compose(graph, viewportOf(3, 10))

        expect(rowText(frame, 1)).toBe('    x     ')
        expect(hitAt(hitMap, 1, 4)).toEqual({ type: 'Node', nodeId: 1 })
    })

    it('draws an empty label as a dot', () => {
        const { frame } = compose(addNode(createEmptyGraph(), '', { x: 1, y: 0 }), viewportOf(2, 4))

        expect(rowText(frame, 0)).toBe(' ●  ')
    })

    it('keeps the grid aligned when a label has wide characters', () => {
        const { frame } = compose(addNode(createEmptyGraph(), '日本x', { x: 2, y: 0 }), viewportOf(2, 6))

        expect(rowText(frame, 0)).toBe(' ??x  ')
    })

    it('draws the rubber band from the source to the free end', () => {
        const graph: Graph = addNode(createEmptyGraph(), 'A', { x: 2, y: 2 })
        const { frame } = compose(graph, viewportOf(5, 20), { ...NO_OVERLAYS, rubberBand: O.some({ source: 1, to: { row: 2, col: 8 } }) })

        expect(rowText(frame, 2)).toBe('  A──────           ')
        expect(cellAt(frame, 2, 8).style).toBe('rubberBand')
    })

    it('draws the cursor on an empty cell', () => {
        const { frame } = compose(createEmptyGraph(), viewportOf(3, 5), { ...NO_OVERLAYS, cursor: O.some({ row: 1, col: 1 }) })

        expect(cellAt(frame, 1, 1)).toEqual({ ch: '┼', style: 'cursor' })
    })

    it('draws the menu and maps its rows to items', () => {
        const overlays: Overlays = { ...NO_OVERLAYS, menu: O.some({ anchor: { row: 0, col: 0 }, items: ['Edit label', 'Delete node'], highlighted: 1 }) }
        const { frame, hitMap } = compose(createEmptyGraph(), viewportOf(6, 20), overlays)

        expect(rowText(frame, 0)).toBe('┌─────────────┐     ')
        expect(rowText(frame, 1)).toBe('│ Edit label  │     ')
        expect(rowText(frame, 2)).toBe('│ Delete node │     ')
        expect(cellAt(frame, 2, 3).style).toBe('menuActive')
        expect(hitAt(hitMap, 1, 3)).toEqual({ type: 'MenuItem', index: 0 })
        expect(hitAt(hitMap, 2, 3)).toEqual({ type: 'MenuItem', index: 1 })
        expect(hitAt(hitMap, 0, 3)).toBeUndefined()
    })

    it('draws the label editor with a text cursor', () => {
        const overlays: Overlays = { ...NO_OVERLAYS, modal: O.some({ title: 'Edit label', text: 'abc' }) }
        const { frame } = compose(createEmptyGraph(), viewportOf(5, 30), overlays)

        expect(rowText(frame, 1).slice(3, 27)).toBe('┌ Edit label ──────────┐')
        expect(rowText(frame, 2).slice(3, 9)).toBe('│ abc▏')
    })

    it('writes the HUD on the row below the canvas', () => {
        const { frame } = compose(createEmptyGraph(), viewportOf(2, 12), { ...NO_OVERLAYS, hud: 'status line too long' })

        expect(rowText(frame, 2)).toBe('status line ')
        expect(cellAt(frame, 2, 0).style).toBe('hud')
    })
})
