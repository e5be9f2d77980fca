import * as O from 'fp-ts/lib/Option.js'
import type { Graph, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import type { Cell, Viewport } from '@/pure/viewport'
import { isCellVisible } from '@/pure/viewport'
import type { CellStyle, Frame, HitMap } from '@/pure/render/frame'
import { FrameBuffer } from '@/pure/render/frame'
import type { LabelPlacement } from '@/pure/render/placeLabels'
import { placeLabels } from '@/pure/render/placeLabels'
import { arrowGlyph, clipSegment, lineGlyph, rasterizeLine } from '@/pure/render/rasterizeLine'
import type { Overlays, RubberBand } from '@/pure/render/overlays'
import { drawCursor, drawHud, drawMenu, drawModal } from '@/pure/render/overlays'

export interface RenderScene {
    readonly graph: Graph
    readonly viewport: Viewport
    readonly overlays: Overlays
}

export interface Composition {
    readonly frame: Frame
    readonly hitMap: HitMap
}

function edgeStyle(edge: GraphEdge): CellStyle {
    if (edge.state.selected) return 'edgeSelected'
    if (edge.state.highlighted) return 'edgeHighlighted'
    return 'edge'
}

function edgeRank(edge: GraphEdge): number {
    return edge.state.selected ? 2 : edge.state.highlighted ? 1 : 0
}

/** Fractional cell of a world point, before rounding. */
function exactCell(viewport: Viewport, graph: Graph, nodeId: NodeId): Cell | undefined {
    const node: GraphNode | undefined = graph.nodes.get(nodeId)
    if (!node) {
        return undefined
    }
    return {
        row: (node.position.y - viewport.origin.y) * viewport.scale,
        col: (node.position.x - viewport.origin.x) * viewport.scale,
    }
}

function roundCell(cell: Cell): Cell {
    return { row: Math.round(cell.row), col: Math.round(cell.col) }
}

function sameCell(a: Cell, b: Cell): boolean {
    return a.row === b.row && a.col === b.col
}

/** Line cells between two fractional endpoints, clipped to just beyond the canvas. */
function visibleLine(viewport: Viewport, from: Cell, to: Cell): readonly Cell[] {
    const clipped = clipSegment(from, to, { minRow: -1, maxRow: viewport.rows, minCol: -1, maxCol: viewport.cols })
    return clipped ? rasterizeLine(roundCell(clipped.from), roundCell(clipped.to)) : []
}

function isInLabel(cell: Cell, label: LabelPlacement | undefined): boolean {
    return label !== undefined
        && cell.row === label.cell.row
        && cell.col >= label.firstCol
        && cell.col < label.firstCol + Array.from(label.text).length
}

function drawEdges(buffer: FrameBuffer, graph: Graph, viewport: Viewport, labels: ReadonlyMap<NodeId, LabelPlacement>): void {
    const edges: readonly GraphEdge[] = Array.from(graph.edges.values())
        .filter((edge: GraphEdge) => edge.source !== edge.target)
        .sort((a: GraphEdge, b: GraphEdge) => edgeRank(a) - edgeRank(b) || a.id - b.id)

    for (const edge of edges) {
        const from: Cell | undefined = exactCell(viewport, graph, edge.source)
        const to: Cell | undefined = exactCell(viewport, graph, edge.target)
        if (!from || !to) {
            continue
        }
        const sourceCell: Cell = roundCell(from)
        const targetCell: Cell = roundCell(to)
        const glyph: string = lineGlyph(targetCell.col - sourceCell.col, targetCell.row - sourceCell.row)
        const style: CellStyle = edgeStyle(edge)
        const cells: readonly Cell[] = visibleLine(viewport, from, to)
            .filter((cell: Cell) => !sameCell(cell, sourceCell) && !sameCell(cell, targetCell) && isCellVisible(viewport, cell))

        cells.forEach((cell: Cell) => {
            buffer.put(cell.row, cell.col, glyph, style)
            buffer.mark(cell.row, cell.col, { type: 'Edge', edgeId: edge.id })
        })

        if (graph.mode === 'directed' && isCellVisible(viewport, targetCell)) {
            const targetLabel: LabelPlacement | undefined = labels.get(edge.target)
            const arrowCell: Cell | undefined = [...cells].reverse().find((cell: Cell) => !isInLabel(cell, targetLabel))
            if (arrowCell) {
                buffer.put(arrowCell.row, arrowCell.col, arrowGlyph(sourceCell, targetCell), edge.state.selected ? 'edgeSelected' : 'arrow')
            }
        }
    }
}

function drawRubberBand(buffer: FrameBuffer, scene: RenderScene): void {
    const band: O.Option<RubberBand> = scene.overlays.rubberBand
    if (O.isNone(band)) {
        return
    }
    const from: Cell | undefined = exactCell(scene.viewport, scene.graph, band.value.source)
    if (!from) {
        return
    }
    const to: Cell = band.value.to
    const sourceCell: Cell = roundCell(from)
    const glyph: string = lineGlyph(to.col - sourceCell.col, to.row - sourceCell.row)
    visibleLine(scene.viewport, from, to)
        .filter((cell: Cell) => !sameCell(cell, sourceCell) && isCellVisible(scene.viewport, cell))
        .forEach((cell: Cell) => buffer.put(cell.row, cell.col, glyph, 'rubberBand'))
}

function drawLabels(buffer: FrameBuffer, labels: readonly LabelPlacement[]): void {
    labels.forEach((label: LabelPlacement) => {
        buffer.write(label.cell.row, label.firstCol, label.text, label.style)
        Array.from(label.text).forEach((_ch: string, offset: number) =>
            buffer.mark(label.cell.row, label.firstCol + offset, { type: 'Node', nodeId: label.nodeId })
        )
    })
}

/**
 * Compose a whole frame: edges, then the rubber band, then labels in z
 * order, then cursor, menu, modal and HUD. Pure: same scene, same frame.
 */
export function composeFrame(scene: RenderScene): Composition {
    const { graph, viewport, overlays } = scene
    const buffer: FrameBuffer = new FrameBuffer(viewport.rows + 1, viewport.cols)
    const labels: readonly LabelPlacement[] = placeLabels(graph, viewport)
    const labelsByNode: ReadonlyMap<NodeId, LabelPlacement> = new Map(labels.map((label: LabelPlacement): [NodeId, LabelPlacement] => [label.nodeId, label]))

    drawEdges(buffer, graph, viewport, labelsByNode)
    drawRubberBand(buffer, scene)
    drawLabels(buffer, labels)
    drawCursor(buffer, viewport, overlays.cursor)
    drawMenu(buffer, viewport, overlays.menu)
    drawModal(buffer, viewport, overlays.modal)
    drawHud(buffer, viewport.rows, overlays.hud)

    return { frame: buffer.toFrame(), hitMap: buffer.toHitMap() }
}
