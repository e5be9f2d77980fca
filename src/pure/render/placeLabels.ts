import type { Graph, GraphNode, NodeId } from '@/pure/graph'
import type { Rect, SpatialIndex } from '@/pure/graph/spatial'
import { createSpatialIndex, hasNodeCollision, insertNode } from '@/pure/graph/spatial'
import type { Cell, Viewport } from '@/pure/viewport'
import { isCellVisible, worldToCell } from '@/pure/viewport'
import type { CellStyle } from '@/pure/render/frame'

export const EMPTY_LABEL_GLYPH: string = '●'
export const ELLIPSIS: string = '…'

export interface LabelPlacement {
    readonly nodeId: NodeId
    readonly cell: Cell // the node's own cell
    readonly firstCol: number
    readonly text: string // exactly as many characters as columns claimed
    readonly style: CellStyle
}

function zRank(node: GraphNode): number {
    if (node.state.selected) return 2
    if (node.state.highlighted) return 1
    return 0
}

/** Highest z first: selected, then highlighted, then the rest; ties by id. */
export function byZOrder(a: GraphNode, b: GraphNode): number {
    return zRank(b) - zRank(a) || a.id - b.id
}

export function nodeStyle(node: GraphNode): CellStyle {
    if (node.state.selected) return 'nodeSelected'
    if (node.state.highlighted) return 'nodeHighlighted'
    if (node.state.pinned) return 'nodePinned'
    return 'node'
}

function spanRect(row: number, firstCol: number, width: number): Rect {
    return { minX: firstCol, maxX: firstCol + width - 1, minY: row, maxY: row }
}

/** Centred on the node's cell; an even width leans one column to the right. */
function centredStart(col: number, width: number): number {
    return col - Math.floor((width - 1) / 2)
}

function elide(chars: readonly string[], width: number): string {
    return width >= chars.length ? chars.join('') : [...chars.slice(0, width - 1), ELLIPSIS].join('')
}

/**
 * Decide where every visible label goes. Labels claim their cells in z
 * order; a label that would overlap an earlier claim (or the canvas edge)
 * shrinks to the widest centred span that fits and ends in an ellipsis.
 * A node whose own cell is already taken is hidden.
 */
export function placeLabels(graph: Graph, viewport: Viewport): readonly LabelPlacement[] {
    const index: SpatialIndex = createSpatialIndex([])
    const fits = (rect: Rect): boolean =>
        rect.minX >= 0 && rect.maxX < viewport.cols && !hasNodeCollision(index, rect)

    return Array.from(graph.nodes.values())
        .sort(byZOrder)
        .flatMap((node: GraphNode): readonly LabelPlacement[] => {
            const cell: Cell = worldToCell(viewport, node.position)
            if (!isCellVisible(viewport, cell)) {
                return []
            }
            const chars: readonly string[] = Array.from(node.label === '' ? EMPTY_LABEL_GLYPH : node.label)
            for (let width: number = chars.length; width >= 1; width--) {
                const firstCol: number = centredStart(cell.col, width)
                const rect: Rect = spanRect(cell.row, firstCol, width)
                if (fits(rect)) {
                    insertNode(index, { nodeId: node.id, ...rect })
                    return [{ nodeId: node.id, cell, firstCol, text: elide(chars, width), style: nodeStyle(node) }]
                }
            }
            return []
        })
}
