import type { EdgeId, NodeId } from '@/pure/graph'
import { toCellChar } from '@/pure/render/cellWidth'

export type CellStyle =
    | 'plain'
    | 'edge'
    | 'edgeSelected'
    | 'edgeHighlighted'
    | 'arrow'
    | 'node'
    | 'nodeSelected'
    | 'nodeHighlighted'
    | 'nodePinned'
    | 'rubberBand'
    | 'cursor'
    | 'menu'
    | 'menuActive'
    | 'modal'
    | 'hud'

export interface FrameCell {
    readonly ch: string // exactly one terminal column wide
    readonly style: CellStyle
}

/** Row-major grid covering the whole terminal (canvas plus HUD row). */
export interface Frame {
    readonly rows: number
    readonly cols: number
    readonly cells: readonly FrameCell[]
}

export type HitTarget =
    | { readonly type: 'Node'; readonly nodeId: NodeId }
    | { readonly type: 'Edge'; readonly edgeId: EdgeId }
    | { readonly type: 'MenuItem'; readonly index: number }

export interface HitMap {
    readonly cols: number
    readonly targets: ReadonlyMap<number, HitTarget> // keyed by row * cols + col
}

export const BLANK: FrameCell = { ch: ' ', style: 'plain' }

export function cellAt(frame: Frame, row: number, col: number): FrameCell {
    return frame.cells[row * frame.cols + col] ?? BLANK
}

/** Text of one frame row, for tests and debugging. */
export function rowText(frame: Frame, row: number): string {
    return frame.cells.slice(row * frame.cols, (row + 1) * frame.cols).map((cell: FrameCell) => cell.ch).join('')
}

export function hitAt(hitMap: HitMap, row: number, col: number): HitTarget | undefined {
    return col >= 0 && col < hitMap.cols ? hitMap.targets.get(row * hitMap.cols + col) : undefined
}

/**
 * Mutable grid used while composing a single frame. Writes outside the
 * grid are dropped, so callers never need to clip. A character that is not
 * one column wide is stored as a stand-in, so every cell is one column on
 * screen and the encoder's cursor arithmetic holds.
 */
export class FrameBuffer {
    private readonly cells: FrameCell[]
    private readonly hits: Map<number, HitTarget> = new Map()

    constructor(readonly rows: number, readonly cols: number) {
        this.cells = Array.from({ length: rows * cols }, (): FrameCell => BLANK)
    }

    contains(row: number, col: number): boolean {
        return row >= 0 && row < this.rows && col >= 0 && col < this.cols
    }

    get(row: number, col: number): FrameCell {
        return this.contains(row, col) ? this.cells[row * this.cols + col] : BLANK
    }

    put(row: number, col: number, ch: string, style: CellStyle): void {
        if (this.contains(row, col)) {
            this.cells[row * this.cols + col] = { ch: toCellChar(ch), style }
        }
    }

    /** Writes one code point per column starting at `col`. */
    write(row: number, col: number, text: string, style: CellStyle): void {
        Array.from(text).forEach((ch: string, offset: number) => this.put(row, col + offset, ch, style))
    }

    mark(row: number, col: number, target: HitTarget | undefined): void {
        if (!this.contains(row, col)) {
            return
        }
        if (target) {
            this.hits.set(row * this.cols + col, target)
        } else {
            this.hits.delete(row * this.cols + col)
        }
    }

    toFrame(): Frame {
        return { rows: this.rows, cols: this.cols, cells: [...this.cells] }
    }

    toHitMap(): HitMap {
        return { cols: this.cols, targets: new Map(this.hits) }
    }
}
