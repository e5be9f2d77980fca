import type { CellStyle } from '@/pure/render/frame'
import type { CellUpdate } from '@/pure/render/diffFrames'

export const ESC: string = '\x1b'
export const RESET: string = `${ESC}[0m`

// Every style starts from a reset, so switching never inherits attributes
const SGR: Readonly<Record<CellStyle, string>> = {
    plain: RESET,
    edge: `${ESC}[0;90m`,
    edgeSelected: `${ESC}[0;1;33m`,
    edgeHighlighted: `${ESC}[0;36m`,
    arrow: `${ESC}[0;37m`,
    node: `${ESC}[0;1;37m`,
    nodeSelected: `${ESC}[0;1;30;43m`,
    nodeHighlighted: `${ESC}[0;1;36m`,
    nodePinned: `${ESC}[0;1;35m`,
    rubberBand: `${ESC}[0;33m`,
    cursor: `${ESC}[0;7m`,
    menu: `${ESC}[0;37;44m`,
    menuActive: `${ESC}[0;1;30;47m`,
    modal: `${ESC}[0;37;45m`,
    hud: `${ESC}[0;30;47m`,
}

export function styleSequence(style: CellStyle): string {
    return SGR[style]
}

/** 1-based CUP sequence for a 0-based cell. */
export function moveTo(row: number, col: number): string {
    return `${ESC}[${row + 1};${col + 1}H`
}

/**
 * One string that applies `updates`: the cursor is moved only when the next
 * update is not the cell right after the previous one, and the style is
 * switched only when it changes. Ends with a reset.
 */
export function encodeUpdates(updates: readonly CellUpdate[]): string {
    if (updates.length === 0) {
        return ''
    }
    const parts: string[] = []
    let cursor: { row: number; col: number } | undefined
    let style: CellStyle | undefined

    for (const { row, col, cell } of updates) {
        if (!cursor || cursor.row !== row || cursor.col !== col) {
            parts.push(moveTo(row, col))
        }
        if (cell.style !== style) {
            parts.push(styleSequence(cell.style))
            style = cell.style
        }
        parts.push(cell.ch)
        cursor = { row, col: col + 1 }
    }
    parts.push(RESET)
    return parts.join('')
}
