import type { Cell } from '@/pure/viewport'

/** Cells of the segment from `from` to `to`, both ends included (Bresenham). */
export function rasterizeLine(from: Cell, to: Cell): readonly Cell[] {
    const dCols: number = Math.abs(to.col - from.col)
    const dRows: number = -Math.abs(to.row - from.row)
    const stepCol: number = from.col < to.col ? 1 : -1
    const stepRow: number = from.row < to.row ? 1 : -1
    const cells: Cell[] = []

    let col: number = from.col
    let row: number = from.row
    let error: number = dCols + dRows
    for (;;) {
        cells.push({ row, col })
        if (col === to.col && row === to.row) {
            return cells
        }
        const doubled: number = 2 * error
        if (doubled >= dRows) {
            error += dRows
            col += stepCol
        }
        if (doubled <= dCols) {
            error += dCols
            row += stepRow
        }
    }
}

/**
 * Glyph for a whole line, from its overall direction. Shallow lines are
 * horizontal, steep ones vertical, the rest diagonal.
 */
export function lineGlyph(dCols: number, dRows: number): string {
    const run: number = Math.abs(dCols)
    const rise: number = Math.abs(dRows)
    if (rise * 2 < run) {
        return '─'
    }
    if (run * 2 < rise) {
        return '│'
    }
    return Math.sign(dCols) === Math.sign(dRows) ? '╲' : '╱'
}

const ARROWS: Readonly<Record<string, string>> = {
    '1,0': '→',
    '-1,0': '←',
    '0,-1': '↑',
    '0,1': '↓',
    '1,-1': '↗',
    '-1,-1': '↖',
    '1,1': '↘',
    '-1,1': '↙',
}

/** Arrow for a line running from `from` to `to`, snapped like lineGlyph. */
export function arrowGlyph(from: Cell, to: Cell): string {
    const dCols: number = to.col - from.col
    const dRows: number = to.row - from.row
    const glyph: string = lineGlyph(dCols, dRows)
    const horizontal: number = glyph === '│' ? 0 : Math.sign(dCols)
    const vertical: number = glyph === '─' ? 0 : Math.sign(dRows)
    return ARROWS[`${horizontal},${vertical}`] ?? '•'
}

/**
 * Liang–Barsky: the part of the segment inside [minCol, maxCol] × [minRow, maxRow],
 * in fractional cell coordinates. None when it misses the box.
 */
export function clipSegment(
    from: { readonly row: number; readonly col: number },
    to: { readonly row: number; readonly col: number },
    box: { readonly minRow: number; readonly maxRow: number; readonly minCol: number; readonly maxCol: number }
): { readonly from: Cell; readonly to: Cell } | undefined {
    const dCol: number = to.col - from.col
    const dRow: number = to.row - from.row
    const checks: readonly (readonly [number, number])[] = [
        [-dCol, from.col - box.minCol],
        [dCol, box.maxCol - from.col],
        [-dRow, from.row - box.minRow],
        [dRow, box.maxRow - from.row],
    ]
    let t0: number = 0
    let t1: number = 1
    for (const [p, q] of checks) {
        if (p === 0) {
            if (q < 0) {
                return undefined
            }
            continue
        }
        const t: number = q / p
        if (p < 0) {
            t0 = Math.max(t0, t)
        } else {
            t1 = Math.min(t1, t)
        }
        if (t0 > t1) {
            return undefined
        }
    }
    return {
        from: { row: from.row + t0 * dRow, col: from.col + t0 * dCol },
        to: { row: from.row + t1 * dRow, col: from.col + t1 * dCol },
    }
}
