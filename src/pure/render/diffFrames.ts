import * as O from 'fp-ts/lib/Option.js'
import type { Frame, FrameCell } from '@/pure/render/frame'

export interface CellUpdate {
    readonly row: number
    readonly col: number
    readonly cell: FrameCell
}

function sameCell(a: FrameCell | undefined, b: FrameCell): boolean {
    return a !== undefined && a.ch === b.ch && a.style === b.style
}

/**
 * Cells of `next` that differ from `previous`, in row-major order.
 * Without a previous frame, or when the size changed, every cell is an update.
 */
export function diffFrames(previous: O.Option<Frame>, next: Frame): readonly CellUpdate[] {
    const comparable: O.Option<Frame> = O.filter((frame: Frame) => frame.rows === next.rows && frame.cols === next.cols)(previous)
    return next.cells.flatMap((cell: FrameCell, index: number): readonly CellUpdate[] => {
        const unchanged: boolean = O.isSome(comparable) && sameCell(comparable.value.cells[index], cell)
        return unchanged ? [] : [{ row: Math.floor(index / next.cols), col: index % next.cols, cell }]
    })
}
