import * as O from 'fp-ts/lib/Option.js'
import type { Position } from '@/pure/graph'

/**
 * World space ↔ terminal cells.
 *
 *   cell  = round((world − origin) · scale)   col ← x, row ← y
 *   world = cell / scale + origin
 *
 * rows/cols describe the canvas only; the HUD row below it is not part of
 * the viewport.
 */

export interface Cell {
    readonly row: number
    readonly col: number
}

export interface Viewport {
    readonly origin: Position // world point shown at cell (0, 0)
    readonly scale: number // cells per world unit
    readonly rows: number
    readonly cols: number
}

export interface ScaleLimits {
    readonly minScale: number
    readonly maxScale: number
}

function clampScale(scale: number, limits: ScaleLimits): number {
    return Math.min(limits.maxScale, Math.max(limits.minScale, scale))
}

/** The (possibly fractional) cell at the middle of the canvas. */
export function canvasCenter(viewport: Viewport): { readonly row: number; readonly col: number } {
    return { row: (viewport.rows - 1) / 2, col: (viewport.cols - 1) / 2 }
}

/** A viewport whose canvas centre shows `center`. */
export function createViewport(rows: number, cols: number, scale: number, center: Position): Viewport {
    const sized: Viewport = { origin: { x: 0, y: 0 }, scale, rows: Math.max(rows, 1), cols: Math.max(cols, 1) }
    const middle: { readonly row: number; readonly col: number } = canvasCenter(sized)
    return { ...sized, origin: { x: center.x - middle.col / scale, y: center.y - middle.row / scale } }
}

/** Unclipped projection; the cell may lie outside the canvas. */
export function worldToCell(viewport: Viewport, position: Position): Cell {
    return {
        row: Math.round((position.y - viewport.origin.y) * viewport.scale),
        col: Math.round((position.x - viewport.origin.x) * viewport.scale),
    }
}

export function isCellVisible(viewport: Viewport, cell: Cell): boolean {
    return cell.row >= 0 && cell.row < viewport.rows && cell.col >= 0 && cell.col < viewport.cols
}

/** Projection clipped to the canvas. */
export function projectToCell(viewport: Viewport, position: Position): O.Option<Cell> {
    const cell: Cell = worldToCell(viewport, position)
    return isCellVisible(viewport, cell) ? O.some(cell) : O.none
}

export function cellToWorld(viewport: Viewport, cell: { readonly row: number; readonly col: number }): Position {
    return {
        x: cell.col / viewport.scale + viewport.origin.x,
        y: cell.row / viewport.scale + viewport.origin.y,
    }
}

/** Move the view by whole cells: positive dCols shows what lies to the right. */
export function panViewport(viewport: Viewport, dCols: number, dRows: number): Viewport {
    return {
        ...viewport,
        origin: { x: viewport.origin.x + dCols / viewport.scale, y: viewport.origin.y + dRows / viewport.scale },
    }
}

/** Zoom by `factor`, keeping the world point under `anchor` where it is. */
export function zoomViewport(viewport: Viewport, factor: number, anchor: Cell, limits: ScaleLimits): Viewport {
    const scale: number = clampScale(viewport.scale * factor, limits)
    if (scale === viewport.scale) {
        return viewport
    }
    const pinned: Position = cellToWorld(viewport, anchor)
    return {
        ...viewport,
        scale,
        origin: { x: pinned.x - anchor.col / scale, y: pinned.y - anchor.row / scale },
    }
}

/**
 * Centre the bounding box of `positions` and pick the largest scale within
 * limits that shows all of it, leaving `margin` cells free on every side.
 */
export function fitViewport(viewport: Viewport, positions: readonly Position[], limits: ScaleLimits, margin: number): Viewport {
    if (positions.length === 0) {
        return viewport
    }
    const xs: readonly number[] = positions.map((p: Position) => p.x)
    const ys: readonly number[] = positions.map((p: Position) => p.y)
    const minX: number = Math.min(...xs)
    const maxX: number = Math.max(...xs)
    const minY: number = Math.min(...ys)
    const maxY: number = Math.max(...ys)

    const usableCols: number = Math.max(viewport.cols - 1 - 2 * margin, 1)
    const usableRows: number = Math.max(viewport.rows - 1 - 2 * margin, 1)
    const fitX: number = maxX > minX ? usableCols / (maxX - minX) : limits.maxScale
    const fitY: number = maxY > minY ? usableRows / (maxY - minY) : limits.maxScale
    const scale: number = clampScale(Math.min(fitX, fitY), limits)

    return createViewport(viewport.rows, viewport.cols, scale, { x: (minX + maxX) / 2, y: (minY + maxY) / 2 })
}

/** New canvas size, keeping the world point at the canvas centre fixed. */
export function resizeViewport(viewport: Viewport, rows: number, cols: number): Viewport {
    return createViewport(rows, cols, viewport.scale, cellToWorld(viewport, canvasCenter(viewport)))
}
