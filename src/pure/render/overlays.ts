import * as O from 'fp-ts/lib/Option.js'
import type { NodeId } from '@/pure/graph'
import type { Cell, Viewport } from '@/pure/viewport'
import { isCellVisible } from '@/pure/viewport'
import type { CellStyle, FrameBuffer } from '@/pure/render/frame'

export interface RubberBand {
    readonly source: NodeId
    readonly to: Cell
}

export interface MenuOverlay {
    readonly anchor: Cell
    readonly items: readonly string[]
    readonly highlighted: number
}

export interface ModalOverlay {
    readonly title: string
    readonly text: string
}

export interface Overlays {
    readonly rubberBand: O.Option<RubberBand>
    readonly cursor: O.Option<Cell>
    readonly menu: O.Option<MenuOverlay>
    readonly modal: O.Option<ModalOverlay>
    readonly hud: string
}

export const NO_OVERLAYS: Overlays = {
    rubberBand: O.none,
    cursor: O.none,
    menu: O.none,
    modal: O.none,
    hud: '',
}

const CURSOR_GLYPH: string = '┼'
const TEXT_CURSOR: string = '▏'
const MIN_MODAL_WIDTH: number = 24

function textWidth(text: string): number {
    return Array.from(text).length
}

function fitText(text: string, width: number): string {
    const chars: readonly string[] = Array.from(text)
    return chars.length > width ? chars.slice(0, width).join('') : text + ' '.repeat(width - chars.length)
}

interface Box {
    readonly top: number
    readonly left: number
    readonly width: number
    readonly height: number
}

function drawBox(buffer: FrameBuffer, box: Box, style: CellStyle, title: string): void {
    const inner: number = box.width - 2
    const titled: string = title === '' ? '' : ` ${title} `
    const heading: string = textWidth(titled) >= inner ? fitText(titled, inner) : titled + '─'.repeat(inner - textWidth(titled))
    buffer.write(box.top, box.left, `┌${heading}┐`, style)
    for (let row: number = box.top + 1; row < box.top + box.height - 1; row++) {
        buffer.write(row, box.left, `│${' '.repeat(inner)}│`, style)
    }
    buffer.write(box.top + box.height - 1, box.left, `└${'─'.repeat(inner)}┘`, style)
    for (let row: number = box.top; row < box.top + box.height; row++) {
        for (let col: number = box.left; col < box.left + box.width; col++) {
            buffer.mark(row, col, undefined)
        }
    }
}

export function drawCursor(buffer: FrameBuffer, viewport: Viewport, cursor: O.Option<Cell>): void {
    if (O.isNone(cursor) || !isCellVisible(viewport, cursor.value)) {
        return
    }
    const { row, col } = cursor.value
    const under: string = buffer.get(row, col).ch
    buffer.put(row, col, under === ' ' ? CURSOR_GLYPH : under, 'cursor')
}

/** Box at the anchor, pushed back inside the canvas when it would overflow. */
export function menuBox(viewport: Viewport, menu: MenuOverlay): Box {
    const width: number = Math.min(Math.max(0, ...menu.items.map(textWidth)) + 4, viewport.cols)
    const height: number = Math.min(menu.items.length + 2, viewport.rows)
    return {
        top: Math.max(0, Math.min(menu.anchor.row, viewport.rows - height)),
        left: Math.max(0, Math.min(menu.anchor.col, viewport.cols - width)),
        width,
        height,
    }
}

export function drawMenu(buffer: FrameBuffer, viewport: Viewport, menu: O.Option<MenuOverlay>): void {
    if (O.isNone(menu)) {
        return
    }
    const box: Box = menuBox(viewport, menu.value)
    drawBox(buffer, box, 'menu', '')
    menu.value.items.slice(0, box.height - 2).forEach((item: string, index: number) => {
        const row: number = box.top + 1 + index
        const style: CellStyle = index === menu.value.highlighted ? 'menuActive' : 'menu'
        buffer.write(row, box.left + 1, ` ${fitText(item, box.width - 4)} `, style)
        for (let col: number = box.left; col < box.left + box.width; col++) {
            buffer.mark(row, col, { type: 'MenuItem', index })
        }
    })
}

export function drawModal(buffer: FrameBuffer, viewport: Viewport, modal: O.Option<ModalOverlay>): void {
    if (O.isNone(modal)) {
        return
    }
    const { title, text } = modal.value
    const width: number = Math.min(Math.max(MIN_MODAL_WIDTH, textWidth(title) + 4, textWidth(text) + 5), viewport.cols)
    const box: Box = {
        top: Math.max(0, Math.floor((viewport.rows - 3) / 2)),
        left: Math.max(0, Math.floor((viewport.cols - width) / 2)),
        width,
        height: 3,
    }
    drawBox(buffer, box, 'modal', title)
    // Long text scrolls so the end stays visible
    const room: number = Math.max(width - 4, 1)
    const chars: readonly string[] = [...Array.from(text), TEXT_CURSOR]
    buffer.write(box.top + 1, box.left + 2, chars.slice(Math.max(0, chars.length - room)).join(''), 'modal')
}

export function drawHud(buffer: FrameBuffer, row: number, text: string): void {
    buffer.write(row, 0, fitText(text, buffer.cols), 'hud')
}
