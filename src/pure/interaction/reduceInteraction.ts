import * as O from 'fp-ts/lib/Option.js'
import type { EdgeId, NodeId } from '@/pure/graph'
import type { InputEvent } from '@/pure/input'
import type { HitTarget } from '@/pure/render'
import type { Cell } from '@/pure/viewport'
import { menuItemsFor } from '@/pure/interaction/contextMenu'
import type {
    InteractionEffect,
    InteractionMode,
    InteractionState,
    InteractionView,
    MenuItem,
    MenuTarget,
    Transition,
} from '@/pure/interaction/types'

/**
 * The interaction controller as a pure reducer: one input event in, the
 * next state and the effects the session must apply out.
 */

export const PAN_COLS: number = 4
export const PAN_ROWS: number = 2

const IDLE: InteractionMode = { type: 'Idle', selectedEdge: O.none }

export function createInteractionState(cursor: Cell): InteractionState {
    return { mode: IDLE, cursor }
}

function to(state: InteractionState, mode: InteractionMode, effects: readonly InteractionEffect[] = []): Transition {
    return { state: { ...state, mode }, effects }
}

function stay(state: InteractionState): Transition {
    return { state, effects: [] }
}

function andThen(first: Transition, next: (state: InteractionState) => Transition): Transition {
    const second: Transition = next(first.state)
    return { state: second.state, effects: [...first.effects, ...second.effects] }
}

const QUIT: readonly InteractionEffect[] = [{ type: 'Quit' }]

function clamp(value: number, max: number): number {
    return Math.min(Math.max(value, 0), Math.max(max - 1, 0))
}

function moveCursor(state: InteractionState, view: InteractionView, dCols: number, dRows: number): InteractionState {
    return {
        ...state,
        cursor: {
            row: clamp(state.cursor.row + dRows, view.canvas.rows),
            col: clamp(state.cursor.col + dCols, view.canvas.cols),
        },
    }
}

function canvasCenterCell(view: InteractionView): Cell {
    return { row: Math.floor((view.canvas.rows - 1) / 2), col: Math.floor((view.canvas.cols - 1) / 2) }
}

function selectedNode(mode: InteractionMode): O.Option<NodeId> {
    return mode.type === 'NodeSelected' ? O.some(mode.nodeId) : O.none
}

function selectedEdge(mode: InteractionMode): O.Option<EdgeId> {
    return mode.type === 'Idle' ? mode.selectedEdge : O.none
}

function hasSelection(mode: InteractionMode): boolean {
    return O.isSome(selectedNode(mode)) || O.isSome(selectedEdge(mode))
}

const CURSOR_KEYS: Readonly<Record<string, readonly [number, number]>> = {
    h: [-1, 0],
    j: [0, 1],
    k: [0, -1],
    l: [1, 0],
}

const NUDGE_KEYS: Readonly<Record<string, readonly [number, number]>> = {
    H: [-1, 0],
    J: [0, 1],
    K: [0, -1],
    L: [1, 0],
}

const PAN_KEYS: Readonly<Record<string, readonly [number, number]>> = {
    left: [-PAN_COLS, 0],
    right: [PAN_COLS, 0],
    up: [0, -PAN_ROWS],
    down: [0, PAN_ROWS],
}

// ============================================================================
// Idle / NodeSelected
// ============================================================================

function clearSelection(state: InteractionState): Transition {
    return to(state, IDLE, hasSelection(state.mode) ? [{ type: 'Select', selection: O.none }] : [])
}

function deleteSelection(state: InteractionState): Transition {
    const node: O.Option<NodeId> = selectedNode(state.mode)
    if (O.isSome(node)) {
        return to(state, IDLE, [{ type: 'RemoveNode', nodeId: node.value }])
    }
    const edge: O.Option<EdgeId> = selectedEdge(state.mode)
    if (O.isSome(edge)) {
        return to(state, IDLE, [{ type: 'RemoveEdge', edgeId: edge.value }])
    }
    return stay(state)
}

function startEditing(state: InteractionState, view: InteractionView): Transition {
    const node: O.Option<NodeId> = selectedNode(state.mode)
    if (O.isNone(node)) {
        return stay(state)
    }
    const label: O.Option<string> = view.labelOf(node.value)
    return O.isSome(label)
        ? to(state, { type: 'Editing', nodeId: node.value, buffer: label.value })
        : stay(state)
}

function openMenu(state: InteractionState, view: InteractionView, target: MenuTarget, anchor: Cell): InteractionState {
    const pinned: boolean = target.type === 'Node' && view.isPinned(target.nodeId)
    return { ...state, mode: { type: 'Menu', target, items: menuItemsFor(target, pinned), highlighted: 0, anchor } }
}

function menuTargetFor(mode: InteractionMode): MenuTarget {
    const node: O.Option<NodeId> = selectedNode(mode)
    if (O.isSome(node)) {
        return { type: 'Node', nodeId: node.value }
    }
    const edge: O.Option<EdgeId> = selectedEdge(mode)
    return O.isSome(edge) ? { type: 'Edge', edgeId: edge.value } : { type: 'Canvas' }
}

function onCommandChar(state: InteractionState, char: string, view: InteractionView): Transition {
    const node: O.Option<NodeId> = selectedNode(state.mode)
    const cursorMove: readonly [number, number] | undefined = CURSOR_KEYS[char]
    if (cursorMove) {
        return stay(moveCursor(state, view, cursorMove[0], cursorMove[1]))
    }
    const nudge: readonly [number, number] | undefined = NUDGE_KEYS[char]
    if (nudge) {
        return O.isSome(node)
            ? { state, effects: [{ type: 'NudgeNode', nodeId: node.value, dCols: nudge[0], dRows: nudge[1] }] }
            : stay(state)
    }
    switch (char) {
        case 'q':
            return { state, effects: QUIT }
        case '+':
        case '=':
            return { state, effects: [{ type: 'Zoom', factor: view.zoomStep, anchor: canvasCenterCell(view) }] }
        case '-':
            return { state, effects: [{ type: 'Zoom', factor: 1 / view.zoomStep, anchor: canvasCenterCell(view) }] }
        case 'n':
            return to(state, { type: 'NodeSelected', nodeId: view.nextNodeId, pointerDown: false }, [
                { type: 'AddNode', cell: state.cursor, connectTo: node },
                { type: 'Select', selection: O.some({ type: 'Node', nodeId: view.nextNodeId }) },
            ])
        case 'd':
            return deleteSelection(state)
        case 'p':
            return O.isSome(node) ? { state, effects: [{ type: 'TogglePin', nodeId: node.value }] } : stay(state)
        case 'e':
            return startEditing(state, view)
        case 'c':
            return O.isSome(node)
                ? to(state, { type: 'EdgeDrawing', source: node.value, cell: state.cursor, viaKeyboard: true })
                : stay(state)
        case 'f':
            return { state, effects: [{ type: 'Fit' }] }
        case 's':
            return { state, effects: [{ type: 'Save' }] }
        case 'u':
            return { state, effects: [{ type: 'Undo' }] }
        case 'r':
            return { state, effects: [{ type: 'Redo' }] }
        case 'm':
            return stay(openMenu(state, view, menuTargetFor(state.mode), state.cursor))
        case ' ':
            return clickAt(state, state.cursor, view)
        default:
            return stay(state)
    }
}

function clickAt(state: InteractionState, cell: Cell, view: InteractionView): Transition {
    return andThen(
        reduceInteraction(state, { type: 'Mouse', action: 'down', button: 'left', cell }, view),
        (next: InteractionState) => reduceInteraction(next, { type: 'Mouse', action: 'up', button: 'left', cell }, view)
    )
}

function hitAt(view: InteractionView, cell: Cell): HitTarget | undefined {
    return O.toUndefined(view.hitTest(cell))
}

function onPointerDown(state: InteractionState, cell: Cell, view: InteractionView): Transition {
    const moved: InteractionState = { ...state, cursor: cell }
    const hit: HitTarget | undefined = hitAt(view, cell)
    if (hit?.type === 'Node') {
        return to(moved, { type: 'NodeSelected', nodeId: hit.nodeId, pointerDown: true }, [
            { type: 'Select', selection: O.some({ type: 'Node', nodeId: hit.nodeId }) },
        ])
    }
    if (hit?.type === 'Edge') {
        return to(moved, { type: 'Idle', selectedEdge: O.some(hit.edgeId) }, [
            { type: 'Select', selection: O.some({ type: 'Edge', edgeId: hit.edgeId }) },
        ])
    }
    const cleared: readonly InteractionEffect[] = hasSelection(state.mode) ? [{ type: 'Select', selection: O.none }] : []
    return to(moved, { type: 'Panning', last: cell }, cleared)
}

function onContextClick(state: InteractionState, cell: Cell, view: InteractionView): Transition {
    const moved: InteractionState = { ...state, cursor: cell }
    const hit: HitTarget | undefined = hitAt(view, cell)
    if (hit?.type === 'Node') {
        const selected: InteractionState = { ...moved, mode: { type: 'NodeSelected', nodeId: hit.nodeId, pointerDown: false } }
        return {
            state: openMenu(selected, view, { type: 'Node', nodeId: hit.nodeId }, cell),
            effects: [{ type: 'Select', selection: O.some({ type: 'Node', nodeId: hit.nodeId }) }],
        }
    }
    if (hit?.type === 'Edge') {
        const selected: InteractionState = { ...moved, mode: { type: 'Idle', selectedEdge: O.some(hit.edgeId) } }
        return {
            state: openMenu(selected, view, { type: 'Edge', edgeId: hit.edgeId }, cell),
            effects: [{ type: 'Select', selection: O.some({ type: 'Edge', edgeId: hit.edgeId }) }],
        }
    }
    const cleared: readonly InteractionEffect[] = hasSelection(state.mode) ? [{ type: 'Select', selection: O.none }] : []
    return { state: openMenu({ ...moved, mode: IDLE }, view, { type: 'Canvas' }, cell), effects: cleared }
}

function onBrowsingEvent(state: InteractionState, event: InputEvent, view: InteractionView): Transition {
    switch (event.type) {
        case 'Char':
            return onCommandChar(state, event.char, view)
        case 'Key': {
            const pan: readonly [number, number] | undefined = PAN_KEYS[event.key]
            if (pan) {
                return { state, effects: [{ type: 'Pan', dCols: pan[0], dRows: pan[1] }] }
            }
            switch (event.key) {
                case 'ctrlC':
                    return { state, effects: QUIT }
                case 'enter':
                    return startEditing(state, view)
                case 'delete':
                case 'backspace':
                    return deleteSelection(state)
                case 'escape':
                    return clearSelection(state)
                default:
                    return stay(state)
            }
        }
        case 'Mouse':
            switch (event.action) {
                case 'down':
                    if (event.button === 'left') return onPointerDown(state, event.cell, view)
                    if (event.button === 'right') return onContextClick(state, event.cell, view)
                    return stay(state)
                case 'wheelUp':
                    return { state, effects: [{ type: 'Zoom', factor: view.zoomStep, anchor: event.cell }] }
                case 'wheelDown':
                    return { state, effects: [{ type: 'Zoom', factor: 1 / view.zoomStep, anchor: event.cell }] }
                case 'drag':
                    if (state.mode.type === 'NodeSelected' && state.mode.pointerDown) {
                        return to(state, { type: 'EdgeDrawing', source: state.mode.nodeId, cell: event.cell, viaKeyboard: false })
                    }
                    return stay(state)
                case 'up':
                    if (state.mode.type === 'NodeSelected' && state.mode.pointerDown) {
                        return to(state, { ...state.mode, pointerDown: false })
                    }
                    return stay(state)
                case 'move':
                    return stay(state)
            }
    }
}

// ============================================================================
// EdgeDrawing
// ============================================================================

function finishEdge(state: InteractionState, source: NodeId, cell: Cell, view: InteractionView): Transition {
    const hit: HitTarget | undefined = hitAt(view, cell)
    if (hit?.type === 'Node' && hit.nodeId !== source) {
        return to(state, { type: 'NodeSelected', nodeId: source, pointerDown: false }, [
            { type: 'AddEdge', source, target: hit.nodeId },
        ])
    }
    return to(state, IDLE, [{ type: 'Select', selection: O.none }])
}

function onEdgeDrawingEvent(
    state: InteractionState,
    mode: Extract<InteractionMode, { readonly type: 'EdgeDrawing' }>,
    event: InputEvent,
    view: InteractionView
): Transition {
    switch (event.type) {
        case 'Mouse':
            if (event.action === 'drag' || event.action === 'move') {
                return to(state, { ...mode, cell: event.cell })
            }
            if (event.action === 'up' || (event.action === 'down' && mode.viaKeyboard)) {
                return finishEdge({ ...state, cursor: event.cell }, mode.source, event.cell, view)
            }
            return stay(state)
        case 'Char': {
            const cursorMove: readonly [number, number] | undefined = CURSOR_KEYS[event.char]
            if (cursorMove) {
                const moved: InteractionState = moveCursor(state, view, cursorMove[0], cursorMove[1])
                return to(moved, { ...mode, cell: moved.cursor })
            }
            if (event.char === ' ') {
                return finishEdge(state, mode.source, state.cursor, view)
            }
            return event.char === 'q' ? { state, effects: QUIT } : stay(state)
        }
        case 'Key':
            switch (event.key) {
                case 'ctrlC':
                    return { state, effects: QUIT }
                case 'enter':
                    return finishEdge(state, mode.source, state.cursor, view)
                case 'escape':
                    return to(state, { type: 'NodeSelected', nodeId: mode.source, pointerDown: false })
                default:
                    return stay(state)
            }
    }
}

// ============================================================================
// Panning
// ============================================================================

function onPanningEvent(state: InteractionState, last: Cell, event: InputEvent): Transition {
    if (event.type === 'Mouse') {
        if (event.action === 'drag') {
            return to(state, { type: 'Panning', last: event.cell }, [
                { type: 'Pan', dCols: last.col - event.cell.col, dRows: last.row - event.cell.row },
            ])
        }
        if (event.action === 'up') {
            return to(state, IDLE)
        }
        return stay(state)
    }
    const quits: boolean = (event.type === 'Key' && event.key === 'ctrlC') || (event.type === 'Char' && event.char === 'q')
    return quits ? { state, effects: QUIT } : stay(state)
}

// ============================================================================
// Editing
// ============================================================================

function onEditingEvent(
    state: InteractionState,
    mode: Extract<InteractionMode, { readonly type: 'Editing' }>,
    event: InputEvent
): Transition {
    const back: InteractionMode = { type: 'NodeSelected', nodeId: mode.nodeId, pointerDown: false }
    switch (event.type) {
        case 'Char':
            return to(state, { ...mode, buffer: mode.buffer + event.char })
        case 'Key':
            switch (event.key) {
                case 'ctrlC':
                    return { state, effects: QUIT }
                case 'backspace':
                    return to(state, { ...mode, buffer: Array.from(mode.buffer).slice(0, -1).join('') })
                case 'enter':
                    return to(state, back, [{ type: 'SetLabel', nodeId: mode.nodeId, label: mode.buffer }])
                case 'escape':
                    return to(state, back)
                default:
                    return stay(state)
            }
        case 'Mouse':
            return stay(state)
    }
}

// ============================================================================
// Menu
// ============================================================================

function menuBaseMode(target: MenuTarget): InteractionMode {
    switch (target.type) {
        case 'Node':
            return { type: 'NodeSelected', nodeId: target.nodeId, pointerDown: false }
        case 'Edge':
            return { type: 'Idle', selectedEdge: O.some(target.edgeId) }
        case 'Canvas':
            return IDLE
    }
}

function chooseMenuItem(
    state: InteractionState,
    mode: Extract<InteractionMode, { readonly type: 'Menu' }>,
    index: number,
    view: InteractionView
): Transition {
    const base: InteractionState = {
        mode: menuBaseMode(mode.target),
        cursor: mode.target.type === 'Canvas' ? mode.anchor : state.cursor,
    }
    const item: MenuItem | undefined = mode.items[index]
    return item ? onCommandChar(base, item.key, view) : stay(base)
}

function onMenuEvent(
    state: InteractionState,
    mode: Extract<InteractionMode, { readonly type: 'Menu' }>,
    event: InputEvent,
    view: InteractionView
): Transition {
    const count: number = mode.items.length
    const highlight = (index: number): Transition => to(state, { ...mode, highlighted: (index + count) % count })
    const close = (): Transition => to(state, menuBaseMode(mode.target))

    switch (event.type) {
        case 'Char':
            switch (event.char) {
                case 'q':
                    return { state, effects: QUIT }
                case 'j':
                    return highlight(mode.highlighted + 1)
                case 'k':
                    return highlight(mode.highlighted - 1)
                case ' ':
                    return chooseMenuItem(state, mode, mode.highlighted, view)
                default:
                    return stay(state)
            }
        case 'Key':
            switch (event.key) {
                case 'ctrlC':
                    return { state, effects: QUIT }
                case 'down':
                case 'tab':
                    return highlight(mode.highlighted + 1)
                case 'up':
                    return highlight(mode.highlighted - 1)
                case 'enter':
                    return chooseMenuItem(state, mode, mode.highlighted, view)
                case 'escape':
                    return close()
                default:
                    return stay(state)
            }
        case 'Mouse': {
            const hit: HitTarget | undefined = hitAt(view, event.cell)
            const item: number | undefined = hit?.type === 'MenuItem' ? hit.index : undefined
            if (event.action === 'down') {
                return item === undefined ? close() : chooseMenuItem(state, mode, item, view)
            }
            if ((event.action === 'move' || event.action === 'drag') && item !== undefined && item !== mode.highlighted) {
                return highlight(item)
            }
            return stay(state)
        }
    }
}

// ============================================================================
// Entry point
// ============================================================================

export function reduceInteraction(state: InteractionState, event: InputEvent, view: InteractionView): Transition {
    const mode: InteractionMode = state.mode
    switch (mode.type) {
        case 'Idle':
        case 'NodeSelected':
            return onBrowsingEvent(state, event, view)
        case 'EdgeDrawing':
            return onEdgeDrawingEvent(state, mode, event, view)
        case 'Panning':
            return onPanningEvent(state, mode.last, event)
        case 'Editing':
            return onEditingEvent(state, mode, event)
        case 'Menu':
            return onMenuEvent(state, mode, event, view)
    }
}

/**
 * Drop references to nodes or edges that no longer exist, e.g. after an
 * undo removed the selected node.
 */
export function reconcileInteraction(
    state: InteractionState,
    hasNode: (nodeId: NodeId) => boolean,
    hasEdge: (edgeId: EdgeId) => boolean
): InteractionState {
    const mode: InteractionMode = state.mode
    const live: boolean = (() => {
        switch (mode.type) {
            case 'Idle':
                return O.isNone(mode.selectedEdge) || hasEdge(mode.selectedEdge.value)
            case 'NodeSelected':
                return hasNode(mode.nodeId)
            case 'EdgeDrawing':
                return hasNode(mode.source)
            case 'Editing':
                return hasNode(mode.nodeId)
            case 'Panning':
                return true
            case 'Menu':
                return mode.target.type === 'Canvas'
                    || (mode.target.type === 'Node' ? hasNode(mode.target.nodeId) : hasEdge(mode.target.edgeId))
        }
    })()
    return live ? state : { ...state, mode: IDLE }
}

/** Short name of the mode for the HUD. */
export function modeName(mode: InteractionMode): string {
    switch (mode.type) {
        case 'Idle':
            return O.isSome(mode.selectedEdge) ? 'EDGE' : 'IDLE'
        case 'NodeSelected':
            return 'NODE'
        case 'EdgeDrawing':
            return 'CONNECT'
        case 'Panning':
            return 'PAN'
        case 'Editing':
            return 'EDIT'
        case 'Menu':
            return 'MENU'
    }
}
