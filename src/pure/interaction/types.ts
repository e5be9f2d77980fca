import type * as O from 'fp-ts/lib/Option.js'
import type { EdgeId, NodeId } from '@/pure/graph'
import type { HitTarget } from '@/pure/render'
import type { Cell } from '@/pure/viewport'

export type Selection =
    | { readonly type: 'Node'; readonly nodeId: NodeId }
    | { readonly type: 'Edge'; readonly edgeId: EdgeId }

export type MenuTarget =
    | { readonly type: 'Node'; readonly nodeId: NodeId }
    | { readonly type: 'Edge'; readonly edgeId: EdgeId }
    | { readonly type: 'Canvas' }

/** A menu entry runs the same command as pressing `key`. */
export interface MenuItem {
    readonly label: string
    readonly key: string
}

export type InteractionMode =
    | { readonly type: 'Idle'; readonly selectedEdge: O.Option<EdgeId> }
    | { readonly type: 'NodeSelected'; readonly nodeId: NodeId; readonly pointerDown: boolean }
    | { readonly type: 'EdgeDrawing'; readonly source: NodeId; readonly cell: Cell; readonly viaKeyboard: boolean }
    | { readonly type: 'Panning'; readonly last: Cell }
    | { readonly type: 'Editing'; readonly nodeId: NodeId; readonly buffer: string }
    | { readonly type: 'Menu'; readonly target: MenuTarget; readonly items: readonly MenuItem[]; readonly highlighted: number; readonly anchor: Cell }

export interface InteractionState {
    readonly mode: InteractionMode
    readonly cursor: Cell // keyboard cursor, also moved by pointer presses
}

export type InteractionEffect =
    | { readonly type: 'Quit' }
    | { readonly type: 'Pan'; readonly dCols: number; readonly dRows: number }
    | { readonly type: 'Zoom'; readonly factor: number; readonly anchor: Cell }
    | { readonly type: 'Fit' }
    | { readonly type: 'Select'; readonly selection: O.Option<Selection> }
    | { readonly type: 'AddNode'; readonly cell: Cell; readonly connectTo: O.Option<NodeId> }
    | { readonly type: 'AddEdge'; readonly source: NodeId; readonly target: NodeId }
    | { readonly type: 'RemoveNode'; readonly nodeId: NodeId }
    | { readonly type: 'RemoveEdge'; readonly edgeId: EdgeId }
    | { readonly type: 'TogglePin'; readonly nodeId: NodeId }
    | { readonly type: 'SetLabel'; readonly nodeId: NodeId; readonly label: string }
    | { readonly type: 'NudgeNode'; readonly nodeId: NodeId; readonly dCols: number; readonly dRows: number }
    | { readonly type: 'Save' }
    | { readonly type: 'Undo' }
    | { readonly type: 'Redo' }

/** What the machine may read about the world; it never writes to it. */
export interface InteractionView {
    readonly hitTest: (cell: Cell) => O.Option<HitTarget>
    readonly labelOf: (nodeId: NodeId) => O.Option<string>
    readonly isPinned: (nodeId: NodeId) => boolean
    readonly nextNodeId: NodeId
    readonly canvas: { readonly rows: number; readonly cols: number }
    readonly zoomStep: number
}

export interface Transition {
    readonly state: InteractionState
    readonly effects: readonly InteractionEffect[]
}
