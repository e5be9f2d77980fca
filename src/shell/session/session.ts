import path from 'path'
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { EdgeId, Graph, GraphEdge, GraphError, GraphNode, NodeId, Position } from '@/pure/graph'
import { formatGraphError, getIncidentEdges } from '@/pure/graph'
import { decodeChunk, decodeInput } from '@/pure/input'
import type { InputEvent } from '@/pure/input'
import type { InteractionEffect, InteractionState, InteractionView, Selection, Transition } from '@/pure/interaction'
import {
    createInteractionState,
    interactionOverlays,
    modeName,
    reconcileInteraction,
    reduceInteraction
} from '@/pure/interaction'
import { computeCentroid } from '@/pure/layout'
import type { Composition, Frame } from '@/pure/render'
import { composeFrame, diffFrames, encodeUpdates, formatHud, hitAt } from '@/pure/render'
import type { GraphosSettings } from '@/pure/settings'
import type { Cell, Viewport } from '@/pure/viewport'
import {
    canvasCenter,
    cellToWorld,
    createViewport,
    fitViewport,
    panViewport,
    resizeViewport,
    zoomViewport
} from '@/pure/viewport'
import {
    addEdge,
    addNode,
    redo,
    removeEdge,
    removeNode,
    moveNode,
    setEdgeSelection,
    setHighlighted,
    setLabel,
    setPinned,
    setSelection,
    undo
} from '@/shell/graph/graph-commands'
import type { Logger } from '@/shell/logging/logger'
import { getGraph } from '@/shell/state/graph-store'
import type { LayoutEngine } from '@/shell/state/layout-engine'
import type { TerminalPort, TerminalSize } from '@/shell/terminal/terminal'

// cells kept free around the graph by fit-to-view
const FIT_MARGIN: number = 2
// how long a held-back ESC waits for the rest of a sequence before it is the escape key
export const ESCAPE_TIMEOUT_MS: number = 50

export interface SessionDeps {
    readonly terminal: TerminalPort
    readonly settings: GraphosSettings
    readonly layout: LayoutEngine
    readonly logger: Logger
    readonly filePath: O.Option<string>
    readonly saveGraph: (filePath: string, graph: Graph) => Promise<void>
    readonly now: () => number
    readonly onQuit: () => void
}

export interface Session {
    /** First full draw, optionally with a status message (e.g. the load summary). */
    readonly start: (status: O.Option<string>) => void
    readonly handleInput: (chunk: string) => void
    readonly handleResize: (size: TerminalSize) => void
    /** One layout tick, status expiry, then a render if anything visible changed. */
    readonly tick: () => void
    readonly render: () => void
    readonly getViewport: () => Viewport
    readonly getInteraction: () => InteractionState
    readonly getStatus: () => string
}

interface Status {
    readonly text: string
    readonly expiresAt: number
}

// What the screen shows; the frame is dirty when any of it changes
interface VisibleState {
    readonly graph: Graph
    readonly viewport: Viewport
    readonly overlays: string
}

function centerCell(viewport: Viewport): Cell {
    const middle = canvasCenter(viewport)
    return { row: Math.floor(middle.row), col: Math.floor(middle.col) }
}

export function createSession(deps: SessionDeps): Session {
    const { terminal, settings, layout, logger } = deps
    const fileName: string = O.match((): string => '', (filePath: string) => path.basename(filePath))(deps.filePath)

    const initialSize: TerminalSize = terminal.size()
    const initialCenter: Position = O.getOrElse((): Position => ({ x: 0, y: 0 }))(
        computeCentroid(Array.from(getGraph().nodes.values(), (node: GraphNode) => node.position))
    )
    let viewport: Viewport = createViewport(initialSize.rows - 1, initialSize.cols, settings.initialScale, initialCenter)
    let interaction: InteractionState = createInteractionState(centerCell(viewport))
    let status: Status | undefined = undefined
    let previousFrame: O.Option<Frame> = O.none
    let composition: Composition | undefined = undefined
    let dirty: boolean = true
    let quitting: boolean = false
    // start of an escape sequence still waiting for its next chunk
    let pendingInput: string = ''
    let pendingSince: number = 0

    // === VIEW ===

    const hudText = (): string => {
        const graph: Graph = getGraph()
        return formatHud({
            modeName: modeName(interaction.mode),
            graphMode: graph.mode,
            status: status?.text ?? '',
            scale: viewport.scale,
            nodeCount: graph.nodes.size,
            edgeCount: graph.edges.size,
            fileName,
            settling: !layout.isSettled()
        })
    }

    const getComposition = (): Composition => {
        composition ??= composeFrame({ graph: getGraph(), viewport, overlays: interactionOverlays(interaction, hudText()) })
        return composition
    }

    const interactionView = (): InteractionView => {
        const graph: Graph = getGraph()
        return {
            hitTest: (cell: Cell) => O.fromNullable(hitAt(getComposition().hitMap, cell.row, cell.col)),
            labelOf: (nodeId: NodeId) => O.fromNullable(graph.nodes.get(nodeId)?.label),
            isPinned: (nodeId: NodeId) => graph.nodes.get(nodeId)?.state.pinned ?? false,
            nextNodeId: graph.nextNodeId,
            canvas: { rows: viewport.rows, cols: viewport.cols },
            zoomStep: settings.zoomStep
        }
    }

    const visibleState = (): VisibleState => ({
        graph: getGraph(),
        viewport,
        overlays: JSON.stringify(interactionOverlays(interaction, hudText()))
    })

    const trackChanges = (update: () => void): void => {
        const before: VisibleState = visibleState()
        update()
        const after: VisibleState = visibleState()
        if (before.graph !== after.graph || before.viewport !== after.viewport || before.overlays !== after.overlays) {
            dirty = true
            composition = undefined
        }
    }

    // === STATUS ===

    const showStatus = (text: string): void => {
        status = { text, expiresAt: deps.now() + settings.statusTimeoutMs }
    }

    const reportGraphError = (action: string, error: GraphError): void => {
        const message: string = `${action} failed: ${formatGraphError(error)}`
        logger.warn(message)
        showStatus(message)
    }

    const whenRight = <A>(action: string, result: E.Either<GraphError, A>, onRight: (value: A) => void): void => {
        if (E.isLeft(result)) {
            reportGraphError(action, result.left)
            return
        }
        onRight(result.right)
    }

    // === EFFECTS ===

    const select = (selection: O.Option<Selection>): void => {
        if (O.isNone(selection)) {
            whenRight('clear selection', setSelection(O.none), () => undefined)
            return
        }
        const target: Selection = selection.value
        if (target.type === 'Node') {
            whenRight('select node', setSelection(O.some(target.nodeId)), () => undefined)
        } else {
            whenRight('select edge', setEdgeSelection(O.some(target.edgeId)), () => undefined)
        }
    }

    // Highlight follows the selection: a node's neighbours and incident edges, or an edge's endpoints
    const syncHighlight = (): void => {
        const graph: Graph = getGraph()
        const selectedNode: GraphNode | undefined = Array.from(graph.nodes.values()).find((node: GraphNode) => node.state.selected)
        if (selectedNode) {
            const incident: readonly GraphEdge[] = E.getOrElse((): readonly GraphEdge[] => [])(getIncidentEdges(graph, selectedNode.id))
            setHighlighted(
                incident.map((edge: GraphEdge) => edge.source === selectedNode.id ? edge.target : edge.source),
                incident.map((edge: GraphEdge) => edge.id)
            )
            return
        }
        const selectedEdge: GraphEdge | undefined = Array.from(graph.edges.values()).find((edge: GraphEdge) => edge.state.selected)
        setHighlighted(selectedEdge ? [selectedEdge.source, selectedEdge.target] : [], [])
    }

    const createNode = (cell: Cell, connectTo: O.Option<NodeId>): void => {
        const nodeId: NodeId = addNode(`n${getGraph().nextNodeId}`, O.some(cellToWorld(viewport, cell)))
        logger.info(`added node #${nodeId} "${getGraph().nodes.get(nodeId)?.label ?? ''}"`)
        if (O.isSome(connectTo)) {
            connect(connectTo.value, nodeId)
        }
    }

    const connect = (source: NodeId, target: NodeId): void => {
        whenRight('add edge', addEdge(source, target, O.none), (edgeId: EdgeId) => {
            logger.info(`added edge #${edgeId} #${source} -> #${target}`)
        })
    }

    const nudge = (nodeId: NodeId, dCols: number, dRows: number): void => {
        const node: GraphNode | undefined = getGraph().nodes.get(nodeId)
        if (!node) {
            reportGraphError('move node', { type: 'UnknownNode', nodeId })
            return
        }
        const position: Position = { x: node.position.x + dCols / viewport.scale, y: node.position.y + dRows / viewport.scale }
        whenRight('move node', E.chain(() => setPinned(nodeId, true))(moveNode(nodeId, position)), () => undefined)
    }

    const save = (): void => {
        if (O.isNone(deps.filePath)) {
            showStatus('nothing to save to: start graphos with a file name')
            return
        }
        const filePath: string = deps.filePath.value
        showStatus(`saving ${fileName}...`)
        void deps.saveGraph(filePath, getGraph()).then(
            () => afterAsync(() => showStatus(`saved ${fileName}`)),
            (error: unknown) => {
                logger.error(`saving ${filePath} failed: ${String(error)}`)
                afterAsync(() => showStatus(`save failed: ${error instanceof Error ? error.message : String(error)}`))
            }
        )
    }

    const replayHistory = (step: () => boolean, done: string, nothing: string): void => {
        if (step()) {
            logger.info(done)
            showStatus(done)
        } else {
            showStatus(nothing)
        }
        const graph: Graph = getGraph()
        interaction = reconcileInteraction(
            interaction,
            (nodeId: NodeId) => graph.nodes.has(nodeId),
            (edgeId: EdgeId) => graph.edges.has(edgeId)
        )
    }

    const applyEffect = (effect: InteractionEffect): void => {
        switch (effect.type) {
            case 'Quit':
                quitting = true
                logger.info('quit requested')
                deps.onQuit()
                return
            case 'Pan':
                viewport = panViewport(viewport, effect.dCols, effect.dRows)
                return
            case 'Zoom':
                viewport = zoomViewport(viewport, effect.factor, effect.anchor, settings)
                return
            case 'Fit':
                viewport = fitViewport(viewport, Array.from(getGraph().nodes.values(), (node: GraphNode) => node.position), settings, FIT_MARGIN)
                return
            case 'Select':
                select(effect.selection)
                return
            case 'AddNode':
                createNode(effect.cell, effect.connectTo)
                return
            case 'AddEdge':
                connect(effect.source, effect.target)
                return
            case 'RemoveNode':
                whenRight('delete node', removeNode(effect.nodeId), () => logger.info(`removed node #${effect.nodeId}`))
                return
            case 'RemoveEdge':
                whenRight('delete edge', removeEdge(effect.edgeId), () => logger.info(`removed edge #${effect.edgeId}`))
                return
            case 'TogglePin': {
                const pinned: boolean = getGraph().nodes.get(effect.nodeId)?.state.pinned ?? false
                whenRight(pinned ? 'unpin node' : 'pin node', setPinned(effect.nodeId, !pinned), () => undefined)
                return
            }
            case 'SetLabel':
                whenRight('edit label', setLabel(effect.nodeId, effect.label), (applied: string) => {
                    logger.info(`relabelled node #${effect.nodeId} "${applied}"`)
                    if (applied !== effect.label) {
                        showStatus(`label "${effect.label}" is taken, using "${applied}"`)
                    }
                })
                return
            case 'NudgeNode':
                nudge(effect.nodeId, effect.dCols, effect.dRows)
                return
            case 'Save':
                save()
                return
            case 'Undo':
                replayHistory(undo, 'undone', 'nothing to undo')
                return
            case 'Redo':
                replayHistory(redo, 'redone', 'nothing to redo')
                return
        }
    }

    const handleEvent = (event: InputEvent): void => {
        trackChanges(() => {
            const transition: Transition = reduceInteraction(interaction, event, interactionView())
            interaction = transition.state
            transition.effects.forEach((effect: InteractionEffect) => {
                if (!quitting) {
                    applyEffect(effect)
                }
            })
            if (transition.effects.length > 0) {
                syncHighlight()
            }
        })
    }

    const handleEvents = (events: readonly InputEvent[]): void => {
        for (const event of events) {
            if (quitting) {
                return
            }
            handleEvent(event)
        }
    }

    // === RENDER ===

    const render = (): void => {
        if (!dirty || quitting) {
            return
        }
        const frame: Frame = getComposition().frame
        terminal.write(encodeUpdates(diffFrames(previousFrame, frame)))
        previousFrame = O.some(frame)
        dirty = false
    }

    // status updates that land after the input handler returned
    const afterAsync = (update: () => void): void => {
        trackChanges(update)
        render()
    }

    return {
        start: (initialStatus: O.Option<string>): void => {
            if (O.isSome(initialStatus)) {
                showStatus(initialStatus.value)
            }
            dirty = true
            composition = undefined
            render()
        },
        handleInput: (chunk: string): void => {
            const { events, pending } = decodeChunk(pendingInput + chunk)
            pendingInput = pending
            pendingSince = deps.now()
            handleEvents(events)
            render()
        },
        handleResize: (size: TerminalSize): void => {
            viewport = resizeViewport(viewport, size.rows - 1, size.cols)
            interaction = {
                ...interaction,
                cursor: {
                    row: Math.min(interaction.cursor.row, Math.max(viewport.rows - 1, 0)),
                    col: Math.min(interaction.cursor.col, Math.max(viewport.cols - 1, 0))
                }
            }
            logger.debug(`resized to ${size.rows}x${size.cols}`)
            previousFrame = O.none
            dirty = true
            composition = undefined
            render()
        },
        tick: (): void => {
            if (pendingInput !== '' && deps.now() - pendingSince >= ESCAPE_TIMEOUT_MS) {
                const stale: string = pendingInput
                pendingInput = ''
                handleEvents(decodeInput(stale))
            }
            trackChanges(() => {
                layout.tick()
                if (status !== undefined && deps.now() >= status.expiresAt) {
                    status = undefined
                }
            })
            render()
        },
        render,
        getViewport: () => viewport,
        getInteraction: () => interaction,
        getStatus: () => status?.text ?? ''
    }
}
