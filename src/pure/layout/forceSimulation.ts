import type { Graph, GraphEdge, GraphNode, NodeId, Position } from '@/pure/graph'
import type { Body, LayoutParams, LayoutState, PositionUpdates, Vector } from '@/pure/layout/types'

/**
 * Force-directed layout, one iteration at a time.
 *
 * Every pair of nodes repels with repulsion / d², every edge pulls its
 * endpoints towards edgeLength with springStrength · (d − edgeLength).
 * Step length is capped by a temperature that cools geometrically, so the
 * simulation always settles. Pinned nodes exert forces but never move.
 */

const ZERO: Vector = { x: 0, y: 0 }
const EPSILON: number = 1e-9
const REST: Body = { velocity: ZERO }

export function createLayoutState(nodeIds: Iterable<NodeId>, params: LayoutParams): LayoutState {
    return {
        bodies: new Map(Array.from(nodeIds, (id: NodeId): [NodeId, Body] => [id, REST])),
        temperature: params.initialTemperature,
        converged: false,
        iterations: 0,
    }
}

/** Restart the cooling schedule, keeping positions and velocities (warm start). */
export function reheat(state: LayoutState, params: LayoutParams): LayoutState {
    return { ...state, temperature: params.initialTemperature, converged: false, iterations: 0 }
}

/** Unit vector for two coincident nodes, fixed by their ids. */
function separationDirection(a: NodeId, b: NodeId): Vector {
    const angle: number = ((a * 0.618033988749895 + b * 0.381966011250105) % 1) * 2 * Math.PI
    return { x: Math.cos(angle), y: Math.sin(angle) }
}

type ForceMap = Map<NodeId, { x: number; y: number }>

function addForce(forces: ForceMap, id: NodeId, fx: number, fy: number): void {
    const force: { x: number; y: number } | undefined = forces.get(id)
    if (force) {
        force.x += fx
        force.y += fy
    }
}

function accumulateRepulsion(forces: ForceMap, nodes: readonly GraphNode[], positions: ReadonlyMap<NodeId, Position>, params: LayoutParams): void {
    for (let i: number = 0; i < nodes.length; i++) {
        for (let j: number = i + 1; j < nodes.length; j++) {
            const a: GraphNode = nodes[i]
            const b: GraphNode = nodes[j]
            const pa: Position = positions.get(a.id) ?? a.position
            const pb: Position = positions.get(b.id) ?? b.position
            const dx: number = pb.x - pa.x
            const dy: number = pb.y - pa.y
            const distance: number = Math.hypot(dx, dy)
            const direction: Vector = distance < EPSILON
                ? separationDirection(a.id, b.id)
                : { x: dx / distance, y: dy / distance }
            const clamped: number = Math.max(distance, params.minDistance)
            const magnitude: number = params.repulsion / (clamped * clamped)
            addForce(forces, a.id, -direction.x * magnitude, -direction.y * magnitude)
            addForce(forces, b.id, direction.x * magnitude, direction.y * magnitude)
        }
    }
}

function accumulateSprings(forces: ForceMap, edges: Iterable<GraphEdge>, positions: ReadonlyMap<NodeId, Position>, params: LayoutParams): void {
    for (const edge of edges) {
        if (edge.source === edge.target) {
            continue
        }
        const ps: Position | undefined = positions.get(edge.source)
        const pt: Position | undefined = positions.get(edge.target)
        if (!ps || !pt) {
            continue
        }
        const dx: number = pt.x - ps.x
        const dy: number = pt.y - ps.y
        const distance: number = Math.hypot(dx, dy)
        if (distance < EPSILON) {
            continue
        }
        const magnitude: number = params.springStrength * (distance - params.edgeLength)
        const fx: number = (dx / distance) * magnitude
        const fy: number = (dy / distance) * magnitude
        addForce(forces, edge.source, fx, fy)
        addForce(forces, edge.target, -fx, -fy)
    }
}

export interface IterationResult {
    readonly state: LayoutState
    readonly positions: ReadonlyMap<NodeId, Position>
    readonly maxDisplacement: number
}

/**
 * One iteration. `positions` holds the current position of every node
 * (falling back to the graph's own record when absent).
 */
export function stepLayout(
    graph: Graph,
    state: LayoutState,
    positions: ReadonlyMap<NodeId, Position>,
    params: LayoutParams
): IterationResult {
    const nodes: readonly GraphNode[] = Array.from(graph.nodes.values())
    const current: Map<NodeId, Position> = new Map(nodes.map((node: GraphNode): [NodeId, Position] => [node.id, positions.get(node.id) ?? node.position]))

    const forces: ForceMap = new Map(nodes.map((node: GraphNode): [NodeId, { x: number; y: number }] => [node.id, { x: 0, y: 0 }]))
    accumulateRepulsion(forces, nodes, current, params)
    accumulateSprings(forces, graph.edges.values(), current, params)

    const bodies: Map<NodeId, Body> = new Map()
    const next: Map<NodeId, Position> = new Map()
    let maxDisplacement: number = 0

    for (const node of nodes) {
        const position: Position = current.get(node.id) ?? node.position
        if (node.state.pinned) {
            bodies.set(node.id, REST)
            next.set(node.id, position)
            continue
        }
        const body: Body = state.bodies.get(node.id) ?? REST
        const force: Vector = forces.get(node.id) ?? ZERO
        const vx: number = (body.velocity.x + force.x * params.timeStep) * params.damping
        const vy: number = (body.velocity.y + force.y * params.timeStep) * params.damping
        const stepLength: number = Math.hypot(vx, vy) * params.timeStep
        const cap: number = stepLength > state.temperature && stepLength > 0 ? state.temperature / stepLength : 1
        const sx: number = vx * params.timeStep * cap
        const sy: number = vy * params.timeStep * cap

        bodies.set(node.id, { velocity: { x: vx * cap, y: vy * cap } })
        next.set(node.id, { x: position.x + sx, y: position.y + sy })
        maxDisplacement = Math.max(maxDisplacement, Math.hypot(sx, sy))
    }

    return {
        state: {
            bodies,
            temperature: Math.max(state.temperature * params.cooling, 0),
            converged: maxDisplacement < params.convergenceThreshold,
            iterations: state.iterations + 1,
        },
        positions: next,
        maxDisplacement,
    }
}

export interface TickResult {
    readonly state: LayoutState
    readonly updates: PositionUpdates // only nodes whose position changed
}

/**
 * Run at most params.iterationsPerTick iterations, stopping at convergence.
 * A converged state does no work until it is reheated.
 */
export function tickLayout(graph: Graph, state: LayoutState, params: LayoutParams): TickResult {
    let current: LayoutState = state
    let positions: ReadonlyMap<NodeId, Position> = new Map()
    for (let i: number = 0; i < params.iterationsPerTick && !current.converged; i++) {
        const result: IterationResult = stepLayout(graph, current, positions, params)
        current = result.state
        positions = result.positions
    }

    const updates: Map<NodeId, Position> = new Map()
    positions.forEach((position: Position, id: NodeId) => {
        const before: Position | undefined = graph.nodes.get(id)?.position
        if (before && (before.x !== position.x || before.y !== position.y)) {
            updates.set(id, position)
        }
    })
    return { state: current, updates }
}
