import type { NodeId, Position } from '@/pure/graph'

export interface LayoutParams {
    readonly repulsion: number
    readonly springStrength: number
    readonly edgeLength: number // rest length of a spring, in world units
    readonly damping: number
    readonly timeStep: number
    readonly minDistance: number // repulsion is computed as if nodes were never closer than this
    readonly initialTemperature: number // maximum step length right after a reheat
    readonly cooling: number // temperature multiplier per iteration, in (0, 1)
    readonly convergenceThreshold: number
    readonly iterationsPerTick: number
    readonly seedJitter: number // radius of the random offset given to seeded nodes
}

export interface Vector {
    readonly x: number
    readonly y: number
}

export interface Body {
    readonly velocity: Vector
}

export interface LayoutState {
    readonly bodies: ReadonlyMap<NodeId, Body>
    readonly temperature: number
    readonly converged: boolean
    readonly iterations: number // since the last reheat
}

/** Positions produced by the layout, to be written back to the graph. */
export type PositionUpdates = ReadonlyMap<NodeId, Position>

export type RandomSource = () => number
