import type { Graph, GraphChange, GraphDelta, GraphNode, NodeId, Position } from '@/pure/graph'
import { getNeighbors } from '@/pure/graph'
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { LayoutParams, PositionUpdates, RandomSource } from '@/pure/layout/types'

/**
 * Initial positions for nodes created without one.
 *
 * A node starts next to the centroid of its neighbours that already have a
 * position, or next to the centroid of the whole positioned graph when it
 * has none. The offset is random within seedJitter so that nodes seeded
 * at the same centroid do not coincide.
 */

export function computeCentroid(positions: readonly Position[]): O.Option<Position> {
    if (positions.length === 0) {
        return O.none
    }
    const sum: Position = positions.reduce(
        (acc: Position, p: Position): Position => ({ x: acc.x + p.x, y: acc.y + p.y }),
        { x: 0, y: 0 }
    )
    return O.some({ x: sum.x / positions.length, y: sum.y / positions.length })
}

function jitter(center: Position, radius: number, random: RandomSource): Position {
    const angle: number = random() * 2 * Math.PI
    const distance: number = random() * radius
    return { x: center.x + Math.cos(angle) * distance, y: center.y + Math.sin(angle) * distance }
}

/** Ids of the nodes a delta adds without a position, in delta order. */
export function getNodesNeedingPlacement(delta: GraphDelta): readonly NodeId[] {
    return delta.flatMap((change: GraphChange): readonly NodeId[] =>
        change.type === 'AddNode' && change.needsPlacement ? [change.node.id] : []
    )
}

/**
 * Seed every node of `pending` (in order). A node seeded earlier counts as
 * positioned for the ones after it, so a chain loaded from a file unfolds
 * outwards instead of piling up at one point.
 */
export function seedPositions(
    graph: Graph,
    pending: readonly NodeId[],
    params: LayoutParams,
    random: RandomSource
): PositionUpdates {
    const unplaced: Set<NodeId> = new Set(pending.filter((id: NodeId) => graph.nodes.has(id)))
    const placed: Map<NodeId, Position> = new Map()
    graph.nodes.forEach((node: GraphNode) => {
        if (!unplaced.has(node.id)) {
            placed.set(node.id, node.position)
        }
    })
    const seeds: Map<NodeId, Position> = new Map()

    for (const id of pending) {
        if (!unplaced.has(id)) {
            continue
        }
        const neighbourPositions: readonly Position[] = E.getOrElse((): readonly NodeId[] => [])(getNeighbors(graph, id))
            .flatMap((neighbour: NodeId): readonly Position[] => {
                const position: Position | undefined = placed.get(neighbour)
                return position ? [position] : []
            })
        const center: Position = O.getOrElse((): Position => ({ x: 0, y: 0 }))(
            O.alt(() => computeCentroid(Array.from(placed.values())))(computeCentroid(neighbourPositions))
        )
        const seeded: Position = jitter(center, params.seedJitter, random)
        seeds.set(id, seeded)
        placed.set(id, seeded)
        unplaced.delete(id)
    }
    return seeds
}
