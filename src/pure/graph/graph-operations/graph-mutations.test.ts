import { describe, it, expect } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { DeltaWithId, EdgeId, Graph, GraphDelta, GraphEdge, GraphError, NodeId } from '@/pure/graph'
import {
    applyGraphDeltaToGraph,
    createEmptyGraph,
    fromAddEdgeToDelta,
    fromAddNodeToDelta,
    fromRemoveEdgeToDelta,
    fromRemoveNodeToDelta,
    fromUpdateNodeToDelta,
    isTopologyDelta
} from '@/pure/graph'
import { adjacencyIndexesEqual, buildAdjacencyIndex } from './adjacencyIndex'

// ── Helpers ──────────────────────────────────────────────────────────────────

function withNode(graph: Graph, label: string): { readonly graph: Graph; readonly id: NodeId } {
    const { id, delta }: DeltaWithId<NodeId> = fromAddNodeToDelta(graph, label, O.none)
    return { graph: applyGraphDeltaToGraph(graph, delta), id }
}

function withEdge(graph: Graph, source: NodeId, target: NodeId): { readonly graph: Graph; readonly id: EdgeId } {
    const result: E.Either<GraphError, DeltaWithId<EdgeId>> = fromAddEdgeToDelta(graph, source, target, O.none)
    if (E.isLeft(result)) {
        throw new Error(`unexpected error ${result.left.type}`)
    }
    return { graph: applyGraphDeltaToGraph(graph, result.right.delta), id: result.right.id }
}

function expectIndexConsistent(graph: Graph): void {
    const rebuilt = buildAdjacencyIndex(graph.nodes.keys(), graph.edges.values())
    expect(adjacencyIndexesEqual(graph.adjacency, rebuilt)).toBe(true)
    graph.edges.forEach((edge: GraphEdge) => {
        expect(graph.nodes.has(edge.source)).toBe(true)
        expect(graph.nodes.has(edge.target)).toBe(true)
    })
}

/** Small deterministic PRNG so the sequence test is reproducible. */
function mulberry32(seed: number): () => number {
    let state: number = seed
    return (): number => {
        state = (state + 0x6d2b79f5) | 0
        let t: number = Math.imul(state ^ (state >>> 15), 1 | state)
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    }
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe('graph-mutations', () => {
    describe('fromAddNodeToDelta', () => {
        it('allocates increasing ids starting at 1', () => {
            const first = withNode(createEmptyGraph(), 'A')
            const second = withNode(first.graph, 'B')

            expect(first.id).toBe(1)
            expect(second.id).toBe(2)
            expect(second.graph.nodes.get(2)?.label).toBe('B')
            expect(second.graph.adjacency.get(2)).toEqual(new Set())
        })

        it('never reuses the id of a removed node', () => {
            const a = withNode(createEmptyGraph(), 'A')
            const removal: E.Either<GraphError, GraphDelta> = fromRemoveNodeToDelta(a.graph, a.id)
            const emptied: Graph = applyGraphDeltaToGraph(a.graph, E.getOrElse((): GraphDelta => [])(removal))
            const b = withNode(emptied, 'B')

            expect(b.id).toBe(2)
        })
    })

    describe('fromAddEdgeToDelta', () => {
        it('fails with UnknownNode naming the missing endpoint', () => {
            const a = withNode(createEmptyGraph(), 'A')

            expect(fromAddEdgeToDelta(a.graph, a.id, 42, O.none)).toEqual(E.left({ type: 'UnknownNode', nodeId: 42 }))
            expect(fromAddEdgeToDelta(a.graph, 7, a.id, O.none)).toEqual(E.left({ type: 'UnknownNode', nodeId: 7 }))
        })

        it('indexes the edge under both endpoints', () => {
            const a = withNode(createEmptyGraph(), 'A')
            const b = withNode(a.graph, 'B')
            const edge = withEdge(b.graph, a.id, b.id)

            expect(edge.graph.adjacency.get(a.id)).toEqual(new Set([edge.id]))
            expect(edge.graph.adjacency.get(b.id)).toEqual(new Set([edge.id]))
        })

        it('indexes a self-loop once', () => {
            const a = withNode(createEmptyGraph(), 'A')
            const loop = withEdge(a.graph, a.id, a.id)

            expect(loop.graph.adjacency.get(a.id)).toEqual(new Set([loop.id]))
        })
    })

    describe('fromRemoveNodeToDelta', () => {
        it('removes exactly the incident edges and no others', () => {
            const a = withNode(createEmptyGraph(), 'A')
            const b = withNode(a.graph, 'B')
            const c = withNode(b.graph, 'C')
            const d = withNode(c.graph, 'D')
            const ab = withEdge(d.graph, a.id, b.id)
            const bc = withEdge(ab.graph, b.id, c.id)
            const cd = withEdge(bc.graph, c.id, d.id)
            const da = withEdge(cd.graph, d.id, a.id)

            const delta: E.Either<GraphError, GraphDelta> = fromRemoveNodeToDelta(da.graph, b.id)
            if (E.isLeft(delta)) throw new Error('expected removal delta')
            const result: Graph = applyGraphDeltaToGraph(da.graph, delta.right)

            expect(Array.from(result.edges.keys()).sort()).toEqual([cd.id, da.id].sort())
            expect(result.nodes.has(b.id)).toBe(false)
            expect(result.adjacency.has(b.id)).toBe(false)
            expect(result.adjacency.get(a.id)).toEqual(new Set([da.id]))
            expect(result.adjacency.get(c.id)).toEqual(new Set([cd.id]))
            expectIndexConsistent(result)
        })

        it('lists edge removals before the node removal', () => {
            const a = withNode(createEmptyGraph(), 'A')
            const b = withNode(a.graph, 'B')
            const ab = withEdge(b.graph, a.id, b.id)

            const delta: E.Either<GraphError, GraphDelta> = fromRemoveNodeToDelta(ab.graph, a.id)

            expect(E.isRight(delta) && delta.right.map(change => change.type)).toEqual(['RemoveEdge', 'RemoveNode'])
        })

        it('fails with UnknownNode for a dead handle', () => {
            expect(fromRemoveNodeToDelta(createEmptyGraph(), 3)).toEqual(E.left({ type: 'UnknownNode', nodeId: 3 }))
        })
    })

    describe('fromRemoveEdgeToDelta', () => {
        it('fails with UnknownEdge for a dead handle', () => {
            expect(fromRemoveEdgeToDelta(createEmptyGraph(), 9)).toEqual(E.left({ type: 'UnknownEdge', edgeId: 9 }))
        })
    })

    describe('fromUpdateNodeToDelta', () => {
        it('yields an empty delta when nothing changes', () => {
            const a = withNode(createEmptyGraph(), 'A')

            expect(fromUpdateNodeToDelta(a.graph, a.id, node => node)).toEqual(E.right([]))
        })

        it('is not a topology change', () => {
            const a = withNode(createEmptyGraph(), 'A')
            const delta: E.Either<GraphError, GraphDelta> = fromUpdateNodeToDelta(a.graph, a.id, node => ({ ...node, label: 'renamed' }))

            expect(E.isRight(delta) && isTopologyDelta(delta.right)).toBe(false)
        })
    })

    describe('adjacency index under random mutation sequences', () => {
        it.each([1, 2, 3, 4, 5])('stays consistent with the edge map (seed %i)', (seed: number) => {
            const random: () => number = mulberry32(seed)
            const pick = <T,>(items: readonly T[]): T | undefined => items[Math.floor(random() * items.length)]

            let graph: Graph = createEmptyGraph()
            for (let step: number = 0; step < 200; step++) {
                const nodeIds: readonly NodeId[] = Array.from(graph.nodes.keys())
                const roll: number = random()
                if (roll < 0.35 || nodeIds.length < 2) {
                    graph = withNode(graph, `n${step}`).graph
                } else if (roll < 0.8) {
                    const source: NodeId | undefined = pick(nodeIds)
                    const target: NodeId | undefined = pick(nodeIds)
                    if (source !== undefined && target !== undefined) {
                        graph = withEdge(graph, source, target).graph
                    }
                } else {
                    const victim: NodeId | undefined = pick(nodeIds)
                    if (victim !== undefined) {
                        const edgesBefore: readonly GraphEdge[] = Array.from(graph.edges.values())
                        const delta: E.Either<GraphError, GraphDelta> = fromRemoveNodeToDelta(graph, victim)
                        if (E.isLeft(delta)) throw new Error('live node reported unknown')
                        graph = applyGraphDeltaToGraph(graph, delta.right)

                        const survivors: readonly EdgeId[] = edgesBefore
                            .filter(edge => edge.source !== victim && edge.target !== victim)
                            .map(edge => edge.id)
                        expect(Array.from(graph.edges.keys())).toEqual(survivors)
                    }
                }
                expectIndexConsistent(graph)
            }
        })
    })
})
