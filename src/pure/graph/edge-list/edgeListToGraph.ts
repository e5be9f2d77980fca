import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { Graph, GraphDelta, GraphEdge, GraphMode, GraphNode, NodeId } from '@/pure/graph'
import { applyGraphDeltaToGraph, createEmptyGraph, fromAddEdgeToDelta, fromAddNodeToDelta } from '@/pure/graph'
import type { EdgeListEntry } from './parseEdgeList'

interface BuildAcc {
    readonly graph: Graph
    readonly delta: GraphDelta
    readonly idsByLabel: ReadonlyMap<string, NodeId>
}

function ensureNode(acc: BuildAcc, label: string): { readonly acc: BuildAcc; readonly id: NodeId } {
    const existing: NodeId | undefined = acc.idsByLabel.get(label)
    if (existing !== undefined) {
        return { acc, id: existing }
    }
    const { id, delta } = fromAddNodeToDelta(acc.graph, label, O.none)
    return {
        id,
        acc: {
            graph: applyGraphDeltaToGraph(acc.graph, delta),
            delta: [...acc.delta, ...delta],
            idsByLabel: new Map([...acc.idsByLabel, [label, id]])
        }
    }
}

/**
 * Turn parsed edge-list entries into the delta that builds them on top of `base`.
 * Labels name nodes: the first occurrence of a label creates the node, later ones reuse it.
 * Returns the delta rather than the graph so the store can apply it as one change.
 */
export function edgeListToDelta(base: Graph, entries: readonly EdgeListEntry[]): GraphDelta {
    const initial: BuildAcc = { graph: base, delta: [], idsByLabel: new Map() }
    return entries.reduce<BuildAcc>((acc: BuildAcc, entry: EdgeListEntry): BuildAcc => {
        if (entry.type === 'Node') {
            return ensureNode(acc, entry.label).acc
        }
        const withSource = ensureNode(acc, entry.source)
        const withTarget = ensureNode(withSource.acc, entry.target)
        const edge = fromAddEdgeToDelta(withTarget.acc.graph, withSource.id, withTarget.id, entry.weight)
        // Both endpoints were just ensured, so Left cannot happen here
        return E.isRight(edge)
            ? {
                ...withTarget.acc,
                graph: applyGraphDeltaToGraph(withTarget.acc.graph, edge.right.delta),
                delta: [...withTarget.acc.delta, ...edge.right.delta]
            }
            : withTarget.acc
    }, initial).delta
}

export function edgeListToGraph(entries: readonly EdgeListEntry[], mode: GraphMode): Graph {
    const empty: Graph = createEmptyGraph(mode)
    return applyGraphDeltaToGraph(empty, edgeListToDelta(empty, entries))
}

/** Labels are whitespace-separated tokens in the file format, and a leading # would start a comment. */
export function toEdgeListToken(label: string): string {
    const token: string = label.trim().replace(/\s+/g, '_')
    if (token === '') {
        return '_'
    }
    return token.startsWith('#') ? `_${token}` : token
}

/**
 * Serialize topology (not positions): one line per edge in edge-id order,
 * then one line per isolated node in node-id order.
 */
export function graphToEdgeList(graph: Graph): string {
    const byId = <T extends { readonly id: number }>(a: T, b: T): number => a.id - b.id
    const labelOf = (nodeId: NodeId): string => toEdgeListToken(graph.nodes.get(nodeId)?.label ?? '')

    const edgeLines: readonly string[] = Array.from(graph.edges.values())
        .sort(byId)
        .map((edge: GraphEdge) => [
            labelOf(edge.source),
            labelOf(edge.target),
            ...O.match((): readonly string[] => [], (weight: number): readonly string[] => [String(weight)])(edge.weight)
        ].join(' '))

    const isolatedLines: readonly string[] = Array.from(graph.nodes.values())
        .filter((node: GraphNode) => (graph.adjacency.get(node.id)?.size ?? 0) === 0)
        .sort(byId)
        .map((node: GraphNode) => toEdgeListToken(node.label))

    const lines: readonly string[] = [...edgeLines, ...isolatedLines]
    return lines.length === 0 ? '' : lines.join('\n') + '\n'
}
