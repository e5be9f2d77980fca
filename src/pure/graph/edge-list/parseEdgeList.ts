import * as O from 'fp-ts/lib/Option.js'

/**
 * Plain-text edge-list format, one entry per line:
 *
 *   nodeA nodeB [weight]    an edge (directed A→B unless the graph is undirected)
 *   nodeA                   an isolated node
 *   # comment / blank       ignored
 */

export type EdgeListEntry = EdgeListEdge | EdgeListNode

export interface EdgeListEdge {
    readonly type: 'Edge'
    readonly line: number // 1-based
    readonly source: string
    readonly target: string
    readonly weight: O.Option<number>
}

export interface EdgeListNode {
    readonly type: 'Node'
    readonly line: number
    readonly label: string
}

export interface MalformedInput {
    readonly type: 'MalformedInput'
    readonly line: number
    readonly text: string
    readonly reason: string
}

export interface ParsedEdgeList {
    readonly entries: readonly EdgeListEntry[]
    readonly warnings: readonly MalformedInput[]
}

const COMMENT_PREFIX: string = '#'

type LineResult = EdgeListEntry | MalformedInput | undefined

function parseLine(text: string, line: number): LineResult {
    const trimmed: string = text.trim()
    if (trimmed === '' || trimmed.startsWith(COMMENT_PREFIX)) {
        return undefined
    }
    const tokens: readonly string[] = trimmed.split(/\s+/)
    switch (tokens.length) {
        case 1:
            return { type: 'Node', line, label: tokens[0] }
        case 2:
            return { type: 'Edge', line, source: tokens[0], target: tokens[1], weight: O.none }
        case 3: {
            const weight: number = Number(tokens[2])
            if (!Number.isFinite(weight)) {
                return { type: 'MalformedInput', line, text, reason: `weight "${tokens[2]}" is not a number` }
            }
            return { type: 'Edge', line, source: tokens[0], target: tokens[1], weight: O.some(weight) }
        }
        default:
            return { type: 'MalformedInput', line, text, reason: `expected "nodeA nodeB [weight]", got ${tokens.length} fields` }
    }
}

/**
 * Parse an edge list. Malformed lines do not stop the parse: they are
 * reported as warnings and skipped.
 */
export function parseEdgeList(content: string): ParsedEdgeList {
    const results: readonly LineResult[] = content
        .split(/\r?\n/)
        .map((text: string, index: number) => parseLine(text, index + 1))

    return {
        entries: results.filter((r: LineResult): r is EdgeListEntry => r !== undefined && r.type !== 'MalformedInput'),
        warnings: results.filter((r: LineResult): r is MalformedInput => r !== undefined && r.type === 'MalformedInput')
    }
}

export function formatMalformedInput(warning: MalformedInput): string {
    return `line ${warning.line}: ${warning.reason}`
}
