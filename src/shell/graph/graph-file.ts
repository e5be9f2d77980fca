import { promises as fs } from 'fs'
import path from 'path'
import * as O from 'fp-ts/lib/Option.js'
import type { Graph } from '@/pure/graph'
import type { MalformedInput, ParsedEdgeList } from '@/pure/graph/edge-list'
import { formatMalformedInput, graphToEdgeList, parseEdgeList } from '@/pure/graph/edge-list'
import type { Logger } from '@/shell/logging/logger'
import { isErrnoException } from '@/shell/settings/settings_IO'

/**
 * Read an edge-list file. None when the file does not exist yet (a new graph);
 * other read failures propagate.
 */
export async function readGraphFile(filePath: string, logger: Logger): Promise<O.Option<ParsedEdgeList>> {
    let content: string
    try {
        content = await fs.readFile(filePath, 'utf-8')
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            logger.info(`${filePath} does not exist yet, starting a new graph`)
            return O.none
        }
        throw error
    }
    const parsed: ParsedEdgeList = parseEdgeList(content)
    parsed.warnings.forEach((warning: MalformedInput) => {
        logger.warn(`${filePath}: skipped ${formatMalformedInput(warning)}: ${warning.text.trim()}`)
    })
    logger.info(`loaded ${parsed.entries.length} entries from ${filePath}`)
    return O.some(parsed)
}

/** Write the topology as an edge list, creating the parent directory if needed. */
export async function writeGraphFile(filePath: string, graph: Graph, logger: Logger): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, graphToEdgeList(graph), 'utf-8')
    logger.info(`saved ${graph.nodes.size} nodes and ${graph.edges.size} edges to ${filePath}`)
}

/** One HUD line for the load result. */
export function describeLoad(filePath: string, parsed: O.Option<ParsedEdgeList>): string {
    const name: string = path.basename(filePath)
    if (O.isNone(parsed)) {
        return `new file ${name}`
    }
    const skipped: number = parsed.value.warnings.length
    if (skipped === 0) {
        return `loaded ${name}`
    }
    const first: MalformedInput = parsed.value.warnings[0]
    return `loaded ${name}, skipped ${skipped} malformed line${skipped === 1 ? '' : 's'} (first at line ${first.line})`
}
