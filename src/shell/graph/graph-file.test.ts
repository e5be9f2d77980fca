import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import * as O from 'fp-ts/lib/Option.js'
import { edgeListToGraph } from '@/pure/graph/edge-list'
import type { Logger } from '@/shell/logging/logger'
import { describeLoad, readGraphFile, writeGraphFile } from './graph-file'

function recordingLogger(lines: string[]): Logger {
    const record = (level: string) => (...params: unknown[]): void => {
        lines.push(`${level}: ${params.map(String).join(' ')}`)
    }
    return { error: record('error'), warn: record('warn'), info: record('info'), debug: record('debug') }
}

describe('graph-file', () => {
    let dir: string

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'graphos-file-'))
    })

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true })
    })

    it('treats a missing file as a new graph', async () => {
        const file: string = path.join(dir, 'new.txt')

        const parsed = await readGraphFile(file, recordingLogger([]))

        expect(parsed).toEqual(O.none)
        expect(describeLoad(file, parsed)).toBe('new file new.txt')
    })

    it('logs every malformed line with its line number and keeps the rest', async () => {
        const file: string = path.join(dir, 'g.txt')
        await fs.writeFile(file, 'A B 1\nA B C D\nB C x\nB C 2\n')
        const lines: string[] = []

        const parsed = await readGraphFile(file, recordingLogger(lines))

        expect(O.map((p: { readonly entries: readonly unknown[] }) => p.entries.length)(parsed)).toEqual(O.some(2))
        expect(lines.filter((line: string) => line.startsWith('warn'))).toEqual([
            `warn: ${file}: skipped line 2: expected "nodeA nodeB [weight]", got 4 fields: A B C D`,
            `warn: ${file}: skipped line 3: weight "x" is not a number: B C x`
        ])
        expect(describeLoad(file, parsed)).toBe('loaded g.txt, skipped 2 malformed lines (first at line 2)')
    })

    it('writes the edge list into a directory it creates', async () => {
        const file: string = path.join(dir, 'nested', 'out.txt')
        const graph = edgeListToGraph(
            [
                { type: 'Edge', line: 1, source: 'A', target: 'B', weight: O.some(1) },
                { type: 'Node', line: 2, label: 'lonely' }
            ],
            'directed'
        )

        await writeGraphFile(file, graph, recordingLogger([]))

        expect(await fs.readFile(file, 'utf-8')).toBe('A B 1\nlonely\n')
    })
})
