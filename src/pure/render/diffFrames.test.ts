import { describe, it, expect } from 'vitest'
import * as O from 'fp-ts/lib/Option.js'
import type { CellUpdate, Frame } from './index'
import { FrameBuffer, diffFrames, encodeUpdates, formatHud } from './index'

function frameWith(rows: number, cols: number, text: string): Frame {
    const buffer: FrameBuffer = new FrameBuffer(rows, cols)
    buffer.write(0, 0, text, 'node')
    return buffer.toFrame()
}

describe('diffFrames', () => {
    it('is empty for two equal frames', () => {
        expect(diffFrames(O.some(frameWith(3, 4, 'ab')), frameWith(3, 4, 'ab'))).toEqual([])
    })

    it('emits every cell without a previous frame', () => {
        expect(diffFrames(O.none, frameWith(3, 4, 'ab'))).toHaveLength(12)
    })

    it('emits every cell when the size changed', () => {
        expect(diffFrames(O.some(frameWith(3, 4, 'ab')), frameWith(4, 4, 'ab'))).toHaveLength(16)
    })

    it('emits only the changed cells', () => {
        expect(diffFrames(O.some(frameWith(3, 4, 'ab')), frameWith(3, 4, 'ax'))).toEqual([
            { row: 0, col: 1, cell: { ch: 'x', style: 'node' } },
        ])
    })

    it('treats a style change as a change', () => {
        const previous: Frame = frameWith(1, 2, 'a')
        const buffer: FrameBuffer = new FrameBuffer(1, 2)
        buffer.write(0, 0, 'a', 'nodeSelected')

        expect(diffFrames(O.some(previous), buffer.toFrame())).toEqual([
            { row: 0, col: 0, cell: { ch: 'a', style: 'nodeSelected' } },
        ])
    })
})

describe('encodeUpdates', () => {
    it('moves the cursor only for non-adjacent cells and switches style only on change', () => {
        const updates: readonly CellUpdate[] = [
            { row: 0, col: 0, cell: { ch: 'a', style: 'plain' } },
            { row: 0, col: 1, cell: { ch: 'b', style: 'plain' } },
            { row: 2, col: 5, cell: { ch: 'c', style: 'node' } },
            { row: 2, col: 6, cell: { ch: 'd', style: 'node' } },
        ]

        expect(encodeUpdates(updates)).toBe('\x1b[1;1H\x1b[0mab\x1b[3;6H\x1b[0;1;37mcd\x1b[0m')
    })

    it('writes nothing for no updates', () => {
        expect(encodeUpdates([])).toBe('')
    })

    it('writes one column per cell even for wide input', () => {
        const updates: readonly CellUpdate[] = diffFrames(O.none, frameWith(1, 4, 'a中b'))

        expect(encodeUpdates(updates)).toBe('\x1b[1;1H\x1b[0;1;37ma?b\x1b[0m \x1b[0m')
    })
})

describe('formatHud', () => {
    it('joins the non-empty segments', () => {
        expect(formatHud({
            modeName: 'Idle',
            graphMode: 'directed',
            status: '',
            scale: 1,
            nodeCount: 3,
            edgeCount: 2,
            fileName: 'g.txt',
            settling: false,
        })).toBe(' Idle │ g.txt │ 3 nodes 2 edges │ zoom 1.00x')
    })

    it('marks a new graph, undirected mode and a running layout', () => {
        expect(formatHud({
            modeName: 'Editing',
            graphMode: 'undirected',
            status: 'saved',
            scale: 0.5,
            nodeCount: 0,
            edgeCount: 0,
            fileName: '',
            settling: true,
        })).toBe(' Editing │ [new graph] │ 0 nodes 0 edges (undirected) │ zoom 0.50x ~ │ saved')
    })
})
